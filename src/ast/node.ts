export type NodeCallback<NodeType extends Node<NodeType>> = (node: NodeType) => void;

/**
 * Modified from base AST class in solc-typed-ast
 * @author Joran Honig
 * @see https://github.com/consensys/solc-typed-ast/commit/af781125e6f083ef5e0b0f458325aa7b8271de35
 */
export class Node<NodeType extends Node<NodeType>> {
  /**
   * Returns children nodes of the current node
   */
  get children(): readonly NodeType[] {
    return [];
  }

  walkChildren(callback: NodeCallback<NodeType>): void {
    const walker: NodeCallback<NodeType> = (node) => {
      callback(node);

      for (const child of node.children) {
        walker(child);
      }
    };

    for (const node of this.children) {
      walker(node);
    }
  }

  getChildrenBySelector<T extends NodeType>(
    selector: (node: NodeType) => node is T
  ): T[] {
    const nodes: T[] = [];

    this.walkChildren((node) => {
      if (selector(node)) {
        nodes.push(node);
      }
    });

    return nodes;
  }
}
