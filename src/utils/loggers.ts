import chalk from "chalk";

export interface Logger {
  log(...message: unknown[]): void;
}

export class NoopLogger implements Logger {
  log(..._message: unknown[]): void {
    return;
  }
}

export class DebugLogger implements Logger {
  constructor(private readonly prefix = "abi-coder") {}

  log(...message: unknown[]): void {
    console.log(chalk.gray(`[${this.prefix}]`), ...message);
  }
}

/** Collects messages in memory; used to inspect decoder traces. */
export class BufferedLogger implements Logger {
  readonly lines: string[] = [];

  log(...message: unknown[]): void {
    this.lines.push(message.map((m) => String(m)).join(" "));
  }
}
