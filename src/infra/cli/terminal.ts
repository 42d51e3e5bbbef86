import { createInterface, type Interface } from 'readline/promises';
import { Writable } from 'stream';

/**
 * Line-oriented console the menus talk to. `ask` resolves to null once
 * input has ended (Ctrl-D or a closed pipe).
 */
export interface Terminal {
  ask(question: string): Promise<string | null>;
  askSecret(question: string): Promise<string | null>;
  print(line?: string): void;
  error(line: string): void;
}

/**
 * Output passthrough that can swallow echoed keystrokes.
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private target: NodeJS.WritableStream) {
    super();
  }

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

/**
 * Lines are pulled from the interface's async iterator, so a burst of piped
 * input is queued rather than lost between questions.
 */
export class ReadlineTerminal implements Terminal {
  private readonly output: MutableOutput;
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly target: NodeJS.WritableStream = process.stdout
  ) {
    this.output = new MutableOutput(target);
    this.rl = createInterface({
      input,
      output: this.output,
      terminal: input === process.stdin && process.stdin.isTTY === true,
    });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(question: string): Promise<string | null> {
    if (question) {
      this.output.write(question);
    }
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  async askSecret(question: string): Promise<string | null> {
    this.target.write(question);
    this.output.muted = true;
    try {
      return await this.ask('');
    } finally {
      this.output.muted = false;
      this.target.write('\n');
    }
  }

  print(line = ''): void {
    console.log(line);
  }

  error(line: string): void {
    console.error(line);
  }

  close(): void {
    this.rl.close();
  }
}
