import type { Terminal } from '../infra/cli/terminal.js';

/**
 * Terminal fed from a fixed list of answers; input ends when it runs out.
 * `output` holds printed and error lines in order.
 */
export class ScriptedTerminal implements Terminal {
  readonly questions: string[] = [];
  readonly output: string[] = [];
  readonly errors: string[] = [];
  private answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  get remaining(): number {
    return this.answers.length;
  }

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }

  async askSecret(question: string): Promise<string | null> {
    return this.ask(question);
  }

  print(line = ''): void {
    this.output.push(line);
  }

  error(line: string): void {
    this.output.push(line);
    this.errors.push(line);
  }
}
