import { describe, it, expect } from 'vitest';
import { PassThrough, Writable } from 'stream';
import { ReadlineTerminal } from '../terminal.js';

function collector(): { stream: Writable; written: string[] } {
  const written: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk.toString());
      callback();
    },
  });
  return { stream, written };
}

describe('ReadlineTerminal', () => {
  it('should hand each piped line to the next question', async () => {
    const input = new PassThrough();
    const { stream } = collector();
    const terminal = new ReadlineTerminal(input, stream);

    input.end('2\nalice\ntest-secret\n6\n');

    const answers = [
      await terminal.ask('Enter your choice: '),
      await terminal.ask('Enter your username: '),
      await terminal.askSecret('Enter your password: '),
      await terminal.ask('Enter your choice: '),
      await terminal.ask('Enter your choice: '),
    ];

    expect(answers).toEqual(['2', 'alice', 'test-secret', '6', null]);
    terminal.close();
  });

  it('should write questions and keep secret answers off the output', async () => {
    const input = new PassThrough();
    const { stream, written } = collector();
    const terminal = new ReadlineTerminal(input, stream);

    input.end('sam\ntest-secret\n');
    await terminal.ask('Enter your username: ');
    await terminal.askSecret('Enter your password: ');

    expect(written.join('')).toBe('Enter your username: Enter your password: \n');
    terminal.close();
  });

  it('should keep returning null once input has ended', async () => {
    const input = new PassThrough();
    const terminal = new ReadlineTerminal(input, collector().stream);

    input.end();

    expect(await terminal.ask('Enter your choice: ')).toBeNull();
    expect(await terminal.ask('Enter your choice: ')).toBeNull();
  });
});
