import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type { LineInput } from '../../application/index.js';

export interface ReadlineInput extends LineInput {
  close(): void;
}

/**
 * Operator input over a readline interface.
 *
 * Ctrl-C while waiting and end of input both resolve `null`, which the
 * alert loop treats as an interrupt.
 */
export function createReadlineInput(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ReadlineInput {
  const rl: Interface = createInterface({ input, output });
  let closed = false;
  let pending: ((answer: string | null) => void) | null = null;
  const buffered: string[] = [];

  const settle = (answer: string | null): void => {
    const resolve = pending;
    pending = null;
    resolve?.(answer);
  };

  rl.on('line', (line: string) => {
    if (pending !== null) settle(line);
    else buffered.push(line);
  });
  rl.on('SIGINT', () => {
    closed = true;
    settle(null);
    rl.close();
  });
  rl.on('close', () => {
    closed = true;
    settle(null);
  });

  return {
    read(prompt: string): Promise<string | null> {
      output.write(prompt);
      const next = buffered.shift();
      if (next !== undefined) return Promise.resolve(next);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        pending = resolve;
      });
    },
    close(): void {
      rl.close();
    },
  };
}
