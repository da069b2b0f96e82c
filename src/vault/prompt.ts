/**
 * Deletion confirmation prompt
 */

import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';

export const DELETE_WARNING = 'Deleting a vault will permanently delete all secrets it contains!';
export const DELETE_QUESTION = 'Are you absolutely sure you want to delete the vault:';

/**
 * Streams used by the prompt
 */
export interface PromptIO {
  input: Readable & { isTTY?: boolean; setRawMode?: (mode: boolean) => unknown };
  output: Writable;
}

/**
 * Callback deciding whether a vault may be deleted
 */
export type ConfirmDeletion = (name: string) => Promise<boolean>;

/**
 * Read a single keypress from a raw-mode terminal
 */
function readKey(io: PromptIO): Promise<string> {
  const { input } = io;
  return new Promise((resolve, reject) => {
    const onData = (chunk: Buffer | string) => {
      cleanup();
      resolve(chunk.toString().charAt(0));
    };
    const onEnd = () => {
      cleanup();
      resolve('');
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const cleanup = () => {
      input.off('data', onData);
      input.off('end', onEnd);
      input.off('error', onError);
      input.setRawMode?.(false);
      input.pause();
    };

    input.setRawMode?.(true);
    input.on('data', onData);
    input.once('end', onEnd);
    input.once('error', onError);
    input.resume();
  });
}

/**
 * Read one line from a non-interactive input
 */
function readLine(io: PromptIO): Promise<string> {
  const rl = createInterface({ input: io.input, terminal: false });
  return new Promise((resolve) => {
    let answered = false;
    rl.once('line', (line) => {
      answered = true;
      rl.close();
      resolve(line);
    });
    rl.once('close', () => {
      if (!answered) resolve('');
    });
  });
}

/**
 * Interpret an answer: only a leading y or Y consents
 */
export function isConsent(answer: string): boolean {
  return answer.charAt(0).toLowerCase() === 'y';
}

/**
 * Ask twice-over before deleting: a warning, then a [y|N] question
 * answered by a single character.
 */
export async function confirmDeletion(
  name: string,
  io: PromptIO = { input: process.stdin, output: process.stdout }
): Promise<boolean> {
  io.output.write(`${DELETE_WARNING}\n`);
  io.output.write(`${DELETE_QUESTION} ${name} [y|N] `);

  const answer = io.input.isTTY ? await readKey(io) : await readLine(io);
  io.output.write('\n');

  return isConsent(answer);
}

/**
 * Build a ConfirmDeletion bound to the given streams
 */
export function createConfirm(io?: PromptIO): ConfirmDeletion {
  return (name) => confirmDeletion(name, io);
}
