/**
 * y/N confirmation prompt
 */

import * as readline from 'node:readline';

export interface ConfirmOptions {
  /** -y / --yes: answer yes without asking */
  assumeYes?: boolean;
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
}

export function isAffirmative(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/**
 * Ask a yes/no question. Without a terminal and without `assumeYes` the
 * answer is no.
 */
export async function confirm(question: string, options: ConfirmOptions = {}): Promise<boolean> {
  if (options.assumeYes) return true;
  const input = options.input ?? process.stdin;
  if (!input.isTTY) return false;

  const rl = readline.createInterface({ input, output: options.output ?? process.stderr });
  const answer = await new Promise<string>((resolve) => {
    rl.question(`${question} [y/N] `, (a) => {
      rl.close();
      resolve(a);
    });
  });
  return isAffirmative(answer);
}
