/**
 * Terminal prompts
 */

import { createInterface } from 'node:readline';

/**
 * Ask for a value on the terminal and resolve with the trimmed answer
 */
export async function promptInput(message: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(message, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}
