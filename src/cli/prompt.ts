import * as readline from 'node:readline/promises';
import chalk from 'chalk';
import type { UnknownAppHandler } from '@backend/categoryResolver';

export type TerminalPrompt = {
  ask: UnknownAppHandler;
  close: () => void;
};

/**
 * Asks on the terminal for the category of an unseen app. Questions go to
 * stderr so the report on stdout stays clean. Waits as long as it takes.
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): TerminalPrompt {
  let rl: readline.Interface | null = null;
  let closed = false;

  const ask: UnknownAppHandler = (app, knownCategories) => {
    if (closed) {
      return Promise.reject(new Error('Input closed before a category was entered'));
    }
    const iface = rl ?? readline.createInterface({ input, output });
    if (!rl) {
      rl = iface;
      iface.once('close', () => {
        closed = true;
      });
    }

    if (knownCategories.length > 0) {
      output.write(`\n${chalk.bold.blue('Existing categories:')} ${knownCategories.join(', ')}\n`);
    }

    return new Promise<string>((resolve, reject) => {
      const onClose = () => reject(new Error('Input closed before a category was entered'));
      iface.once('close', onClose);
      iface.question(chalk.yellow(`Enter category for '${app}': `)).then(
        (answer) => {
          iface.off('close', onClose);
          resolve(answer);
        },
        (error: unknown) => {
          iface.off('close', onClose);
          reject(error);
        }
      );
    });
  };

  return {
    ask,
    close: () => {
      rl?.close();
    }
  };
}
