import { CommanderError } from 'commander';
import { exitCodeFor, formatCliError } from '@shared/errors';
import { logger } from '@shared/logger';

/** Runs a command's main and turns a rejection into a one-line message and an exit code. */
export function runCli(main: () => Promise<void>) {
  void main().then(
    () => {
      process.exitCode = 0;
    },
    (error: unknown) => {
      // Commander has already printed its own usage error or help text.
      if (error instanceof CommanderError) {
        process.exitCode = error.exitCode;
        return;
      }
      logger.error(formatCliError(error));
      if (error instanceof Error && error.cause !== undefined) {
        logger.debug('Caused by', error.cause);
      }
      process.exitCode = exitCodeFor(error);
    }
  );
}
