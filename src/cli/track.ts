import { Command } from 'commander';
import { logger, setLogLevel } from '@shared/logger';
import { runTracking } from '@backend/activity-tracker';
import { openLogStore } from '@backend/openLogStore';
import { createActiveWinProbe } from '@backend/windowProbe';
import {
  DEFAULT_AWAY_THRESHOLD_SECONDS,
  DEFAULT_IDLE_FACTOR,
  DEFAULT_LOG_FILE,
  DEFAULT_POLL_INTERVAL_SECONDS
} from '@backend/defaults';
import { trackOptionsSchema } from './options';
import { runCli } from './run';

async function main() {
  const program = new Command()
    .name('focus-track')
    .description('Record which window has focus, merged into activity intervals.')
    .option('-i, --interval <seconds>', `polling interval in seconds (default: ${DEFAULT_POLL_INTERVAL_SECONDS})`)
    .option('-l, --log-file <path>', `activity log, .csv or .db (default: ${DEFAULT_LOG_FILE})`)
    .option('--idle-threshold <seconds>', `largest gap still counted as continuous focus (default: ${DEFAULT_IDLE_FACTOR} x interval)`)
    .option('--away-threshold <seconds>', `input idle time after which the user counts as away, 0 disables (default: ${DEFAULT_AWAY_THRESHOLD_SECONDS})`)
    .option('-v, --verbose', 'debug logging')
    .exitOverride();

  program.parse(process.argv);
  const options = trackOptionsSchema.parse(program.opts());
  setLogLevel(options.verbose ? 'debug' : 'info');

  const controller = new AbortController();
  const onSignal = () => {
    logger.info('Stopping activity tracker...');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const store = openLogStore(options.logFile, { writable: true });
  try {
    await runTracking({
      probe: createActiveWinProbe(),
      store,
      intervalSeconds: options.interval,
      inactivityThresholdSeconds: options.idleThreshold,
      awayThresholdSeconds: options.awayThreshold,
      signal: controller.signal
    });
  } finally {
    store.close();
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

runCli(main);
