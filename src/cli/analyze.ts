import { Command } from 'commander';
import { setLogLevel } from '@shared/logger';
import { runAnalysis } from '@backend/analysis';
import { appNameKey, titleActivityKey } from '@backend/activityKey';
import { renderReport } from '@backend/reporter';
import {
  DEFAULT_CATEGORY_FILE,
  DEFAULT_LOG_FILE,
  DEFAULT_MIN_DURATION_SECONDS,
  DEFAULT_TOP_APPS
} from '@backend/defaults';
import { analyzeOptionsSchema, collect } from './options';
import { createTerminalPrompt } from './prompt';
import { runCli } from './run';

async function main() {
  const program = new Command()
    .name('focus-analyze')
    .description('Summarise tracked activity by category, application and hour.')
    .option('-d, --date <expr>', "today, yesterday, YYYY-MM-DD or YYYY-MM-DD..YYYY-MM-DD (default: today)")
    .option('-o, --output <type>', 'bar, pie or both (default: both)')
    .option('-l, --log-file <path>', `activity log, .csv or .db (default: ${DEFAULT_LOG_FILE})`)
    .option('-c, --category-file <path>', `category mapping JSON (default: ${DEFAULT_CATEGORY_FILE})`)
    .option('--set <app=category>', 'set or change a category before analysing (repeatable)', collect)
    .option('--min-duration <seconds>', `ignore intervals shorter than this (default: ${DEFAULT_MIN_DURATION_SECONDS})`)
    .option('--top <n>', `applications to list (default: ${DEFAULT_TOP_APPS})`)
    .option('--by-title', 'categorise browser tabs by site and editor windows by file instead of by app')
    .option('--strict', 'fail instead of continuing when the category file cannot be saved')
    .option('-v, --verbose', 'debug logging')
    .exitOverride();

  program.parse(process.argv);
  const options = analyzeOptionsSchema.parse(program.opts());
  setLogLevel(options.verbose ? 'debug' : 'warn');

  const prompt = createTerminalPrompt();
  try {
    const outcome = await runAnalysis({
      logFile: options.logFile,
      categories: options.categoryFile,
      range: options.date,
      onUnknown: prompt.ask,
      edits: options.set,
      minDurationSeconds: options.minDuration,
      topN: options.top,
      requireDurable: options.strict,
      activityKey: options.byTitle ? titleActivityKey : appNameKey
    });
    process.stdout.write(
      `${renderReport(outcome.result, {
        output: options.output,
        skipped: outcome.skipped,
        topApps: options.top,
        nonDurable: outcome.nonDurable
      })}\n`
    );
  } finally {
    prompt.close();
  }
}

runCli(main);
