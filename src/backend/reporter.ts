import chalk from 'chalk';
import Table from 'cli-table3';
import type { AggregationResult, ReportOutput } from '@shared/types';
import { describeRange } from '@shared/time';
import { DEFAULT_TOP_APPS, SMALL_SEGMENT_PERCENT } from './defaults';

export type ReportOptions = {
  output: ReportOutput;
  /** Malformed log records left out of the analysis. */
  skipped?: number;
  topApps?: number;
  /** Apps whose category could not be saved this run. */
  nonDurable?: string[];
};

export type ShareSlice = {
  label: string;
  seconds: number;
  percentage: number;
};

const BAR_WIDTH = 40;

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const m = Math.floor(seconds / 60);
    const s = Math.round(seconds % 60);
    return `${m}m ${s}s`;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}

function minutes(seconds: number) {
  return (seconds / 60).toFixed(1);
}

function pad2(value: number) {
  return String(value).padStart(2, '0');
}

/** Category shares with the small ones folded into a single "Other" slice. */
export function shareSlices(result: AggregationResult, thresholdPercent = SMALL_SEGMENT_PERCENT): ShareSlice[] {
  const slices: ShareSlice[] = [];
  let otherSeconds = 0;
  let otherPercentage = 0;
  for (const summary of result.categorySummaries) {
    if (summary.percentage < thresholdPercent) {
      otherSeconds += summary.seconds;
      otherPercentage += summary.percentage;
    } else {
      slices.push({ label: summary.category, seconds: summary.seconds, percentage: summary.percentage });
    }
  }
  if (otherSeconds > 0) {
    slices.push({ label: 'Other', seconds: otherSeconds, percentage: otherPercentage });
  }
  return slices;
}

export function renderBarChart(result: AggregationResult, width = BAR_WIDTH): string[] {
  const rows = result.categorySummaries;
  const longest = rows.reduce((max, row) => Math.max(max, row.seconds), 0);
  const labelWidth = rows.reduce((max, row) => Math.max(max, row.category.length), 0);
  return rows.map((row) => {
    const length = longest > 0 ? Math.round((row.seconds / longest) * width) : 0;
    return `${row.category.padEnd(labelWidth)} ${'█'.repeat(length)} ${minutes(row.seconds)}m`;
  });
}

function summaryTable(result: AggregationResult) {
  const table = new Table({
    head: ['Category', 'Time (min)', 'Activities', 'Percentage'].map((label) => chalk.bold(label)),
    colAligns: ['left', 'right', 'right', 'right'],
    style: { head: [], border: [] }
  });
  for (const summary of result.categorySummaries) {
    table.push([summary.category, minutes(summary.seconds), String(summary.count), `${summary.percentage.toFixed(1)}%`]);
  }
  return table.toString();
}

function shareTable(result: AggregationResult) {
  const table = new Table({
    head: ['Category', 'Share', 'Time (min)'].map((label) => chalk.bold(label)),
    colAligns: ['left', 'right', 'right'],
    style: { head: [], border: [] }
  });
  for (const slice of shareSlices(result)) {
    table.push([slice.label, `${slice.percentage.toFixed(1)}%`, minutes(slice.seconds)]);
  }
  return table.toString();
}

export function renderReport(result: AggregationResult, options: ReportOptions): string {
  const lines: string[] = [];
  lines.push(chalk.bold.blue(`Activity for ${describeRange(result.range)}: ${formatDuration(result.totalSeconds)} tracked`));
  lines.push(summaryTable(result));

  if (options.output === 'bar' || options.output === 'both') {
    lines.push('', chalk.bold('Time per category'), ...renderBarChart(result));
  }
  if (options.output === 'pie' || options.output === 'both') {
    lines.push('', chalk.bold('Share of tracked time'), shareTable(result));
  }

  lines.push('', chalk.bold(`Top ${options.topApps ?? DEFAULT_TOP_APPS} applications`));
  for (const entry of result.topApps.slice(0, options.topApps ?? DEFAULT_TOP_APPS)) {
    lines.push(`  • ${entry.app}: ${minutes(entry.seconds)} minutes`);
  }

  lines.push('', chalk.bold('Peak activity hours'));
  for (const slot of result.peakHours) {
    lines.push(`  • ${pad2(slot.hour)}:00 - ${pad2(slot.hour)}:59: ${minutes(slot.seconds)} minutes`);
  }

  if (options.skipped) {
    lines.push('', chalk.yellow(`Skipped ${options.skipped} malformed log record(s)`));
  }
  if (options.nonDurable && options.nonDurable.length > 0) {
    lines.push(chalk.yellow(`Not saved to the category file: ${options.nonDurable.join(', ')}`));
  }
  return lines.join('\n');
}
