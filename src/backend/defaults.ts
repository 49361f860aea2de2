// Defaults shared by the two commands and the library entry points.
export const DEFAULT_LOG_FILE = 'activity_log.csv';
export const DEFAULT_CATEGORY_FILE = 'app_categories.json';

export const DEFAULT_POLL_INTERVAL_SECONDS = 10;

// Two samples further apart than interval × factor are not continuous focus.
export const DEFAULT_IDLE_FACTOR = 1.5;

// No keyboard/mouse input for this long means the user is away, whatever is focused.
export const DEFAULT_AWAY_THRESHOLD_SECONDS = 600;

export const DEFAULT_MIN_DURATION_SECONDS = 5;
export const DEFAULT_TOP_APPS = 5;
export const DEFAULT_PEAK_HOURS = 3;

// Slices below this share are folded into "Other" in the share table.
export const SMALL_SEGMENT_PERCENT = 3;

export const DEFAULT_MAX_PROMPT_ATTEMPTS = 3;

export const SQLITE_LOG_EXTENSIONS = ['.db', '.sqlite', '.sqlite3'];

export function defaultInactivityThresholdSeconds(pollIntervalSeconds: number) {
  return pollIntervalSeconds * DEFAULT_IDLE_FACTOR;
}
