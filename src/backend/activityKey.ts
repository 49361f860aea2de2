/**
 * What a category is attached to. By default that is the app name; the
 * title-aware key splits browsers by site and editors by file, so that
 * "github.com" and "youtube.com" can land in different categories.
 */
export type ActivityKeyFn = (app: string, title: string) => string;

export const appNameKey: ActivityKeyFn = (app) => app;

// Needle matched against the app name, and the label used in keys.
const BROWSERS: Array<[needle: string, label: string]> = [
  ['google chrome', 'Chrome'],
  ['chromium', 'Chromium'],
  ['microsoft edge', 'Edge'],
  ['brave', 'Brave'],
  ['firefox', 'Firefox'],
  ['safari', 'Safari']
];

const EDITORS: Array<[needle: string, label: string]> = [
  ['visual studio code', 'VSCode'],
  ['code', 'VSCode'],
  ['cursor', 'Cursor']
];

const URL_IN_TITLE = /https?:\/\/\S+/;

function labelFor(app: string, table: Array<[string, string]>, exact: Set<string>) {
  const name = app.trim().toLowerCase();
  for (const [needle, label] of table) {
    if (exact.has(needle) ? name === needle : name.includes(needle)) return label;
  }
  return null;
}

// "code" and "cursor" are too short to match loosely.
const EXACT_EDITOR_NAMES = new Set(['code', 'cursor']);

export function extractDomain(url: string): string | null {
  try {
    return new URL(url).hostname.replace(/^www\./, '') || null;
  } catch {
    return null;
  }
}

export const titleActivityKey: ActivityKeyFn = (app, title) => {
  const text = title.trim();
  if (text === '') return app;

  const browser = labelFor(app, BROWSERS, new Set());
  if (browser) {
    const url = text.match(URL_IN_TITLE);
    const domain = url ? extractDomain(url[0]) : null;
    if (domain) return domain;
    const parts = text.split(' - ');
    return `${browser} - ${parts[parts.length - 1]}`;
  }

  const editor = labelFor(app, EDITORS, EXACT_EDITOR_NAMES);
  if (editor) {
    return `${editor} - ${text.split(' - ')[0]}`;
  }

  return app;
};
