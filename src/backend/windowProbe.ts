import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logger } from '@shared/logger';

const execFileAsync = promisify(execFile);

export type ProbedWindow = {
  app: string;
  title: string;
  /** Seconds since the last keyboard/mouse input, when the platform exposes it. */
  idleSeconds?: number;
};

/**
 * Reports the focused window, or `null` when nothing is focused (locked screen,
 * empty desktop). Rejects when the window system cannot be reached.
 */
export type WindowProbe = () => Promise<ProbedWindow | null>;

async function readMacIdleSeconds(): Promise<number | undefined> {
  try {
    const { stdout } = await execFileAsync('ioreg', ['-c', 'IOHIDSystem']);
    const match = stdout.match(/"HIDIdleTime" = (\d+)/);
    return match ? parseInt(match[1], 10) / 1_000_000_000 : undefined;
  } catch (error) {
    logger.debug('ioreg idle probe failed', error);
    return undefined;
  }
}

export type ActiveWinProbeOptions = {
  /** Defaults to on for macOS, where `ioreg` reports HID idle time. */
  readIdle?: boolean;
};

export function createActiveWinProbe(options: ActiveWinProbeOptions = {}): WindowProbe {
  const readIdle = options.readIdle ?? process.platform === 'darwin';

  return async () => {
    const { activeWindow } = await import('active-win');
    const [win, idleSeconds] = await Promise.all([
      activeWindow(),
      readIdle ? readMacIdleSeconds() : Promise.resolve(undefined)
    ]);
    if (!win) return null;
    return {
      app: win.owner.name,
      title: win.title,
      idleSeconds
    };
  };
}
