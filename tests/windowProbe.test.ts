import { beforeEach, describe, expect, it, vi } from 'vitest';
import { execFile } from 'node:child_process';
import { createActiveWinProbe } from '../src/backend/windowProbe';

type FakeWindow = { title: string; owner: { name: string } };

const state = vi.hoisted(() => {
  const current: { window: FakeWindow | undefined; ioreg: string | null } = { window: undefined, ioreg: null };
  return current;
});

vi.mock('active-win', () => ({
  activeWindow: async () => state.window
}));

vi.mock('node:child_process', () => ({
  execFile: vi.fn(
    (
      _file: string,
      _args: string[],
      callback: (error: Error | null, result?: { stdout: string; stderr: string }) => void
    ) => {
      if (state.ioreg === null) {
        callback(new Error('ioreg: command not found'));
        return;
      }
      callback(null, { stdout: state.ioreg, stderr: '' });
    }
  )
}));

describe('createActiveWinProbe', () => {
  beforeEach(() => {
    state.window = { title: 'main.ts', owner: { name: 'Code' } };
    state.ioreg = null;
    vi.mocked(execFile).mockClear();
  });

  it('reports the focused app and title', async () => {
    const probe = createActiveWinProbe({ readIdle: false });
    expect(await probe()).toEqual({ app: 'Code', title: 'main.ts' });
    expect(execFile).not.toHaveBeenCalled();
  });

  it('returns null when nothing has focus', async () => {
    state.window = undefined;
    expect(await createActiveWinProbe({ readIdle: false })()).toBeNull();
  });

  it('reads HID idle time in seconds from ioreg', async () => {
    state.ioreg = '    | |   "HIDIdleTime" = 42000000000\n    | |   "HIDKeyboardModifierMappingPairs" = ()\n';
    const probe = createActiveWinProbe({ readIdle: true });

    expect(await probe()).toEqual({ app: 'Code', title: 'main.ts', idleSeconds: 42 });
    expect(vi.mocked(execFile).mock.calls[0][0]).toBe('ioreg');
  });

  it('leaves idle time out when ioreg fails', async () => {
    const probe = createActiveWinProbe({ readIdle: true });
    const win = await probe();
    expect(win?.idleSeconds).toBeUndefined();
    expect(win?.app).toBe('Code');
  });
});
