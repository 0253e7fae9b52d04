import { describe, it, expect, vi } from 'vitest';
import { withAlternateScreen } from '../src/lib/terminal';
import { TerminalSetupError } from '../src/types';

const ENTER = '\u001b[?1049h';
const LEAVE = '\u001b[?1049l';

function fakeTerminal(isTTY = true) {
  const written: string[] = [];
  return {
    written,
    streams: {
      stdin: { isTTY, setRawMode: vi.fn() },
      stdout: { write: (chunk: string) => written.push(chunk) },
    },
  };
}

describe('withAlternateScreen', () => {
  it('enters and leaves the alternate screen around the session', async () => {
    const { written, streams } = fakeTerminal();

    const result = await withAlternateScreen(streams, async () => {
      expect(written).toEqual([ENTER]);
      return 'done';
    });

    expect(result).toBe('done');
    expect(written).toEqual([ENTER, LEAVE]);
  });

  it('restores the screen when the session throws', async () => {
    const { written, streams } = fakeTerminal();

    await expect(
      withAlternateScreen(streams, async () => {
        throw new Error('fetch failed');
      })
    ).rejects.toThrow('fetch failed');

    expect(written).toEqual([ENTER, LEAVE]);
  });

  it('refuses to start without an interactive terminal', async () => {
    const { written, streams } = fakeTerminal(false);
    const session = vi.fn(async () => undefined);

    await expect(withAlternateScreen(streams, session)).rejects.toBeInstanceOf(TerminalSetupError);
    expect(session).not.toHaveBeenCalled();
    expect(written).toEqual([]);
  });

  it('stops listening for process exit once the session ends', async () => {
    const { streams } = fakeTerminal();
    const before = process.listenerCount('exit');

    await withAlternateScreen(streams, async () => {
      expect(process.listenerCount('exit')).toBe(before + 1);
    });

    expect(process.listenerCount('exit')).toBe(before);
  });
});
