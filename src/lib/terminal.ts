import { TerminalSetupError } from '../types';

const ENTER_ALTERNATE_SCREEN = '\u001b[?1049h';
const LEAVE_ALTERNATE_SCREEN = '\u001b[?1049l';

export interface TerminalStreams {
  stdin: { isTTY?: boolean; setRawMode?: (mode: boolean) => unknown };
  stdout: { write(chunk: string): unknown };
}

/**
 * Runs `session` on the alternate screen and switches back on every way out:
 * normal return, a thrown error, or the process exiting underneath it.
 */
export async function withAlternateScreen<T>(
  { stdin, stdout }: TerminalStreams,
  session: () => Promise<T>
): Promise<T> {
  if (!stdin.isTTY || typeof stdin.setRawMode !== 'function') {
    throw new TerminalSetupError('An interactive terminal is required: stdin is not a TTY.');
  }

  let restored = false;
  const restore = () => {
    if (restored) return;
    restored = true;
    stdout.write(LEAVE_ALTERNATE_SCREEN);
  };

  try {
    stdout.write(ENTER_ALTERNATE_SCREEN);
  } catch (error) {
    throw new TerminalSetupError('Could not switch to the alternate screen.', { cause: error });
  }
  process.once('exit', restore);

  try {
    return await session();
  } finally {
    process.off('exit', restore);
    restore();
  }
}
