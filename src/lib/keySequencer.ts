import { KeyPress } from '../types';

type KeyHandler = (key: KeyPress) => Promise<void>;

/**
 * Feeds keystrokes to the handler strictly one at a time. A keystroke that
 * arrives while a fetch is outstanding waits for it; after the first failure
 * every queued and later keystroke is dropped.
 */
export class KeySequencer {
  private tail: Promise<void> = Promise.resolve();
  private failed = false;

  constructor(
    private readonly handle: KeyHandler,
    private readonly onFatal: (error: unknown) => void
  ) {}

  push(key: KeyPress): Promise<void> {
    this.tail = this.tail.then(async () => {
      if (this.failed) return;
      try {
        await this.handle(key);
      } catch (error) {
        this.failed = true;
        this.onFatal(error);
      }
    });
    return this.tail;
  }

  // Resolves once every queued keystroke has been handled
  idle(): Promise<void> {
    return this.tail;
  }

  get stopped(): boolean {
    return this.failed;
  }
}
