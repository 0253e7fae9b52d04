import { useRef } from 'react';
import type { Key } from 'ink';

import { useAppDispatch } from '../store';
import { pressKey } from '../store/thunks';
import { KeySequencer } from '../lib/keySequencer';
import { KeyPress } from '../types';

// The parts of Ink's key record the keymap reads
export type KeyFlags = Pick<Key, 'upArrow' | 'downArrow' | 'return' | 'escape' | 'backspace' | 'delete' | 'ctrl' | 'meta'>;

export const toKeyPress = (input: string, key: KeyFlags): KeyPress => ({
  input,
  upArrow: key.upArrow,
  downArrow: key.downArrow,
  return: key.return,
  escape: key.escape,
  backspace: key.backspace,
  delete: key.delete,
  ctrl: key.ctrl,
  meta: key.meta,
});

/**
 * Ink delivers whatever was read from stdin in one go, so type-ahead such as
 * `5j` arrives as a single chunk. Plain chunks are split back into one
 * keystroke per code point; keys Ink recognised as special stay whole.
 */
export const toKeyPresses = (input: string, key: KeyFlags): KeyPress[] => {
  const press = toKeyPress(input, key);
  const chars = Array.from(input);
  const special =
    key.upArrow || key.downArrow || key.return || key.escape || key.backspace || key.delete || key.ctrl || key.meta;

  if (chars.length <= 1 || special) return [press];
  return chars.map((char) => ({ ...press, input: char }));
};

// One sequencer per mounted screen, feeding keystrokes into the store in arrival order
export const useKeySequencer = (onFatal: (error: unknown) => void): KeySequencer => {
  const dispatch = useAppDispatch();
  const sequencer = useRef<KeySequencer | null>(null);

  if (sequencer.current === null) {
    sequencer.current = new KeySequencer((key) => dispatch(pressKey(key)), onFatal);
  }

  return sequencer.current;
};
