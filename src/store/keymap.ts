import { InteractionMode, KeyPress } from '../types';
import { isDigit } from '../lib/amount';

export type Intent =
  | { type: 'amount/push'; digit: string }
  | { type: 'cursor/step'; direction: 'forward' | 'backward' }
  | { type: 'cursor/jump'; to: 'first' | 'last' }
  | { type: 'page/step'; direction: 'next' | 'previous' }
  | { type: 'query/clear' }
  | { type: 'search/begin' }
  | { type: 'search/append'; text: string }
  | { type: 'search/deleteLast' }
  | { type: 'search/submit' }
  | { type: 'search/cancel' }
  | { type: 'link/open'; kind: 'pdf' | 'html' }
  | { type: 'seen/mark' }
  | { type: 'seen/unmark' }
  | { type: 'help/show' }
  | { type: 'help/dismiss' }
  | { type: 'quit' }
  | { type: 'ignore' };

const IGNORE: Intent = { type: 'ignore' };

const BROWSE_KEYS: Record<string, Intent> = {
  j: { type: 'cursor/step', direction: 'forward' },
  k: { type: 'cursor/step', direction: 'backward' },
  G: { type: 'cursor/jump', to: 'last' },
  g: { type: 'cursor/jump', to: 'first' },
  n: { type: 'page/step', direction: 'next' },
  p: { type: 'page/step', direction: 'previous' },
  '/': { type: 'search/begin' },
  o: { type: 'link/open', kind: 'pdf' },
  t: { type: 'link/open', kind: 'html' },
  b: { type: 'query/clear' },
  h: { type: 'help/show' },
  s: { type: 'seen/mark' },
  d: { type: 'seen/unmark' },
  q: { type: 'quit' },
};

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

function resolveBrowseIntent(key: KeyPress): Intent {
  if (key.ctrl && key.input === 'c') return { type: 'quit' };
  if (key.ctrl || key.meta) return IGNORE;
  if (key.downArrow) return BROWSE_KEYS.j;
  if (key.upArrow) return BROWSE_KEYS.k;
  if (isDigit(key.input)) return { type: 'amount/push', digit: key.input };

  return Object.hasOwn(BROWSE_KEYS, key.input) ? BROWSE_KEYS[key.input] : IGNORE;
}

function resolveSearchIntent(key: KeyPress): Intent {
  if (key.return) return { type: 'search/submit' };
  if (key.escape) return { type: 'search/cancel' };
  if (key.backspace || key.delete) return { type: 'search/deleteLast' };
  if (key.ctrl && key.input === 'c') return { type: 'quit' };
  if (key.ctrl || key.meta) return IGNORE;

  const text = key.input.replace(CONTROL_CHARS, '');
  return text.length > 0 ? { type: 'search/append', text } : IGNORE;
}

/**
 * Maps one keystroke to what it means in the current mode.
 * Pure, so every mode can be exercised without a terminal.
 */
export function resolveIntent(mode: InteractionMode, key: KeyPress): Intent {
  switch (mode) {
    case 'browse':
      return resolveBrowseIntent(key);
    case 'search':
      return resolveSearchIntent(key);
    case 'help':
      // Any key closes the overlay and is otherwise discarded
      return { type: 'help/dismiss' };
    case 'quit':
      return IGNORE;
  }
}
