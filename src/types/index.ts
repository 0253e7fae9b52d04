export type { SearchResult, Link, Category, PaginationParams } from './paper';
export type { ApiError } from './api';
export type { AppErrorKind } from './errors';
export { AppError, FetchError, PersistenceWriteError, TerminalSetupError, describeError } from './errors';

// Keyboard input, normalised from the terminal library's key events
export interface KeyPress {
  input: string;
  upArrow?: boolean;
  downArrow?: boolean;
  return?: boolean;
  escape?: boolean;
  backspace?: boolean;
  delete?: boolean;
  ctrl?: boolean;
  meta?: boolean;
}

export type InteractionMode = 'browse' | 'search' | 'help' | 'quit';
