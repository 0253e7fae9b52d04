export interface RowWindow {
  start: number;
  end: number;
}

/**
 * Slice of rows to draw so that the selected row stays on screen.
 * `end` is exclusive.
 */
export function visibleWindow(selected: number | null, total: number, capacity: number): RowWindow {
  const size = Math.max(1, capacity);
  const focus = selected ?? 0;
  const start = focus < size ? 0 : focus - size + 1;
  return { start, end: Math.min(total, start + size) };
}

// How many rows of the given height (plus their one-line gap) fit in the space left
export function rowCapacity(terminalRows: number, chromeRows: number, rowHeight: number): number {
  return Math.max(1, Math.floor((terminalRows - chromeRows) / (rowHeight + 1)));
}
