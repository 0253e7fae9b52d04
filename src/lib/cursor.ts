export interface CursorState {
  // Highlighted row, null until the first move on a never-populated list
  selected: number | null;
  // Row the item actions (open, mark, unmark) apply to
  current: number;
}

export const initialCursor: CursorState = {
  selected: null,
  current: 0,
};

const select = (index: number): CursorState => ({ selected: index, current: index });

export function first(): CursorState {
  return select(0);
}

export function last(length: number): CursorState {
  return select(length === 0 ? 0 : length - 1);
}

export function stepForward(cursor: CursorState, length: number, amount: number): CursorState {
  if (cursor.selected === null || length === 0) {
    return select(0);
  }
  const index = cursor.selected;
  return select(index + amount >= length - 1 ? length - 1 : index + amount);
}

export function stepBackward(cursor: CursorState, amount: number): CursorState {
  if (cursor.selected === null) {
    return select(0);
  }
  const index = cursor.selected;
  return select(amount >= index ? 0 : index - amount);
}

// Cursor to use after the result list has been replaced
export function resetFor(length: number): CursorState {
  return length === 0 ? { ...initialCursor } : select(0);
}
