import { createSlice, PayloadAction } from '@reduxjs/toolkit';

interface SeenState {
  ids: string[];
}

export const initialSeenState: SeenState = {
  ids: [],
};

const seenSlice = createSlice({
  name: 'seen',
  initialState: initialSeenState,
  reducers: {
    markSeen: (state, action: PayloadAction<string>) => {
      if (!state.ids.includes(action.payload)) {
        state.ids.push(action.payload);
      }
    },
    unmarkSeen: (state, action: PayloadAction<string>) => {
      state.ids = state.ids.filter((id) => id !== action.payload);
    },
  },
  selectors: {
    selectSeenIds: (state) => state.ids,
    selectIsSeen: (state, id: string) => state.ids.includes(id),
  },
});

export const { markSeen, unmarkSeen } = seenSlice.actions;
export const { selectSeenIds, selectIsSeen } = seenSlice.selectors;

export default seenSlice.reducer;
