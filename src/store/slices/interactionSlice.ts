import { createSlice, PayloadAction } from '@reduxjs/toolkit';
import { InteractionMode } from '../../types';

interface InteractionState {
  mode: InteractionMode;
  // Digits typed ahead of a step action
  amount: string;
  searchBuffer: string;
  notice: string | null;
}

export const initialInteractionState: InteractionState = {
  mode: 'browse',
  amount: '',
  searchBuffer: '',
  notice: null,
};

const interactionSlice = createSlice({
  name: 'interaction',
  initialState: initialInteractionState,
  reducers: {
    pushDigit: (state, action: PayloadAction<string>) => {
      state.amount += action.payload;
    },
    clearAmount: (state) => {
      state.amount = '';
    },
    beginSearch: (state) => {
      state.mode = 'search';
      state.searchBuffer = '';
    },
    appendSearchText: (state, action: PayloadAction<string>) => {
      state.searchBuffer += action.payload;
    },
    deleteSearchChar: (state) => {
      // Drop the last code point, not the last UTF-16 unit
      state.searchBuffer = Array.from(state.searchBuffer).slice(0, -1).join('');
    },
    endSearch: (state) => {
      state.mode = 'browse';
    },
    showHelp: (state) => {
      state.mode = 'help';
    },
    dismissHelp: (state) => {
      state.mode = 'browse';
    },
    requestQuit: (state) => {
      state.mode = 'quit';
    },
    setNotice: (state, action: PayloadAction<string | null>) => {
      state.notice = action.payload;
    },
  },
});

export const {
  pushDigit,
  clearAmount,
  beginSearch,
  appendSearchText,
  deleteSearchChar,
  endSearch,
  showHelp,
  dismissHelp,
  requestQuit,
  setNotice,
} = interactionSlice.actions;

export default interactionSlice.reducer;
