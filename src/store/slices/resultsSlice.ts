import { createSlice, createAsyncThunk, PayloadAction } from '@reduxjs/toolkit';
import { ApiError, FetchError, PaginationParams, SearchResult } from '../../types';
import type { AppServices } from '../../services';
import { CursorState, first, initialCursor, last, resetFor, stepBackward, stepForward } from '../../lib/cursor';

interface ResultsState {
  items: SearchResult[];
  cursor: CursorState;
  loading: boolean;
  error: ApiError | null;
}

export const initialResultsState: ResultsState = {
  items: [],
  cursor: initialCursor,
  loading: false,
  error: null,
};

// Async thunks
export const fetchResults = createAsyncThunk<
  SearchResult[],
  PaginationParams,
  { extra: AppServices; rejectValue: ApiError }
>('results/fetch', async (params, { extra, rejectWithValue }) => {
  try {
    return await extra.papers.search(params);
  } catch (error) {
    if (error instanceof FetchError) {
      return rejectWithValue(error.details);
    }
    throw error;
  }
});

const resultsSlice = createSlice({
  name: 'results',
  initialState: initialResultsState,
  reducers: {
    jumpToFirst: (state) => {
      state.cursor = first();
    },
    jumpToLast: (state) => {
      state.cursor = last(state.items.length);
    },
    stepDown: (state, action: PayloadAction<number>) => {
      state.cursor = stepForward(state.cursor, state.items.length, action.payload);
    },
    stepUp: (state, action: PayloadAction<number>) => {
      state.cursor = stepBackward(state.cursor, action.payload);
    },
  },
  extraReducers: (builder) => {
    builder
      .addCase(fetchResults.pending, (state) => {
        state.loading = true;
        state.error = null;
      })
      .addCase(fetchResults.fulfilled, (state, action) => {
        state.loading = false;
        state.items = action.payload;
        state.cursor = resetFor(action.payload.length);
      })
      .addCase(fetchResults.rejected, (state, action) => {
        state.loading = false;
        state.error = action.payload ?? {
          error: action.error.name ?? 'Error',
          message: action.error.message ?? 'Failed to fetch results',
          statusCode: null,
          timestamp: new Date().toISOString(),
        };
      });
  },
  selectors: {
    // Item the open/mark/unmark actions apply to
    selectCurrentItem: (state): SearchResult | undefined => state.items[state.cursor.current],
  },
});

export const { jumpToFirst, jumpToLast, stepDown, stepUp } = resultsSlice.actions;
export const { selectCurrentItem } = resultsSlice.selectors;

export default resultsSlice.reducer;
