import { createSlice, PayloadAction } from '@reduxjs/toolkit';
import { PaginationParams } from '../../types';
import { advancePage, MAX_PAGE, retreatPage } from '../../lib/pagination';

export interface ParamsState extends PaginationParams {
  maxPage: number;
}

export const initialParamsState: ParamsState = {
  page: 1,
  query: 'algorithms',
  maxPage: MAX_PAGE,
};

const paramsSlice = createSlice({
  name: 'params',
  initialState: initialParamsState,
  reducers: {
    nextPage: (state, action: PayloadAction<number>) => {
      state.page = advancePage(state.page, action.payload, state.maxPage);
    },
    previousPage: (state, action: PayloadAction<number>) => {
      state.page = retreatPage(state.page, action.payload);
    },
    setQuery: (state, action: PayloadAction<string>) => {
      state.query = action.payload;
    },
  },
});

export const { nextPage, previousPage, setQuery } = paramsSlice.actions;

export default paramsSlice.reducer;
