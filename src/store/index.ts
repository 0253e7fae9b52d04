import { combineReducers, configureStore, ThunkAction, UnknownAction } from '@reduxjs/toolkit';
import { useDispatch, useSelector, TypedUseSelectorHook } from 'react-redux';

import paramsReducer from './slices/paramsSlice';
import resultsReducer from './slices/resultsSlice';
import seenReducer from './slices/seenSlice';
import interactionReducer from './slices/interactionSlice';
import { fetchLogger } from './middleware/fetchLogger';
import type { AppServices } from '../services';

const rootReducer = combineReducers({
  params: paramsReducer,
  results: resultsReducer,
  seen: seenReducer,
  interaction: interactionReducer,
});

export type RootState = ReturnType<typeof rootReducer>;

export function setupStore(services: AppServices, preloadedState?: Partial<RootState>) {
  return configureStore({
    reducer: rootReducer,
    preloadedState,
    middleware: (getDefaultMiddleware) =>
      getDefaultMiddleware({
        thunk: { extraArgument: services },
      }).concat(fetchLogger),
    devTools: false,
  });
}

export type AppStore = ReturnType<typeof setupStore>;
export type AppDispatch = AppStore['dispatch'];
export type AppThunk<ReturnType = void> = ThunkAction<ReturnType, RootState, AppServices, UnknownAction>;

// Typed hooks
export const useAppDispatch = () => useDispatch<AppDispatch>();
export const useAppSelector: TypedUseSelectorHook<RootState> = useSelector;
