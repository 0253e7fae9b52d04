import { Middleware, isAnyOf } from '@reduxjs/toolkit';
import { fetchResults } from '../slices/resultsSlice';
import { createLogger } from '../../lib/logger';

const log = createLogger('Store');

const isFetchAction = isAnyOf(fetchResults.pending, fetchResults.fulfilled, fetchResults.rejected);

// Traces the fetch lifecycle so a stalled or failed page load can be followed in debug output
export const fetchLogger: Middleware = () => (next) => (action) => {
  if (isFetchAction(action)) {
    const { query, page } = action.meta.arg;

    if (fetchResults.pending.match(action)) {
      log.info(`Fetching page ${page} for "${query}"`, { requestId: action.meta.requestId });
    } else if (fetchResults.fulfilled.match(action)) {
      log.info(`Received ${action.payload.length} results for page ${page}`, { requestId: action.meta.requestId });
    } else {
      log.error(`Fetching page ${page} for "${query}" failed`, action.payload ?? action.error);
    }
  }

  return next(action);
};
