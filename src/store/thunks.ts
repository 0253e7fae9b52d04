import type { AppThunk } from './index';
import { Intent, resolveIntent } from './keymap';
import { fetchResults, jumpToFirst, jumpToLast, selectCurrentItem, stepDown, stepUp } from './slices/resultsSlice';
import { nextPage, previousPage, setQuery } from './slices/paramsSlice';
import { markSeen, unmarkSeen } from './slices/seenSlice';
import {
  appendSearchText,
  beginSearch,
  clearAmount,
  deleteSearchChar,
  dismissHelp,
  endSearch,
  pushDigit,
  requestQuit,
  setNotice,
  showHelp,
} from './slices/interactionSlice';
import { FetchError, KeyPress } from '../types';
import { MAX_PAGE_STEP, parseAmount } from '../lib/amount';
import { resolveHtmlUrl, resolvePdfUrl } from '../lib/links';

/**
 * Fetches the page described by the current params and replaces the result list.
 * Rejects with a FetchError when the request fails; callers treat that as fatal.
 */
export const refreshResults = (): AppThunk<Promise<void>> => async (dispatch, getState) => {
  const { page, query } = getState().params;
  const result = await dispatch(fetchResults({ page, query }));

  if (fetchResults.rejected.match(result)) {
    throw new FetchError(
      result.payload ?? {
        error: result.error.name ?? 'Error',
        message: result.error.message ?? 'Failed to fetch results',
        statusCode: null,
        timestamp: new Date().toISOString(),
      }
    );
  }
};

// Reads and clears the digit buffer
const takeAmount = (max?: number): AppThunk<number> => (dispatch, getState) => {
  const amount = parseAmount(getState().interaction.amount, max);
  dispatch(clearAmount());
  return amount;
};

const openLink = (kind: 'pdf' | 'html'): AppThunk<Promise<void>> => async (dispatch, getState, services) => {
  const item = selectCurrentItem(getState());
  if (!item) return;

  const url = kind === 'pdf' ? resolvePdfUrl(item) : resolveHtmlUrl(item, services.settings.htmlMirror);
  if (url === null) return;

  try {
    await services.browser.open(url);
    dispatch(setNotice(`Opening ${url}`));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    dispatch(setNotice(`Could not open ${url}: ${reason}`));
  }
};

const applyIntent = (intent: Intent): AppThunk<Promise<void>> => async (dispatch, getState) => {
  switch (intent.type) {
    case 'amount/push':
      dispatch(pushDigit(intent.digit));
      return;

    case 'cursor/step': {
      const amount = dispatch(takeAmount());
      dispatch(intent.direction === 'forward' ? stepDown(amount) : stepUp(amount));
      return;
    }

    case 'cursor/jump':
      dispatch(intent.to === 'first' ? jumpToFirst() : jumpToLast());
      return;

    case 'page/step': {
      const amount = dispatch(takeAmount(MAX_PAGE_STEP));
      dispatch(intent.direction === 'next' ? nextPage(amount) : previousPage(amount));
      await dispatch(refreshResults());
      return;
    }

    case 'query/clear':
      dispatch(setQuery(''));
      await dispatch(refreshResults());
      return;

    case 'search/begin':
      dispatch(beginSearch());
      return;

    case 'search/append':
      dispatch(appendSearchText(intent.text));
      return;

    case 'search/deleteLast':
      dispatch(deleteSearchChar());
      return;

    case 'search/submit':
      dispatch(setQuery(getState().interaction.searchBuffer));
      dispatch(endSearch());
      await dispatch(refreshResults());
      return;

    case 'search/cancel':
      dispatch(endSearch());
      return;

    case 'link/open':
      await dispatch(openLink(intent.kind));
      return;

    case 'seen/mark':
    case 'seen/unmark': {
      const item = selectCurrentItem(getState());
      if (item) {
        dispatch(intent.type === 'seen/mark' ? markSeen(item.id) : unmarkSeen(item.id));
      }
      return;
    }

    case 'help/show':
      dispatch(showHelp());
      return;

    case 'help/dismiss':
      dispatch(dismissHelp());
      return;

    case 'quit':
      dispatch(requestQuit());
      return;

    case 'ignore':
      return;
  }
};

/**
 * Single entry point of the interaction state machine: interprets one keystroke
 * in the current mode and applies it, awaiting any fetch it triggers.
 */
export const pressKey = (key: KeyPress): AppThunk<Promise<void>> => async (dispatch, getState) => {
  if (getState().interaction.notice !== null) {
    dispatch(setNotice(null));
  }
  const intent = resolveIntent(getState().interaction.mode, key);
  await dispatch(applyIntent(intent));
};
