import React from 'react';
import { render } from 'ink';

import App from './App';
import settings from './config/settings';
import { createServices } from './services';
import { setupStore } from './store';
import { refreshResults } from './store/thunks';
import { initialParamsState } from './store/slices/paramsSlice';
import { selectSeenIds } from './store/slices/seenSlice';
import { withAlternateScreen } from './lib/terminal';
import { describeError } from './types';

async function main(): Promise<void> {
  const services = createServices(settings);
  const seenIds = await services.seen.load();

  const store = setupStore(services, {
    params: {
      ...initialParamsState,
      page: settings.initialPage,
      query: settings.defaultQuery,
      maxPage: settings.maxPage,
    },
    seen: { ids: seenIds },
  });

  // The first page loads before the terminal is taken over
  await store.dispatch(refreshResults());

  await withAlternateScreen({ stdin: process.stdin, stdout: process.stdout }, async () => {
    const instance = render(<App store={store} rowHeight={settings.rowHeight} />, { exitOnCtrlC: false });
    await instance.waitUntilExit();
  });

  // Only a clean quit gets here; a failed fetch skips saving
  await services.seen.flush(selectSeenIds(store.getState()));
}

main().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
