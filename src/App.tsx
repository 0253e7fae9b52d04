import React, { useCallback, useEffect } from 'react';
import { Box, useApp, useInput } from 'ink';
import { Provider } from 'react-redux';

import { AppStore, useAppSelector } from './store';
import { ResultsTable } from './components/papers/ResultsTable';
import { StatusBar } from './components/common/StatusBar';
import { SearchPrompt } from './components/common/SearchPrompt';
import { HelpOverlay } from './components/common/HelpOverlay';
import { ErrorBoundary } from './components/common/ErrorBoundary';
import { toKeyPresses, useKeySequencer } from './hooks/useKeySequencer';
import { useTerminalRows } from './hooks/useTerminalRows';
import { rowCapacity } from './lib/viewport';

// Lines taken by the border, title, header, status bar and outer margin
const CHROME_ROWS = 8;

interface ScreenProps {
  rowHeight: number;
}

const Screen: React.FC<ScreenProps> = ({ rowHeight }) => {
  const { exit } = useApp();
  const terminalRows = useTerminalRows();

  const { mode, amount, searchBuffer, notice } = useAppSelector((state) => state.interaction);
  const { page, query } = useAppSelector((state) => state.params);
  const { items, cursor, loading } = useAppSelector((state) => state.results);
  const seenIds = useAppSelector((state) => state.seen.ids);

  const handleFatal = useCallback(
    (error: unknown) => {
      exit(error instanceof Error ? error : new Error(String(error)));
    },
    [exit]
  );
  const sequencer = useKeySequencer(handleFatal);

  useInput((input, key) => {
    for (const press of toKeyPresses(input, key)) {
      void sequencer.push(press);
    }
  });

  useEffect(() => {
    if (mode === 'quit') {
      exit();
    }
  }, [mode, exit]);

  if (mode === 'help') {
    return <HelpOverlay />;
  }

  if (mode === 'search') {
    return <SearchPrompt buffer={searchBuffer} />;
  }

  return (
    <Box flexDirection="column" margin={1}>
      <ResultsTable
        items={items}
        cursor={cursor}
        seenIds={seenIds}
        query={query}
        page={page}
        rowHeight={rowHeight}
        capacity={rowCapacity(terminalRows, CHROME_ROWS, rowHeight)}
      />
      <StatusBar
        query={query}
        page={page}
        total={items.length}
        amount={amount}
        loading={loading}
        notice={notice}
      />
    </Box>
  );
};

interface AppProps {
  store: AppStore;
  rowHeight: number;
}

export default function App({ store, rowHeight }: AppProps) {
  return (
    <Provider store={store}>
      <ErrorBoundary>
        <Screen rowHeight={rowHeight} />
      </ErrorBoundary>
    </Provider>
  );
}
