import React from 'react';
import { describe, it, expect, vi } from 'vitest';
import { render } from 'ink-testing-library';

import App from '../src/App';
import { setupStore } from '../src/store';
import { refreshResults } from '../src/store/thunks';
import { DEFAULT_SETTINGS } from '../src/config/settings';
import type { SearchGateway, UrlOpener } from '../src/services';
import { makePage } from './fixtures';

const ANSI = /\u001b\[[0-9;]*m/g;
const plain = (frame: string | undefined): string => (frame ?? '').replace(ANSI, '');

const papers: SearchGateway = {
  search: async () => makePage(10),
};

const browser: UrlOpener = {
  open: async () => undefined,
};

async function renderApp(seenIds: string[] = []) {
  const store = setupStore(
    { papers, browser, settings: { htmlMirror: DEFAULT_SETTINGS.htmlMirror } },
    { seen: { ids: seenIds } }
  );
  await store.dispatch(refreshResults());
  const view = render(<App store={store} rowHeight={2} />);
  // useInput subscribes to stdin in an effect; keys written before that are lost
  await vi.waitFor(() => expect(view.stdin.listenerCount('readable')).toBeGreaterThan(0));
  return { store, ...view };
}

describe('App', () => {
  it('renders the current page with the first row selected', async () => {
    const { lastFrame, unmount } = await renderApp();
    const frame = plain(lastFrame());

    expect(frame).toContain('Results for "algorithms" · page 1');
    expect(frame).toContain('>> ');
    expect(frame).toContain('Paper 2403.00000');
    expect(frame).toContain('/algorithms · page 1 · 10 results');
    unmount();
  });

  it('shows which entries have been seen', async () => {
    const { lastFrame, unmount } = await renderApp(['http://arxiv.org/abs/2403.00000']);
    const frame = plain(lastFrame());

    expect(frame).toContain('✅');
    expect(frame).toContain('❌');
    unmount();
  });

  it('scrolls so the selected row stays visible', async () => {
    const { lastFrame, stdin, store, unmount } = await renderApp();

    stdin.write('G');
    await vi.waitFor(() => expect(store.getState().results.cursor.selected).toBe(9));
    await vi.waitFor(() => expect(plain(lastFrame())).toContain('Paper 2403.00009'));

    expect(plain(lastFrame())).not.toContain('Paper 2403.00000');
    unmount();
  });

  it('handles every key of a chunk that arrives in one read', async () => {
    const { stdin, store, unmount } = await renderApp();

    stdin.write('5j');
    await vi.waitFor(() => expect(store.getState().results.cursor.selected).toBe(5));
    expect(store.getState().interaction.amount).toBe('');

    stdin.write('jj');
    await vi.waitFor(() => expect(store.getState().results.cursor.selected).toBe(7));
    unmount();
  });

  it('shows the pending amount in the status bar', async () => {
    const { lastFrame, stdin, unmount } = await renderApp();

    stdin.write('4');
    await vi.waitFor(() => expect(plain(lastFrame())).toContain('10 results · 4'));
    unmount();
  });

  it('opens and closes the help overlay', async () => {
    const { lastFrame, stdin, unmount } = await renderApp();

    stdin.write('h');
    await vi.waitFor(() => expect(plain(lastFrame())).toContain('Press any key to close'));
    expect(plain(lastFrame())).toContain('q to save and quit');

    stdin.write('x');
    await vi.waitFor(() => expect(plain(lastFrame())).toContain('Paper 2403.00000'));
    unmount();
  });

  it('echoes the search buffer while typing', async () => {
    const { lastFrame, stdin, unmount } = await renderApp();

    stdin.write('/');
    await vi.waitFor(() => expect(plain(lastFrame())).toContain('enter to search'));

    stdin.write('g');
    stdin.write('o');
    await vi.waitFor(() => expect(plain(lastFrame())).toContain('/go'));
    unmount();
  });
});
