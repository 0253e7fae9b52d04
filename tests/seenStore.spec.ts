import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SeenStore } from '../src/services/seenStore';
import { PersistenceWriteError } from '../src/types';
import reducer, { initialSeenState, markSeen, selectIsSeen, unmarkSeen } from '../src/store/slices/seenSlice';

describe('SeenStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seen-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads an empty set when the file does not exist', async () => {
    const store = new SeenStore(join(dir, 'missing'));
    await expect(store.load()).resolves.toEqual([]);
  });

  it('round-trips identifiers through the file', async () => {
    const filePath = join(dir, 'seen');
    await new SeenStore(filePath).flush(['a', 'b', 'c']);

    expect(await readFile(filePath, 'utf8')).toBe('a\nb\nc\n');

    const ids = new Set(await new SeenStore(filePath).load());
    expect(ids.has('a')).toBe(true);
    expect(ids.has('b')).toBe(true);
    expect(ids.has('c')).toBe(true);
    expect(ids.has('d')).toBe(false);
  });

  it('skips blank lines, strips CRLF endings and drops duplicates', async () => {
    const filePath = join(dir, 'seen');
    await writeFile(filePath, 'x\r\n\r\ny\nx\n');
    await expect(new SeenStore(filePath).load()).resolves.toEqual(['x', 'y']);
  });

  it('truncates the previous contents on flush', async () => {
    const filePath = join(dir, 'seen');
    await writeFile(filePath, 'old-1\nold-2\nold-3\n');
    await new SeenStore(filePath).flush(['new']);
    expect(await readFile(filePath, 'utf8')).toBe('new\n');
  });

  it('raises a PersistenceWriteError when the file cannot be written', async () => {
    const store = new SeenStore(join(dir, 'no-such-dir', 'seen'));
    await expect(store.flush(['a'])).rejects.toBeInstanceOf(PersistenceWriteError);
  });
});

describe('seenSlice', () => {
  const root = (state: ReturnType<typeof reducer>) => ({ seen: state });

  it('marks and unmarks identifiers', () => {
    let state = reducer(initialSeenState, markSeen('a'));
    expect(selectIsSeen(root(state), 'a')).toBe(true);
    state = reducer(state, unmarkSeen('a'));
    expect(selectIsSeen(root(state), 'a')).toBe(false);
  });

  it('is idempotent', () => {
    let state = reducer(initialSeenState, markSeen('a'));
    state = reducer(state, markSeen('a'));
    expect(state.ids).toEqual(['a']);
    state = reducer(state, unmarkSeen('a'));
    state = reducer(state, unmarkSeen('a'));
    expect(state.ids).toEqual([]);
  });
});
