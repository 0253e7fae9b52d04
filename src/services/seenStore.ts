import { readFile, writeFile } from 'node:fs/promises';
import { PersistenceWriteError } from '../types';
import { createLogger } from '../lib/logger';

const log = createLogger('SeenStore');

export interface SeenPersistence {
  load(): Promise<string[]>;
  flush(ids: Iterable<string>): Promise<void>;
}

/**
 * Line-delimited file of identifiers the reader has marked as reviewed.
 * Read once when the session starts and written once when it ends.
 */
export class SeenStore implements SeenPersistence {
  constructor(readonly filePath: string) {}

  async load(): Promise<string[]> {
    let contents: string;
    try {
      contents = await readFile(this.filePath, 'utf8');
    } catch (error) {
      // A missing or unreadable file starts the session with nothing seen
      log.warn(`Starting with an empty seen list, could not read ${this.filePath}`, error);
      return [];
    }

    const ids = new Set<string>();
    for (const line of contents.split(/\r?\n/)) {
      if (line.length > 0) ids.add(line);
    }
    log.info(`Loaded ${ids.size} seen entries from ${this.filePath}`);
    return [...ids];
  }

  async flush(ids: Iterable<string>): Promise<void> {
    let body = '';
    for (const id of ids) {
      body += `${id}\n`;
    }

    try {
      await writeFile(this.filePath, body, { encoding: 'utf8', flag: 'w' });
    } catch (error) {
      throw new PersistenceWriteError(this.filePath, error);
    }
    log.info(`Saved seen entries to ${this.filePath}`);
  }
}
