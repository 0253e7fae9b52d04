import { homedir } from 'node:os';
import { join } from 'node:path';

// Environment-specific settings
export interface Settings {
  apiUrl: string;
  defaultQuery: string;
  initialPage: number;
  maxPage: number;
  seenFilePath: string;
  requestTimeoutMs: number;
  rowHeight: number;
  htmlMirror: {
    from: string;
    to: string;
  };
  debug: boolean;
}

export const DEFAULT_SETTINGS: Settings = {
  apiUrl: 'https://arxiv-json-api.fly.dev',
  defaultQuery: 'algorithms',
  initialPage: 1,
  maxPage: 1000,
  seenFilePath: join(homedir(), '.arxiv-cli'),
  requestTimeoutMs: 30000,
  rowHeight: 8,
  htmlMirror: {
    from: 'arxiv',
    to: 'ar5iv',
  },
  debug: false,
};

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return fallback;
  }
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const parseFlag = (value: string | undefined): boolean =>
  value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    ...DEFAULT_SETTINGS,
    apiUrl: env.ARXIV_TUI_API_URL?.trim() || DEFAULT_SETTINGS.apiUrl,
    // An empty query is a valid "browse everything" request
    defaultQuery: env.ARXIV_TUI_QUERY ?? DEFAULT_SETTINGS.defaultQuery,
    seenFilePath: env.ARXIV_TUI_SEEN_FILE?.trim() || DEFAULT_SETTINGS.seenFilePath,
    requestTimeoutMs: parsePositiveInt(env.ARXIV_TUI_TIMEOUT_MS, DEFAULT_SETTINGS.requestTimeoutMs),
    debug: parseFlag(env.ARXIV_TUI_DEBUG) || env.NODE_ENV === 'development',
  };
}

const settings: Settings = loadSettings();

export default settings;
