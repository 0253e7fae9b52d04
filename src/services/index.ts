import { ApiClient } from './api';
import { PapersService, SearchGateway } from './papersService';
import { SeenPersistence, SeenStore } from './seenStore';
import { SystemBrowser, UrlOpener } from './browser';
import type { Settings } from '../config/settings';

export { ApiClient } from './api';
export type { ApiClientOptions } from './api';
export { PapersService } from './papersService';
export type { SearchGateway } from './papersService';
export { SeenStore } from './seenStore';
export type { SeenPersistence } from './seenStore';
export { SystemBrowser } from './browser';
export type { UrlOpener } from './browser';

// Collaborators the store's thunks reach through their extra argument
export interface AppServices {
  papers: SearchGateway;
  browser: UrlOpener;
  settings: Pick<Settings, 'htmlMirror'>;
}

export function createServices(settings: Settings): AppServices & { seen: SeenPersistence } {
  const apiClient = new ApiClient({ baseURL: settings.apiUrl, timeout: settings.requestTimeoutMs });
  return {
    papers: new PapersService(apiClient),
    browser: new SystemBrowser(),
    seen: new SeenStore(settings.seenFilePath),
    settings,
  };
}
