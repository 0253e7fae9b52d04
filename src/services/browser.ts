import open from 'open';
import { createLogger } from '../lib/logger';

const log = createLogger('Browser');

export interface UrlOpener {
  open(url: string): Promise<void>;
}

// Hands URLs to the desktop's default handler without waiting for it to close
export class SystemBrowser implements UrlOpener {
  async open(url: string): Promise<void> {
    const subprocess = await open(url, { wait: false });
    subprocess.once('error', (error) => {
      log.error(`Failed to launch a browser for ${url}`, error);
    });
    log.info(`Opening ${url}`);
  }
}
