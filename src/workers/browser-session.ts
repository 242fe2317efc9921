import puppeteer from 'puppeteer-core';
import { createLogger } from '../utils/logger.js';
import type { WaitUntil } from './channel-config.js';

const log = createLogger('Browser');

export interface PageHandle {
  setUserAgent(userAgent: string): Promise<void>;
  goto(url: string, options: { timeout: number; waitUntil: WaitUntil }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserHandle {
  newPage(): Promise<PageHandle>;
  close(): Promise<void>;
}

export interface LaunchSettings {
  executablePath?: string;
  headless: boolean;
}

export type BrowserLauncher = (settings: LaunchSettings) => Promise<BrowserHandle>;

export const launchChromium: BrowserLauncher = async settings => {
  if (!settings.executablePath) {
    throw new Error('BROWSER_EXECUTABLE_PATH must be set to use browser price sources');
  }
  return puppeteer.launch({
    executablePath: settings.executablePath,
    headless: settings.headless,
    args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
  });
};

export class BrowserSession {
  private browser: BrowserHandle;
  readonly userAgent: string;

  constructor(browser: BrowserHandle, userAgent: string) {
    this.browser = browser;
    this.userAgent = userAgent;
  }

  async newPage(): Promise<PageHandle> {
    const page = await this.browser.newPage();
    try {
      await page.setUserAgent(this.userAgent);
    } catch (error) {
      await page.close().catch((closeError: unknown) => log.warn('Failed to close page:', closeError));
      throw error;
    }
    return page;
  }

  close(): Promise<void> {
    return this.browser.close();
  }
}

/**
 * Browser instances shared by every fetch worker of a cycle, one per user agent and
 * launched on first use. Owned by whoever created it; see {@link withBrowserSessions}.
 */
export class BrowserSessions {
  private launcher: BrowserLauncher;
  private settings: LaunchSettings;
  private sessions = new Map<string, Promise<BrowserSession>>();
  private closed = false;

  constructor(launcher: BrowserLauncher, settings: LaunchSettings) {
    this.launcher = launcher;
    this.settings = settings;
  }

  get(userAgent: string): Promise<BrowserSession> {
    if (this.closed) {
      return Promise.reject(new Error('Browser sessions already released'));
    }
    let session = this.sessions.get(userAgent);
    if (!session) {
      log.debug(`Launching browser for user agent ${userAgent}`);
      session = this.launcher(this.settings).then(browser => new BrowserSession(browser, userAgent));
      this.sessions.set(userAgent, session);
    }
    return session;
  }

  get size(): number {
    return this.sessions.size;
  }

  async close(): Promise<void> {
    this.closed = true;
    const pending = [...this.sessions.values()];
    this.sessions.clear();

    const results = await Promise.allSettled(pending.map(async session => (await session).close()));
    for (const result of results) {
      if (result.status === 'rejected') {
        log.warn('Browser session did not shut down cleanly:', result.reason);
      }
    }
  }
}

export async function withBrowserSessions<T>(
  launcher: BrowserLauncher,
  settings: LaunchSettings,
  fn: (sessions: BrowserSessions) => Promise<T>
): Promise<T> {
  const sessions = new BrowserSessions(launcher, settings);
  try {
    return await fn(sessions);
  } finally {
    await sessions.close();
  }
}
