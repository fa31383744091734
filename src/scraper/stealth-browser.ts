import { chromium } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, BrowserContext, ElementHandle, Page } from 'playwright-core';
import { ElementNotFoundError, errorMessage } from '../errors';
import { logger } from '../logger';
import { toCssSelector } from './selector-chain';
import type { BrowserSession, LookupStrategy, PageElement, StealthProfile } from './types';

/**
 * Shared stealth-enabled Chromium instance.
 * The stealth plugin is applied exactly ONCE here.
 */
chromium.use(StealthPlugin());

type Handle = ElementHandle<SVGElement | HTMLElement>;

class PlaywrightElement implements PageElement {
  constructor(private readonly handle: Handle) {}

  async find(by: LookupStrategy, selector: string): Promise<PageElement> {
    const child = await this.handle.$(toCssSelector(by, selector));
    if (!child) throw new ElementNotFoundError(selector);
    return new PlaywrightElement(child);
  }

  async text(): Promise<string | null> {
    return this.handle.innerText();
  }

  async attribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async fill(value: string): Promise<void> {
    await this.handle.fill(value);
  }

  async press(key: string): Promise<void> {
    await this.handle.press(key);
  }

  async click(): Promise<void> {
    await this.handle.click();
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly navigationTimeoutMs: number,
  ) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.navigationTimeoutMs,
    });
  }

  async findAll(by: LookupStrategy, selector: string): Promise<PageElement[]> {
    const handles = await this.page.$$(toCssSelector(by, selector));
    return handles.map((handle) => new PlaywrightElement(handle));
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  async screenshot(): Promise<Buffer | null> {
    return this.page.screenshot({ fullPage: true });
  }

  /**
   * Closes the context and the Chromium process.
   */
  async close(): Promise<void> {
    try {
      await this.context.close();
    } catch (error) {
      logger.warn('Error closing browser context', { error: errorMessage(error) });
    }
    try {
      await this.browser.close();
      logger.info('Browser closed');
    } catch (error) {
      logger.error('Error closing browser', { error: errorMessage(error) });
    }
  }
}

/**
 * Launches stealth Chromium and opens one page with the profile's
 * user agent, viewport, locale and navigator overrides installed.
 */
export async function launchStealthSession(profile: StealthProfile): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: profile.headless,
    args: profile.args,
    ignoreDefaultArgs: ['--enable-automation'],
  });

  try {
    const context = await browser.newContext({
      viewport: profile.viewport,
      userAgent: profile.userAgent,
      locale: profile.locale,
      extraHTTPHeaders: { 'Accept-Language': profile.languages.join(',') },
    });

    // Runs in the page before any site script
    await context.addInitScript(
      ({ languages, pluginCount }: { languages: string[]; pluginCount: number }) => {
        Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
        Object.defineProperty(navigator, 'plugins', {
          get: () => Array.from({ length: pluginCount }, (_, i) => i + 1),
        });
        Object.defineProperty(navigator, 'languages', { get: () => languages });
      },
      { languages: profile.languages, pluginCount: profile.pluginCount },
    );

    const page = await context.newPage();
    return new PlaywrightSession(browser, context, page, profile.navigationTimeoutMs);
  } catch (error) {
    await browser.close();
    throw error;
  }
}
