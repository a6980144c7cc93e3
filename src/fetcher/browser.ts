// Headless Chrome through puppeteer-core: one browser per stage, pages opened and closed per task

import puppeteerCore, { type Browser, type HTTPResponse, type Page } from "puppeteer-core";
import { PageLoadError } from "../errors/index.js";
import { errMessage, logger } from "../logger/index.js";
import { findChromeExecutable } from "./chrome.js";
import type {
  AnchorSnapshot,
  BrowserOptions,
  BrowserSession,
  NavigationResult,
  SessionPage,
  StructuredHtmlResult,
} from "./types.js";


const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const READY_STATE_TIMEOUT_MS = 10_000;


/** Split a proxy URL into Chrome's --proxy-server value and optional credentials */
export function parseProxy(proxy: string): { serverUrl: string; username?: string; password?: string } {
  const u = new URL(proxy);
  const serverUrl = u.port ? `${u.protocol}//${u.hostname}:${u.port}` : `${u.protocol}//${u.hostname}`;
  const username = u.username ? decodeURIComponent(u.username) : undefined;
  const password = u.password ? decodeURIComponent(u.password) : undefined;
  return { serverUrl, username, password };
}


/** Chrome flags; credentials never go on the command line, they are sent through page.authenticate */
export function launchArgs(options: Pick<BrowserOptions, "headless" | "proxy">): string[] {
  const base = [
    "--disable-blink-features=AutomationControlled",
    "--no-sandbox",
    "--disable-setuid-sandbox",
    "--disable-dev-shm-usage",
    "--disable-infobars",
    "--disable-gpu",
  ];
  // a tall headless window lets lazy feeds render more cards per scroll
  const height = options.headless ? 5000 : 960;
  base.push(`--window-size=1366,${height}`);
  if (options.proxy) {
    base.push(`--proxy-server=${parseProxy(options.proxy).serverUrl}`);
  }
  return base;
}


// hide the usual automation fingerprints
async function stealthPage(page: Page): Promise<void> {
  await page.evaluateOnNewDocument(() => {
    /* global navigator, window */
    Object.defineProperty(navigator, "webdriver", { get: () => false });
    Object.defineProperty(navigator, "plugins", { get: () => [1, 2, 3, 4, 5] });
    Object.defineProperty(navigator, "languages", { get: () => ["en-US", "en"] });
    Object.defineProperty(window, "chrome", { value: { runtime: {} }, configurable: true });
  });
  await page.setExtraHTTPHeaders({
    "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9",
    "Cache-Control": "max-age=0",
    "Sec-Ch-Ua": '"Google Chrome";v="131", "Chromium";v="131", "Not_A Brand";v="24"',
    "Sec-Ch-Ua-Mobile": "?0",
    "Sec-Ch-Ua-Platform": '"macOS"',
    "Upgrade-Insecure-Requests": "1",
  });
}


/** UA, viewport, stealth and proxy credentials for a fresh page */
async function setupPage(page: Page, options: BrowserOptions): Promise<void> {
  await page.setUserAgent(USER_AGENT);
  await page.setViewport({ width: 1366, height: options.headless ? 5000 : 960 });
  await stealthPage(page);
  page.setDefaultNavigationTimeout(options.navigationTimeoutMs);
  if (options.proxy) {
    const { username, password } = parseProxy(options.proxy);
    if (username !== undefined || password !== undefined) {
      await page.authenticate({ username: username ?? "", password: password ?? "" });
    }
  }
}


function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}


class PuppeteerPage implements SessionPage {
  constructor(
    private readonly page: Page,
    private readonly options: BrowserOptions
  ) {}

  async goto(url: string): Promise<NavigationResult> {
    let response: HTTPResponse | null;
    try {
      response = await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.options.navigationTimeoutMs });
    } catch (err) {
      throw new PageLoadError(url, `navigation failed: ${errMessage(err)}`);
    }
    const status = response?.status() ?? 0;
    if (status >= 400) {
      throw new PageLoadError(url, `HTTP ${status} ${response?.statusText() ?? ""}`.trim(), status);
    }
    try {
      await this.page.waitForFunction(() => document.readyState === "complete", { timeout: READY_STATE_TIMEOUT_MS });
    } catch (err) {
      // still usable with whatever has rendered so far
      logger.debug("browser", "readyState wait timed out", { item_url: url, err: errMessage(err) });
    }
    await sleep(this.options.settleMs);
    return {
      finalUrl: response?.url() ?? this.page.url(),
      status,
      statusText: response?.statusText() ?? "",
    };
  }

  url(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async scrollBy(viewportFraction: number): Promise<void> {
    await this.page.evaluate((fraction: number) => {
      window.scrollBy({ top: window.innerHeight * fraction, behavior: "smooth" });
    }, viewportFraction);
  }

  anchors(): Promise<AnchorSnapshot[]> {
    return this.page.evaluate(() =>
      Array.from(document.querySelectorAll("a")).map((a) => {
        const card = a.closest("article") ?? a.parentElement;
        const context = (card?.textContent ?? "").replace(/\s+/g, " ").trim().slice(0, 500);
        return { href: a.href, context };
      })
    );
  }

  wait(ms: number): Promise<void> {
    return sleep(ms);
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) await this.page.close();
  }
}


class PuppeteerSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly options: BrowserOptions
  ) {}

  async newPage(): Promise<SessionPage> {
    const page = await this.browser.newPage();
    try {
      await setupPage(page, this.options);
    } catch (err) {
      await page.close();
      throw err;
    }
    return new PuppeteerPage(page, this.options);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}


/** Launch Chrome; throws when no executable is available */
export async function launchBrowser(options: BrowserOptions): Promise<BrowserSession> {
  const executablePath = options.chromePath ?? findChromeExecutable();
  if (!executablePath) {
    throw new Error("no Chrome executable found; install Google Chrome or set CHROME_PATH");
  }
  logger.info("browser", "launching Chrome", { headless: options.headless, executablePath });
  const browser = await puppeteerCore.launch({
    headless: options.headless,
    args: launchArgs(options),
    executablePath,
    ignoreDefaultArgs: ["--enable-automation"],
  });
  return new PuppeteerSession(browser, options);
}


/** Scoped browser: closed on both the success and the failure path */
export async function withBrowser<T>(options: BrowserOptions, fn: (session: BrowserSession) => Promise<T>): Promise<T> {
  const session = await launchBrowser(options);
  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
    } catch (err) {
      logger.warn("browser", "closing Chrome failed", { err: errMessage(err) });
    }
  }
}


/** Scoped page inside a session */
export async function withPage<T>(session: BrowserSession, fn: (page: SessionPage) => Promise<T>): Promise<T> {
  const page = await session.newPage();
  try {
    return await fn(page);
  } finally {
    try {
      await page.close();
    } catch (err) {
      logger.warn("browser", "closing page failed", { err: errMessage(err) });
    }
  }
}


/** Open url in a fresh page and return the rendered HTML */
export async function fetchHtml(session: BrowserSession, url: string): Promise<StructuredHtmlResult> {
  return withPage(session, async (page) => {
    const nav = await page.goto(url);
    const body = await page.content();
    return { ...nav, body };
  });
}
