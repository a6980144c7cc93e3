export { fetchHtml, launchBrowser, launchArgs, parseProxy, withBrowser, withPage } from "./browser.js";
export { findChromeExecutable, chromeCandidates } from "./chrome.js";
export type {
  AnchorSnapshot,
  BrowserOptions,
  BrowserSession,
  NavigationResult,
  SessionPage,
  SessionRunner,
  StructuredHtmlResult,
} from "./types.js";
