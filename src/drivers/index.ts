export { adaptPage, contextDriverFactory, createPlaywrightDriver, playwrightDriverFactory } from "./playwright";
export type {
  BrowserContextSurface,
  BrowserSurface,
  LocatorSurface,
  PageSurface,
  PlaywrightDriverOptions,
} from "./playwright";
export type { DriverAdapter, DriverFactory } from "./types";
