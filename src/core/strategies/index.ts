import type { FetchFn } from '../../utils/http-client.js';
import type { BrowserLauncher } from '../browser-manager.js';
import { PlainRequestStrategy } from './plain-request.js';
import { RotatedRequestStrategy } from './rotated-request.js';
import { RenderedBrowserStrategy } from './rendered-browser.js';
import { HardenedBrowserStrategy } from './hardened-browser.js';
import type { PacingOptions, StrategyRegistry } from './types.js';

export type { FetchStrategy, StrategyRegistry, PacingOptions } from './types.js';
export { PlainRequestStrategy } from './plain-request.js';
export { RotatedRequestStrategy } from './rotated-request.js';
export {
  RenderedBrowserStrategy,
  collectGuideLinks,
  guideLinksToItems,
  isCompanyGuidesUrl,
  type GuideLink,
} from './rendered-browser.js';
export { HardenedBrowserStrategy, HARDENED_SESSION } from './hardened-browser.js';

export interface StrategyDependencies extends PacingOptions {
  launcher: BrowserLauncher;
  fetchFn?: FetchFn;
}

/**
 * Build the four strategies over shared transports
 */
export function createStrategies(deps: StrategyDependencies): StrategyRegistry {
  return {
    plain_request: new PlainRequestStrategy({ fetchFn: deps.fetchFn }),
    rotated_request: new RotatedRequestStrategy({ fetchFn: deps.fetchFn, sleep: deps.sleep, random: deps.random }),
    rendered_browser: new RenderedBrowserStrategy({ launcher: deps.launcher }),
    hardened_browser: new HardenedBrowserStrategy({ launcher: deps.launcher, sleep: deps.sleep, random: deps.random }),
  };
}
