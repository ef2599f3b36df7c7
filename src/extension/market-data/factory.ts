/**
 * Market Data Provider Factory
 *
 * Instantiate the market data provider selected in config
 */

import type { IMarketDataProvider } from './interfaces.js';
import type { Config } from '../../core/config.js';
import type { Logger } from '../../core/logger.js';
import { YahooFinanceProvider } from './providers/yahoo/index.js';

export function createMarketDataProvider(config: Config, logger: Logger): IMarketDataProvider {
  const providerConfig = config.marketData.provider;

  switch (providerConfig.type) {
    case 'yahoo':
      return new YahooFinanceProvider({ logger: logger.child({ component: 'yahoo' }) });

    default:
      throw new Error(`Unknown market data provider: ${(providerConfig as { type: string }).type}`);
  }
}
