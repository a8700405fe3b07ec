import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { DEFAULT_COINGECKO_BASE_URL, getCoinGeckoConfig } from '@coinlens/utils';
import { BaseApiClient } from './base-client';
import { emptyTable, fillMissing, metricValueTable, type Table } from './table';

/**
 * Supplies the coin-economics rows appended to the Messari tokenomics table.
 * Keyed by the provider's own coin id, not the Messari asset symbol.
 */
export interface TokenomicsProvider {
  getCoinTokenomics(coinId: string): Promise<Table>;
}

export interface CoinGeckoClientConfig {
  baseURL?: string;
  timeout?: number;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

const supply = z.number().nullish();

export const CoinGeckoCoinSchema = z
  .object({
    id: z.string(),
    block_time_in_minutes: z.number().nullish(),
    market_data: z
      .object({
        total_supply: supply,
        max_supply: supply,
        circulating_supply: supply,
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const COIN_QUERY = {
  localization: 'false',
  tickers: 'false',
  market_data: 'true',
  community_data: 'false',
  developer_data: 'false',
  sparkline: 'false',
} as const;

export class CoinGeckoClient extends BaseApiClient implements TokenomicsProvider {
  constructor(config: CoinGeckoClientConfig = {}) {
    super({
      baseURL: config.baseURL ?? DEFAULT_COINGECKO_BASE_URL,
      apiName: 'CoinGecko',
      timeout: config.timeout ?? 10_000,
      axiosInstance: config.axiosInstance,
    });
  }

  /**
   * Block time and supply figures as Metric/Value rows; an empty table when the coin
   * cannot be fetched.
   */
  async getCoinTokenomics(coinId: string): Promise<Table> {
    if (!coinId) {
      return emptyTable();
    }

    const raw = await this.fetchRaw(`/coins/${encodeURIComponent(coinId)}`, {
      params: { ...COIN_QUERY },
    });
    const payload = this.readPayload(raw, CoinGeckoCoinSchema, { coinId });
    if (!payload.ok) {
      return emptyTable();
    }

    const coin = payload.data;
    const marketData = coin.market_data;

    return fillMissing(
      metricValueTable([
        ['Block time [min]', coin.block_time_in_minutes ?? null],
        ['Total Supply', marketData?.total_supply ?? null],
        ['Max Supply', marketData?.max_supply ?? null],
        ['Circulating Supply', marketData?.circulating_supply ?? null],
      ])
    );
  }
}

/**
 * Build a client from COINGECKO_* environment settings
 */
export function createCoinGeckoClient(overrides: CoinGeckoClientConfig = {}): CoinGeckoClient {
  const config = getCoinGeckoConfig();
  return new CoinGeckoClient({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    ...overrides,
  });
}
