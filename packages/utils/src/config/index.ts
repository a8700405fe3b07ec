/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for the data providers.
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../errors';

loadDotenv();

export const DEFAULT_MESSARI_BASE_URL = 'https://data.messari.io/api';
export const DEFAULT_COINGECKO_BASE_URL = 'https://api.coingecko.com/api/v3';

export interface MessariConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface CoinGeckoConfig {
  baseUrl: string;
  timeoutMs: number;
}

function parseTimeout(raw: string | undefined, key: string, fallback: number): number {
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer`, key, { value: raw });
  }
  return value;
}

/**
 * Load Messari API configuration. An explicit key takes the place of MESSARI_API_KEY.
 */
export function getMessariConfig(apiKey?: string): MessariConfig {
  const { MESSARI_BASE_URL, MESSARI_TIMEOUT_MS } = process.env;
  const key = apiKey ?? process.env.MESSARI_API_KEY;

  if (!key) {
    throw new ConfigurationError(
      'MESSARI_API_KEY environment variable is required',
      'MESSARI_API_KEY'
    );
  }

  return {
    apiKey: key,
    baseUrl: MESSARI_BASE_URL || DEFAULT_MESSARI_BASE_URL,
    timeoutMs: parseTimeout(MESSARI_TIMEOUT_MS, 'MESSARI_TIMEOUT_MS', 30_000),
  };
}

/**
 * Load CoinGecko API configuration (public endpoints, no key)
 */
export function getCoinGeckoConfig(): CoinGeckoConfig {
  const { COINGECKO_BASE_URL, COINGECKO_TIMEOUT_MS } = process.env;

  return {
    baseUrl: COINGECKO_BASE_URL || DEFAULT_COINGECKO_BASE_URL,
    timeoutMs: parseTimeout(COINGECKO_TIMEOUT_MS, 'COINGECKO_TIMEOUT_MS', 10_000),
  };
}
