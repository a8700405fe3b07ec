/**
 * @coinlens/api-clients - API Client Package
 *
 * Public API exports for API clients
 */

export * from './base-client';
export * from './response';
export * from './table';
export * from './messari-schemas';
export * from './messari-tables';
export * from './messari-client';
export * from './coingecko-client';
