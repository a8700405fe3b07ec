/**
 * Messari Client
 * ==============
 * One GET per call against the Messari v1 metrics and v2 profile endpoints,
 * reshaped into tables.
 *
 * Calls never throw for HTTP failures: the tables come back empty, the failure is
 * returned alongside them and logged once as a warning. Transport errors propagate.
 */

import type { AxiosInstance } from 'axios';
import type { z } from 'zod';
import { DEFAULT_MESSARI_BASE_URL, ValidationError, getMessariConfig } from '@coinlens/utils';
import { BaseApiClient } from './base-client';
import { logger } from './logger';
import { createCoinGeckoClient, type TokenomicsProvider } from './coingecko-client';
import {
  AvailableTimeseriesResponseSchema,
  FundraisingResponseSchema,
  GovernanceResponseSchema,
  InvestorsResponseSchema,
  LinksResponseSchema,
  ProductInfoResponseSchema,
  RoadmapResponseSchema,
  TeamResponseSchema,
  TimeseriesResponseSchema,
  TokenomicsResponseSchema,
} from './messari-schemas';
import {
  shapeAvailableTimeseries,
  shapeConsensusAndEmission,
  shapeGovernance,
  shapeIndividuals,
  shapeLaunchDistribution,
  shapeLinks,
  shapeOrganizations,
  shapeProjectInfo,
  shapeRepositories,
  shapeRoadmap,
  shapeSalesRounds,
  shapeSecurityEvents,
  shapeTimeseries,
  shapeTreasuryAccounts,
} from './messari-tables';
import type { PayloadResult, ResponseFailure } from './response';
import { concatTables, emptyTable, fillMissing, isEmptyTable, type Table } from './table';

export const MESSARI_API_KEY_HEADER = 'x-messari-api-key';

export const TIMESERIES_INTERVALS = ['5m', '15m', '30m', '1h', '1d', '1w'] as const;
export type TimeseriesInterval = (typeof TIMESERIES_INTERVALS)[number];

export const MARKETCAP_DOMINANCE_METRIC = 'mcap.dom';
export const CIRCULATING_SUPPLY_METRIC = 'sply.circ';

export type MessariFailure = ResponseFailure;

export interface MessariClientConfig {
  apiKey: string;
  baseURL?: string;
  timeout?: number;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
  /** Source of the coin-economics rows appended to tokenomics */
  tokenomicsProvider?: TokenomicsProvider;
}

interface Outcome {
  failure: MessariFailure | null;
}

export interface AvailableTimeseriesResult extends Outcome {
  timeseries: Table;
}

export interface TimeseriesResult extends Outcome {
  timeseries: Table;
  title: string;
}

export interface MarketcapDominanceResult extends Outcome {
  dominance: Table;
}

export interface LinksResult extends Outcome {
  links: Table;
}

export interface RoadmapResult extends Outcome {
  roadmap: Table;
}

export interface TokenomicsResult extends Outcome {
  tokenomics: Table;
  circulatingSupply: Table;
}

export interface ProjectProductInfoResult extends Outcome {
  projectDetails: string;
  technologyDetails: string;
  info: Table;
  repositories: Table;
  audits: Table;
  vulnerabilities: Table;
}

export interface ContributorsResult extends Outcome {
  individuals: Table;
  organizations: Table;
}

export interface GovernanceResult extends Outcome {
  summary: string;
  details: Table;
}

export interface FundraisingResult extends Outcome {
  summary: string;
  launchType: string;
  rounds: Table;
  accounts: Table;
  distribution: Table;
}

export class MessariClient extends BaseApiClient {
  private readonly apiKey: string;
  private readonly tokenomicsProvider: TokenomicsProvider;

  constructor(config: MessariClientConfig) {
    super({
      baseURL: config.baseURL ?? DEFAULT_MESSARI_BASE_URL,
      apiName: 'Messari',
      timeout: config.timeout ?? 30_000,
      axiosInstance: config.axiosInstance,
    });

    this.apiKey = config.apiKey;
    this.tokenomicsProvider = config.tokenomicsProvider ?? createCoinGeckoClient();
  }

  /**
   * Catalogue of every metric id, indexed by id
   */
  async getAvailableTimeseries(): Promise<AvailableTimeseriesResult> {
    const raw = await this.fetchRaw('/v1/assets/metrics', { headers: this.authHeaders() });
    const payload = this.readPayload(raw, AvailableTimeseriesResponseSchema, {
      resource: 'metrics',
    });
    if (!payload.ok) {
      return { timeseries: emptyTable(), failure: payload.failure };
    }

    return { timeseries: shapeAvailableTimeseries(payload.data.data.metrics), failure: null };
  }

  /**
   * One metric over a date range, indexed by UTC timestamp.
   *
   * @param start - inclusive start date such as "2021-10-01"; empty for unbounded
   * @param end - inclusive end date; empty for unbounded
   */
  async getTimeseries(
    symbol: string,
    timeseriesId: string,
    interval: TimeseriesInterval,
    start: string,
    end: string
  ): Promise<TimeseriesResult> {
    const raw = await this.fetchRaw(
      `/v1/assets/${assetSegment(symbol)}/metrics/${encodeURIComponent(timeseriesId)}/time-series`,
      {
        params: { start, end, interval },
        headers: this.authHeaders(),
      }
    );
    const payload = this.readPayload(raw, TimeseriesResponseSchema, {
      symbol,
      resource: timeseriesId,
    });
    if (!payload.ok) {
      return { timeseries: emptyTable(), title: '', failure: payload.failure };
    }

    const { data } = payload.data;
    const timeseries = shapeTimeseries(data.parameters.columns, data.values ?? []);
    if (isEmptyTable(timeseries)) {
      logger.info(`No data found for ${symbol}.`, { symbol, resource: timeseriesId });
    }

    return { timeseries, title: data.schema?.name ?? '', failure: null };
  }

  async getMarketcapDominance(
    symbol: string,
    interval: TimeseriesInterval,
    start: string,
    end: string
  ): Promise<MarketcapDominanceResult> {
    const { timeseries, failure } = await this.getTimeseries(
      symbol,
      MARKETCAP_DOMINANCE_METRIC,
      interval,
      start,
      end
    );
    return { dominance: timeseries, failure };
  }

  async getLinks(symbol: string): Promise<LinksResult> {
    const payload = await this.fetchProfile(
      symbol,
      'profile/general/overview/official_links',
      LinksResponseSchema
    );
    if (!payload.ok) {
      return { links: emptyTable(), failure: payload.failure };
    }

    const links = payload.data.data.profile.general?.overview?.official_links ?? [];
    return { links: shapeLinks(links), failure: null };
  }

  async getRoadmap(symbol: string): Promise<RoadmapResult> {
    const payload = await this.fetchProfile(symbol, 'profile/general/roadmap', RoadmapResponseSchema);
    if (!payload.ok) {
      return { roadmap: emptyTable(), failure: payload.failure };
    }

    const items = payload.data.data.profile.general?.roadmap ?? [];
    return { roadmap: shapeRoadmap(items), failure: null };
  }

  /**
   * Consensus and emission facts plus the provider's coin economics, then the
   * daily circulating supply over the asset's whole history.
   *
   * The profile request is sent with an empty API key. A failed supply request
   * keeps the tokenomics table and reports its failure.
   */
  async getTokenomics(symbol: string, coingeckoId: string): Promise<TokenomicsResult> {
    const payload = await this.fetchProfile(
      symbol,
      'profile/economics/consensus_and_emission',
      TokenomicsResponseSchema,
      ''
    );
    if (!payload.ok) {
      return { tokenomics: emptyTable(), circulatingSupply: emptyTable(), failure: payload.failure };
    }

    const consensusAndEmission = payload.data.data.profile.economics?.consensus_and_emission;
    const providerTable = await this.tokenomicsProvider.getCoinTokenomics(coingeckoId);
    const tokenomics = fillMissing(
      concatTables(shapeConsensusAndEmission(consensusAndEmission), providerTable)
    );

    const circulating = await this.getTimeseries(symbol, CIRCULATING_SUPPLY_METRIC, '1d', '', '');

    return {
      tokenomics,
      circulatingSupply: circulating.timeseries,
      failure: circulating.failure,
    };
  }

  /**
   * Project and technology write-ups with repositories, audits and known exploits.
   *
   * Sent with an empty API key.
   */
  async getProjectProductInfo(symbol: string): Promise<ProjectProductInfoResult> {
    const payload = await this.fetchProfile(
      symbol,
      'profile/general/overview/project_details,profile/technology',
      ProductInfoResponseSchema,
      ''
    );
    if (!payload.ok) {
      return {
        projectDetails: '',
        technologyDetails: '',
        info: emptyTable(),
        repositories: emptyTable(),
        audits: emptyTable(),
        vulnerabilities: emptyTable(),
        failure: payload.failure,
      };
    }

    const { profile } = payload.data.data;
    const technology = profile.technology;
    const projectDetails = profile.general?.overview?.project_details ?? '';
    const technologyDetails = technology?.overview?.technology_details ?? '';

    return {
      projectDetails,
      technologyDetails,
      info: shapeProjectInfo(projectDetails, technologyDetails),
      repositories: shapeRepositories(technology?.overview?.client_repositories ?? []),
      audits: shapeSecurityEvents(technology?.security?.audits ?? []),
      vulnerabilities: shapeSecurityEvents(
        technology?.security?.known_exploits_and_vulnerabilities ?? []
      ),
      failure: null,
    };
  }

  async getTeam(symbol: string): Promise<ContributorsResult> {
    const payload = await this.fetchProfile(symbol, 'profile/contributors', TeamResponseSchema);
    if (!payload.ok) {
      return { individuals: emptyTable(), organizations: emptyTable(), failure: payload.failure };
    }

    const contributors = payload.data.data.profile.contributors;
    return {
      individuals: shapeIndividuals(contributors?.individuals ?? []),
      organizations: shapeOrganizations(contributors?.organizations ?? []),
      failure: null,
    };
  }

  async getInvestors(symbol: string): Promise<ContributorsResult> {
    const payload = await this.fetchProfile(symbol, 'profile/investors', InvestorsResponseSchema);
    if (!payload.ok) {
      return { individuals: emptyTable(), organizations: emptyTable(), failure: payload.failure };
    }

    const investors = payload.data.data.profile.investors;
    return {
      individuals: shapeIndividuals(investors?.individuals ?? []),
      organizations: shapeOrganizations(investors?.organizations ?? []),
      failure: null,
    };
  }

  async getGovernance(symbol: string): Promise<GovernanceResult> {
    const payload = await this.fetchProfile(symbol, 'profile/governance', GovernanceResponseSchema);
    if (!payload.ok) {
      return { summary: '', details: emptyTable(), failure: payload.failure };
    }

    return { ...shapeGovernance(payload.data.data.profile.governance), failure: null };
  }

  async getFundraising(symbol: string): Promise<FundraisingResult> {
    const payload = await this.fetchProfile(
      symbol,
      'profile/economics/launch',
      FundraisingResponseSchema
    );
    if (!payload.ok) {
      return {
        summary: '',
        launchType: '',
        rounds: emptyTable(),
        accounts: emptyTable(),
        distribution: emptyTable(),
        failure: payload.failure,
      };
    }

    const launch = payload.data.data.profile.economics?.launch;
    const fundraising = launch?.fundraising;

    return {
      summary: launch?.general?.launch_details ?? '',
      launchType: launch?.general?.launch_style ?? '',
      rounds: shapeSalesRounds(fundraising?.sales_rounds ?? []),
      accounts: shapeTreasuryAccounts(fundraising?.sales_treasury_accounts ?? []),
      distribution: shapeLaunchDistribution(launch),
      failure: null,
    };
  }

  private authHeaders(apiKey: string = this.apiKey): Record<string, string> {
    return { [MESSARI_API_KEY_HEADER]: apiKey };
  }

  private async fetchProfile<S extends z.ZodTypeAny>(
    symbol: string,
    fields: string,
    schema: S,
    apiKey: string = this.apiKey
  ): Promise<PayloadResult<z.output<S>>> {
    const raw = await this.fetchRaw(`/v2/assets/${assetSegment(symbol)}/profile`, {
      params: { fields },
      headers: this.authHeaders(apiKey),
    });
    return this.readPayload(raw, schema, { symbol, resource: fields });
  }
}

function assetSegment(symbol: string): string {
  const trimmed = symbol.trim();
  if (!trimmed) {
    throw new ValidationError('Asset symbol must not be empty', { symbol });
  }
  return encodeURIComponent(trimmed);
}

/**
 * Build a client from MESSARI_* environment settings. An `apiKey` override
 * makes MESSARI_API_KEY optional.
 */
export function createMessariClient(
  overrides: Partial<MessariClientConfig> = {}
): MessariClient {
  const config = getMessariConfig(overrides.apiKey);
  return new MessariClient({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    ...overrides,
  });
}
