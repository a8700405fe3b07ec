/**
 * Messari payload -> table shaping
 * ================================
 * Pure functions, one per resource. Each takes the validated sub-tree and returns
 * tables whose missing cells hold the placeholder.
 */

import {
  capitalize,
  formatLargeNumber,
  prettifyColumnName,
  replaceUnderscores,
  stripTags,
} from '@coinlens/utils';
import {
  PLACEHOLDER,
  dropColumns,
  dropEmptyColumns,
  emptyTable,
  fillMissing,
  fromRecords,
  insertColumn,
  isEmptyTable,
  mapColumn,
  metricValueTable,
  renameColumns,
  setIndex,
  toCell,
  toDateTime,
  type Cell,
  type Row,
  type Table,
} from './table';
import type {
  ConsensusAndEmission,
  Governance,
  Individual,
  Launch,
  Link,
  MetricDescriptor,
  Organization,
  RoadmapItem,
  SalesRound,
  SecurityEvent,
  TreasuryAccount,
  TreasuryAddress,
} from './messari-schemas';

const INDIVIDUAL_DROPPED_COLUMNS = ['slug', 'avatar_url', 'first_name', 'last_name'] as const;
const ORGANIZATION_DROPPED_COLUMNS = ['slug', 'logo'] as const;

const SALES_ROUND_DROPPED_COLUMNS = [
  'details',
  'asset_collected',
  'price_per_token_in_asset',
  'amount_collected_in_asset',
  'is_kyc_required',
  'restricted_jurisdictions',
] as const;

const SALES_ROUND_RENAMES: Readonly<Record<string, string>> = {
  'Native Tokens Allocated': 'Tokens Allocated',
  'Equivalent Price Per Token In Usd': 'Price [$]',
  'Amount Collected In Usd': 'Amount Collected [$]',
};

const TREASURY_DROPPED_COLUMNS = ['Asset Held', 'Security'] as const;

export interface GovernanceTables {
  summary: string;
  details: Table;
}

export function shapeAvailableTimeseries(metrics: readonly MetricDescriptor[]): Table {
  const table = fromRecords(
    metrics.map((metric) => ({
      id: metric.metric_id,
      Title: metric.name,
      Description: metric.description,
      'Requires Paid Key': 'role_restriction' in metric,
      Sources: (metric.source_attribution ?? []).map((source) => source.name).join(','),
    }))
  );
  return setIndex(fillMissing(table), 'id');
}

/**
 * Rows are positional against `columns`. A `timestamp` column holds epoch
 * milliseconds and becomes the UTC DateTime index.
 */
export function shapeTimeseries(
  columns: readonly string[],
  values: ReadonlyArray<ReadonlyArray<number | string | null>>
): Table {
  const rows = values.map((point) => {
    const row: Row = {};
    columns.forEach((column, position) => {
      row[column] = toCell(point[position]);
    });
    return row;
  });

  const table: Table = { columns: [...columns], rows };
  if (isEmptyTable(table)) return table;

  return setIndex(mapColumn(table, 'timestamp', toDateTime), 'timestamp');
}

export function shapeLinks(links: readonly Link[]): Table {
  return fillMissing(renameColumns(fromRecords(links), capitalize));
}

export function shapeRoadmap(items: readonly RoadmapItem[]): Table {
  if (items.length === 0) return emptyTable();

  let table = mapColumn(fromRecords(items), 'date', toDateTime);
  table = renameColumns(table, capitalize);
  table = dropEmptyColumns(table);
  return fillMissing(table);
}

/**
 * Consensus and emission facts as Metric/Value rows. "n/a" inside a value reads as the placeholder.
 */
export function shapeConsensusAndEmission(data: ConsensusAndEmission | null | undefined): Table {
  const consensus = data?.consensus;
  const table = metricValueTable([
    ['Emission Type', notApplicable(data?.supply?.general_emission_type)],
    ['Consensus Mechanism', notApplicable(consensus?.general_consensus_mechanism)],
    ['Consensus Details', notApplicable(consensus?.consensus_details)],
    ['Mining Algorithm', notApplicable(consensus?.mining_algorithm)],
    ['Block Reward', notApplicable(consensus?.block_reward)],
  ]);
  return fillMissing(table);
}

export function shapeProjectInfo(projectDetails: string, technologyDetails: string): Table {
  return metricValueTable([
    ['Project Details', projectDetails],
    ['Technology Details', technologyDetails],
  ]);
}

export function shapeRepositories(repositories: readonly Link[]): Table {
  return fillMissing(renameColumns(fromRecords(repositories), prettifyColumnName));
}

/**
 * Audits and known exploits share a layout; `Date` is parsed when there are rows
 */
export function shapeSecurityEvents(events: readonly SecurityEvent[]): Table {
  const table = renameColumns(fromRecords(events), prettifyColumnName);
  if (isEmptyTable(table)) return table;
  return fillMissing(mapColumn(table, 'Date', toDateTime));
}

export function shapeIndividuals(individuals: readonly Individual[]): Table {
  if (individuals.length === 0) return emptyTable();

  let table = fillMissing(fromRecords(individuals));
  table = insertColumn(table, 0, 'Name', (row) =>
    [row['first_name'] ?? PLACEHOLDER, row['last_name'] ?? PLACEHOLDER].map(cellText).join(' ')
  );
  table = dropColumns(table, INDIVIDUAL_DROPPED_COLUMNS);
  table = renameColumns(table, capitalize);
  return fillMissing(table);
}

export function shapeOrganizations(organizations: readonly Organization[]): Table {
  if (organizations.length === 0) return emptyTable();

  let table = dropColumns(fromRecords(organizations), ORGANIZATION_DROPPED_COLUMNS);
  table = renameColumns(table, capitalize);
  return fillMissing(table);
}

export function shapeGovernance(governance: Governance | null | undefined): GovernanceTables {
  const summary = stripTags(governance?.governance_details ?? '');
  const type = governance?.onchain_governance?.onchain_governance_type;
  const details = governance?.onchain_governance?.onchain_governance_details;

  if (type !== null && type !== undefined && details !== null && details !== undefined) {
    return {
      summary,
      details: metricValueTable([
        ['Type', type],
        ['Details', details],
      ]),
    };
  }
  return { summary, details: emptyTable() };
}

export function shapeSalesRounds(rounds: readonly SalesRound[]): Table {
  if (rounds.length === 0) return emptyTable();

  let table = fillMissing(fromRecords(rounds));
  table = dropColumns(table, SALES_ROUND_DROPPED_COLUMNS);
  table = renameColumns(table, replaceUnderscores);
  table = mapColumn(table, 'Start Date', datePart);
  table = mapColumn(table, 'End Date', datePart);
  table = renameColumns(table, SALES_ROUND_RENAMES);
  return fillMissing(table);
}

export function shapeTreasuryAccounts(accounts: readonly TreasuryAccount[]): Table {
  if (accounts.length === 0) return emptyTable();

  const records = accounts.map((account) => ({
    ...account,
    addresses: account.addresses ? formatAddresses(account.addresses) : null,
  }));

  let table = renameColumns(fromRecords(records), replaceUnderscores);
  table = dropColumns(table, TREASURY_DROPPED_COLUMNS);
  return fillMissing(table);
}

export function shapeLaunchDistribution(launch: Launch | null | undefined): Table {
  const distribution = launch?.initial_distribution;
  const repartition = distribution?.initial_supply_repartition;
  const genesis = distribution?.genesis_block_date;

  const table = metricValueTable([
    ['Genesis Date', genesis ? genesis.split('T')[0] : PLACEHOLDER],
    ['Type', launch?.general?.launch_style ?? null],
    ['Total Supply', formatLargeNumber(distribution?.initial_supply)],
    ['Investors [%]', repartition?.allocated_to_investors_percentage ?? null],
    [
      'Organization/Founders [%]',
      repartition?.allocated_to_organization_or_founders_percentage ?? null,
    ],
    [
      'Rewards/Airdrops [%]',
      repartition?.allocated_to_premined_rewards_or_airdrops_percentage ?? null,
    ],
  ]);
  return fillMissing(table);
}

/**
 * "Name: link" per address, concatenated without a separator
 */
export function formatAddresses(addresses: readonly TreasuryAddress[]): string {
  return addresses
    .map((address) => `${address.name ?? PLACEHOLDER}: ${address.link ?? PLACEHOLDER}`)
    .join('');
}

function datePart(value: Cell): Cell {
  return typeof value === 'string' ? value.split('T')[0] : value;
}

function notApplicable(value: string | number | boolean | null | undefined): Cell {
  if (typeof value === 'string') return value.replace(/n\/a/g, PLACEHOLDER);
  return value ?? null;
}

function cellText(value: Cell): string {
  return value === null ? PLACEHOLDER : String(value);
}
