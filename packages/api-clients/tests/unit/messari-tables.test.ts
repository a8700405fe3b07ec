/**
 * Tests for messari-tables.ts
 *
 * The shapers are pure: each test hands a validated sub-tree in and checks the
 * exact columns and cells that come out.
 */

import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import {
  formatAddresses,
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
} from '../../src/messari-tables';
import type { Cell } from '../../src/table';

function isoDate(cell: Cell | undefined): string | null {
  return DateTime.isDateTime(cell) ? cell.toISODate() : null;
}

describe('messari-tables', () => {
  describe('shapeAvailableTimeseries', () => {
    it('builds the catalogue indexed by metric id', () => {
      const table = shapeAvailableTimeseries([
        {
          metric_id: 'price',
          name: 'Price',
          description: 'Volume weighted price',
          source_attribution: [{ name: 'Kaiko' }, { name: 'Coinbase' }],
        },
        {
          metric_id: 'mcap.dom',
          name: 'Marketcap Dominance',
          description: null,
          role_restriction: 'pro',
          source_attribution: null,
        },
      ]);

      expect(table.index).toBe('id');
      expect(table.columns).toEqual(['id', 'Title', 'Description', 'Requires Paid Key', 'Sources']);
      expect(table.rows).toEqual([
        {
          id: 'price',
          Title: 'Price',
          Description: 'Volume weighted price',
          'Requires Paid Key': false,
          Sources: 'Kaiko,Coinbase',
        },
        {
          id: 'mcap.dom',
          Title: 'Marketcap Dominance',
          Description: '-',
          'Requires Paid Key': true,
          Sources: '',
        },
      ]);
    });

    it('marks a metric as paid even when the restriction is null', () => {
      const table = shapeAvailableTimeseries([{ metric_id: 'sply.circ', role_restriction: null }]);

      expect(table.rows[0]?.['Requires Paid Key']).toBe(true);
    });
  });

  describe('shapeTimeseries', () => {
    it('pairs values with columns and indexes on the UTC timestamp', () => {
      const table = shapeTimeseries(
        ['timestamp', 'value'],
        [
          [1622505600000, 42.5],
          [1622592000000, null],
        ]
      );

      expect(table.index).toBe('timestamp');
      expect(table.columns).toEqual(['timestamp', 'value']);
      expect(table.rows.map((row) => isoDate(row['timestamp']))).toEqual(['2021-06-01', '2021-06-02']);
      expect(table.rows.map((row) => row['value'])).toEqual([42.5, null]);
    });

    it('returns an empty table without an index when there are no points', () => {
      expect(shapeTimeseries(['timestamp', 'value'], [])).toEqual({
        columns: ['timestamp', 'value'],
        rows: [],
      });
    });
  });

  describe('shapeLinks', () => {
    it('capitalizes columns and fills gaps', () => {
      const table = shapeLinks([
        { name: 'Website', link: 'https://bitcoin.org' },
        { name: 'Whitepaper', link: null },
      ]);

      expect(table.columns).toEqual(['Name', 'Link']);
      expect(table.rows).toEqual([
        { Name: 'Website', Link: 'https://bitcoin.org' },
        { Name: 'Whitepaper', Link: '-' },
      ]);
    });
  });

  describe('shapeRoadmap', () => {
    it('parses dates and drops columns with no data', () => {
      const table = shapeRoadmap([
        { title: 'Taproot', date: '2021-11-14T00:00:00Z', type: 'Upgrade', details: null },
      ]);

      expect(table.columns).toEqual(['Title', 'Date', 'Type']);
      expect(table.rows[0]?.['Title']).toBe('Taproot');
      expect(isoDate(table.rows[0]?.['Date'])).toBe('2021-11-14');
    });

    it('fills cells left empty in a column that has other data', () => {
      const table = shapeRoadmap([
        { title: 'Taproot', date: null, type: 'Upgrade' },
        { title: 'Segwit', date: '2017-08-24T00:00:00Z', type: null },
      ]);

      expect(table.rows[0]?.['Date']).toBe('-');
      expect(table.rows[1]?.['Type']).toBe('-');
    });

    it('returns an empty table for no items', () => {
      expect(shapeRoadmap([])).toEqual({ columns: [], rows: [] });
    });
  });

  describe('shapeConsensusAndEmission', () => {
    it('lists the five facts and reads n/a as the placeholder', () => {
      const table = shapeConsensusAndEmission({
        supply: { general_emission_type: 'Fixed Issuance' },
        consensus: {
          general_consensus_mechanism: 'Proof-of-Work',
          consensus_details: 'n/a',
          mining_algorithm: 'SHA-256',
          block_reward: 6.25,
        },
      });

      expect(table.rows).toEqual([
        { Metric: 'Emission Type', Value: 'Fixed Issuance' },
        { Metric: 'Consensus Mechanism', Value: 'Proof-of-Work' },
        { Metric: 'Consensus Details', Value: '-' },
        { Metric: 'Mining Algorithm', Value: 'SHA-256' },
        { Metric: 'Block Reward', Value: 6.25 },
      ]);
    });

    it('fills every value when the section is missing', () => {
      const table = shapeConsensusAndEmission(null);

      expect(table.rows.map((row) => row['Value'])).toEqual(['-', '-', '-', '-', '-']);
    });
  });

  describe('project and product info', () => {
    it('pairs the two write-ups', () => {
      expect(shapeProjectInfo('Peer-to-peer cash', 'UTXO ledger').rows).toEqual([
        { Metric: 'Project Details', Value: 'Peer-to-peer cash' },
        { Metric: 'Technology Details', Value: 'UTXO ledger' },
      ]);
    });

    it('prettifies repository columns', () => {
      const table = shapeRepositories([{ name: 'bitcoin-core', link: 'https://git.example/core', star_count: 7 }]);

      expect(table.columns).toEqual(['Name', 'Link', 'Star Count']);
      expect(table.rows).toEqual([{ Name: 'bitcoin-core', Link: 'https://git.example/core', 'Star Count': 7 }]);
    });

    it('parses the date of security events', () => {
      const table = shapeSecurityEvents([
        { title: 'Value overflow', date: '2010-08-15', type: null, details: 'Patched in 0.3.10' },
      ]);

      expect(table.columns).toEqual(['Title', 'Date', 'Type', 'Details']);
      expect(isoDate(table.rows[0]?.['Date'])).toBe('2010-08-15');
      expect(table.rows[0]?.['Type']).toBe('-');
    });

    it('returns an empty table for no security events', () => {
      expect(shapeSecurityEvents([])).toEqual({ columns: [], rows: [], index: undefined });
    });
  });

  describe('shapeIndividuals', () => {
    it('derives a Name column and drops identity fields', () => {
      const table = shapeIndividuals([
        {
          slug: 'ada-lovelace',
          first_name: 'Ada',
          last_name: 'Lovelace',
          title: 'Founder',
          description: null,
          avatar_url: 'https://img.example/ada.png',
        },
      ]);

      expect(table.columns).toEqual(['Name', 'Title', 'Description']);
      expect(table.rows).toEqual([{ Name: 'Ada Lovelace', Title: 'Founder', Description: '-' }]);
    });

    it('uses the placeholder for a missing name part', () => {
      const table = shapeIndividuals([{ first_name: 'Satoshi', title: 'Creator' }]);

      expect(table.rows).toEqual([{ Name: 'Satoshi -', Title: 'Creator' }]);
    });

    it('returns an empty table for no individuals', () => {
      expect(shapeIndividuals([])).toEqual({ columns: [], rows: [] });
    });
  });

  describe('shapeOrganizations', () => {
    it('drops slug and logo and keeps extra fields', () => {
      const table = shapeOrganizations([
        {
          slug: 'acme',
          name: 'Acme Labs',
          logo: 'https://img.example/acme.png',
          description: 'Core development',
          website: 'https://acme.example',
        },
      ]);

      expect(table.columns).toEqual(['Name', 'Description', 'Website']);
      expect(table.rows).toEqual([
        { Name: 'Acme Labs', Description: 'Core development', Website: 'https://acme.example' },
      ]);
    });
  });

  describe('shapeGovernance', () => {
    it('strips markup from the summary and tabulates on-chain details', () => {
      const result = shapeGovernance({
        governance_details: '<p>Changes follow the <b>BIP</b> process.</p>',
        onchain_governance: { onchain_governance_type: 'None', onchain_governance_details: 'n/a' },
      });

      expect(result.summary).toBe('Changes follow the BIP process.');
      expect(result.details.rows).toEqual([
        { Metric: 'Type', Value: 'None' },
        { Metric: 'Details', Value: 'n/a' },
      ]);
    });

    it('returns an empty details table without on-chain governance', () => {
      const result = shapeGovernance({ governance_details: 'Off-chain', onchain_governance: null });

      expect(result).toEqual({ summary: 'Off-chain', details: { columns: [], rows: [] } });
    });

    it('returns empty values when the section is missing', () => {
      expect(shapeGovernance(undefined)).toEqual({ summary: '', details: { columns: [], rows: [] } });
    });
  });

  describe('shapeSalesRounds', () => {
    it('keeps the priced columns and trims dates', () => {
      const table = shapeSalesRounds([
        {
          title: 'Seed',
          start_date: '2017-07-01T00:00:00Z',
          type: 'Private',
          details: 'Strategic investors',
          end_date: '2017-07-14T00:00:00Z',
          native_tokens_allocated: 1000000,
          asset_collected: 'ETH',
          price_per_token_in_asset: 0.001,
          equivalent_price_per_token_in_usd: 0.25,
          amount_collected_in_asset: 1000,
          amount_collected_in_usd: 250000,
          is_kyc_required: true,
          restricted_jurisdictions: ['US'],
        },
      ]);

      expect(table.columns).toEqual([
        'Title',
        'Start Date',
        'Type',
        'End Date',
        'Tokens Allocated',
        'Price [$]',
        'Amount Collected [$]',
      ]);
      expect(table.rows).toEqual([
        {
          Title: 'Seed',
          'Start Date': '2017-07-01',
          Type: 'Private',
          'End Date': '2017-07-14',
          'Tokens Allocated': 1000000,
          'Price [$]': 0.25,
          'Amount Collected [$]': 250000,
        },
      ]);
    });

    it('fills a missing end date with the placeholder', () => {
      const table = shapeSalesRounds([{ title: 'Public', start_date: '2017-08-01T00:00:00Z', end_date: null }]);

      expect(table.rows).toEqual([{ Title: 'Public', 'Start Date': '2017-08-01', 'End Date': '-' }]);
    });
  });

  describe('shapeTreasuryAccounts', () => {
    it('formats addresses and drops holding details', () => {
      const table = shapeTreasuryAccounts([
        {
          account_type: 'Main',
          addresses: [
            { name: 'Main', link: 'https://explorer/a' },
            { name: 'Cold', link: 'https://explorer/b' },
          ],
          asset_held: 'BTC',
          security: 'Multisig',
        },
      ]);

      expect(table.columns).toEqual(['Account Type', 'Addresses']);
      expect(table.rows).toEqual([
        { 'Account Type': 'Main', Addresses: 'Main: https://explorer/aCold: https://explorer/b' },
      ]);
    });

    it('fills accounts without addresses', () => {
      const table = shapeTreasuryAccounts([{ account_type: 'Hot', addresses: null }]);

      expect(table.rows).toEqual([{ 'Account Type': 'Hot', Addresses: '-' }]);
    });
  });

  describe('formatAddresses', () => {
    it('uses the placeholder for a missing name or link', () => {
      expect(formatAddresses([{ name: null, link: 'https://explorer/c' }, { name: 'Vault' }])).toBe(
        '-: https://explorer/cVault: -'
      );
    });
  });

  describe('shapeLaunchDistribution', () => {
    it('lists the genesis facts with a compact supply', () => {
      const table = shapeLaunchDistribution({
        general: { launch_style: 'Fair Launch', launch_details: 'Mined from genesis' },
        initial_distribution: {
          initial_supply: 21000000,
          genesis_block_date: '2009-01-03T18:15:05Z',
          initial_supply_repartition: {
            allocated_to_investors_percentage: 0,
            allocated_to_organization_or_founders_percentage: 0,
            allocated_to_premined_rewards_or_airdrops_percentage: null,
          },
        },
      });

      expect(table.rows).toEqual([
        { Metric: 'Genesis Date', Value: '2009-01-03' },
        { Metric: 'Type', Value: 'Fair Launch' },
        { Metric: 'Total Supply', Value: '21 M' },
        { Metric: 'Investors [%]', Value: 0 },
        { Metric: 'Organization/Founders [%]', Value: 0 },
        { Metric: 'Rewards/Airdrops [%]', Value: '-' },
      ]);
    });

    it('fills every value when the launch section is missing', () => {
      const table = shapeLaunchDistribution(undefined);

      expect(table.rows.map((row) => row['Value'])).toEqual(['-', '-', '-', '-', '-', '-']);
    });
  });
});
