/**
 * Messari payload schemas
 * =======================
 * One schema per resource sub-tree. Anything the API may leave out is nullish,
 * so a missing section reads as "no data" instead of failing validation.
 * Records that end up as table rows pass unknown keys through.
 */

import { z } from 'zod';

const text = z.string().nullish();
const scalar = z.union([z.string(), z.number(), z.boolean()]).nullish();
const list = <T extends z.ZodTypeAny>(item: T) => z.array(item).nullish();

function profileResponse<T extends z.ZodTypeAny>(profile: T) {
  return z.object({
    data: z.object({
      profile: profile,
    }),
  });
}

// ---------------------------------------------------------------------------
// v1 metrics
// ---------------------------------------------------------------------------

export const MetricDescriptorSchema = z
  .object({
    metric_id: z.string(),
    name: text,
    description: text,
    // Presence of the key marks a paid metric, whatever its value
    role_restriction: z.unknown().optional(),
    source_attribution: list(z.object({ name: z.string() }).passthrough()),
  })
  .passthrough();

export const AvailableTimeseriesResponseSchema = z.object({
  data: z.object({
    metrics: z.array(MetricDescriptorSchema).default([]),
  }),
});

export const TimeseriesResponseSchema = z.object({
  data: z.object({
    schema: z.object({ name: text }).passthrough().nullish(),
    parameters: z
      .object({
        columns: z.array(z.string()),
      })
      .passthrough(),
    values: list(z.array(z.union([z.number(), z.string(), z.null()]))),
  }),
});

// ---------------------------------------------------------------------------
// v2 profile
// ---------------------------------------------------------------------------

export const LinkSchema = z
  .object({
    name: text,
    link: text,
  })
  .passthrough();

export const RoadmapItemSchema = z
  .object({
    title: text,
    date: text,
    type: text,
    details: text,
  })
  .passthrough();

export const SecurityEventSchema = z
  .object({
    title: text,
    date: text,
    type: text,
    details: text,
  })
  .passthrough();

export const IndividualSchema = z
  .object({
    slug: text,
    first_name: text,
    last_name: text,
    title: text,
    description: text,
    avatar_url: text,
  })
  .passthrough();

export const OrganizationSchema = z
  .object({
    slug: text,
    name: text,
    logo: text,
    description: text,
  })
  .passthrough();

export const SalesRoundSchema = z
  .object({
    title: text,
    start_date: text,
    type: text,
    details: text,
    end_date: text,
    native_tokens_allocated: scalar,
    asset_collected: text,
    price_per_token_in_asset: scalar,
    equivalent_price_per_token_in_usd: scalar,
    amount_collected_in_asset: scalar,
    amount_collected_in_usd: scalar,
    is_kyc_required: z.boolean().nullish(),
    restricted_jurisdictions: z.unknown().optional(),
  })
  .passthrough();

export const TreasuryAddressSchema = z
  .object({
    name: text,
    link: text,
  })
  .passthrough();

export const TreasuryAccountSchema = z
  .object({
    account_type: text,
    addresses: list(TreasuryAddressSchema),
    asset_held: text,
    security: text,
  })
  .passthrough();

const ContributorsSchema = z
  .object({
    individuals: list(IndividualSchema),
    organizations: list(OrganizationSchema),
  })
  .nullish();

export const LinksResponseSchema = profileResponse(
  z.object({
    general: z
      .object({
        overview: z.object({ official_links: list(LinkSchema) }).nullish(),
      })
      .nullish(),
  })
);

export const RoadmapResponseSchema = profileResponse(
  z.object({
    general: z.object({ roadmap: list(RoadmapItemSchema) }).nullish(),
  })
);

export const TokenomicsResponseSchema = profileResponse(
  z.object({
    economics: z
      .object({
        consensus_and_emission: z
          .object({
            supply: z.object({ general_emission_type: scalar }).nullish(),
            consensus: z
              .object({
                general_consensus_mechanism: scalar,
                consensus_details: scalar,
                mining_algorithm: scalar,
                block_reward: scalar,
              })
              .nullish(),
          })
          .nullish(),
      })
      .nullish(),
  })
);

export const ProductInfoResponseSchema = profileResponse(
  z.object({
    general: z
      .object({
        overview: z.object({ project_details: text }).nullish(),
      })
      .nullish(),
    technology: z
      .object({
        overview: z
          .object({
            technology_details: text,
            client_repositories: list(LinkSchema),
          })
          .nullish(),
        security: z
          .object({
            audits: list(SecurityEventSchema),
            known_exploits_and_vulnerabilities: list(SecurityEventSchema),
          })
          .nullish(),
      })
      .nullish(),
  })
);

export const TeamResponseSchema = profileResponse(z.object({ contributors: ContributorsSchema }));

export const InvestorsResponseSchema = profileResponse(z.object({ investors: ContributorsSchema }));

export const GovernanceResponseSchema = profileResponse(
  z.object({
    governance: z
      .object({
        governance_details: text,
        onchain_governance: z
          .object({
            onchain_governance_type: text,
            onchain_governance_details: text,
          })
          .nullish(),
      })
      .nullish(),
  })
);

export const FundraisingResponseSchema = profileResponse(
  z.object({
    economics: z
      .object({
        launch: z
          .object({
            general: z
              .object({
                launch_style: text,
                launch_details: text,
              })
              .nullish(),
            fundraising: z
              .object({
                sales_rounds: list(SalesRoundSchema),
                sales_treasury_accounts: list(TreasuryAccountSchema),
              })
              .nullish(),
            initial_distribution: z
              .object({
                initial_supply: z.union([z.number(), z.string()]).nullish(),
                genesis_block_date: text,
                initial_supply_repartition: z
                  .object({
                    allocated_to_investors_percentage: scalar,
                    allocated_to_organization_or_founders_percentage: scalar,
                    allocated_to_premined_rewards_or_airdrops_percentage: scalar,
                  })
                  .nullish(),
              })
              .nullish(),
          })
          .nullish(),
      })
      .nullish(),
  })
);

export type MetricDescriptor = z.infer<typeof MetricDescriptorSchema>;
export type Link = z.infer<typeof LinkSchema>;
export type RoadmapItem = z.infer<typeof RoadmapItemSchema>;
export type SecurityEvent = z.infer<typeof SecurityEventSchema>;
export type Individual = z.infer<typeof IndividualSchema>;
export type Organization = z.infer<typeof OrganizationSchema>;
export type SalesRound = z.infer<typeof SalesRoundSchema>;
export type TreasuryAccount = z.infer<typeof TreasuryAccountSchema>;
export type TreasuryAddress = z.infer<typeof TreasuryAddressSchema>;
export type ConsensusAndEmission = NonNullable<
  NonNullable<z.infer<typeof TokenomicsResponseSchema>['data']['profile']['economics']>['consensus_and_emission']
>;
export type Governance = NonNullable<
  z.infer<typeof GovernanceResponseSchema>['data']['profile']['governance']
>;
export type Launch = NonNullable<
  NonNullable<z.infer<typeof FundraisingResponseSchema>['data']['profile']['economics']>['launch']
>;
