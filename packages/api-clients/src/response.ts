/**
 * Response classification shared by every resource call.
 */

import type { z } from 'zod';

export const TIER_RESTRICTION_MARKER = 'requires a pro or enterprise subscription';

export const TIER_RESTRICTED_MESSAGE = 'API Key not authorized for Premium Feature';
export const INVALID_KEY_MESSAGE = 'Invalid API Key';
export const MALFORMED_PAYLOAD_MESSAGE = 'Unexpected response payload';

export interface RawResponse {
  status: number;
  text: string;
  url: string;
}

export type FailureKind = 'tier-restricted' | 'invalid-key' | 'unexpected-status' | 'malformed-payload';

export interface ResponseFailure {
  kind: FailureKind;
  status: number;
  message: string;
  /** Schema issues, for malformed payloads only */
  issues?: string[];
}

export type ClassifiedResponse =
  | { kind: 'success'; status: number; body: unknown }
  | { kind: 'failure'; failure: ResponseFailure };

export type PayloadResult<T> = { ok: true; data: T } | { ok: false; failure: ResponseFailure };

export function classifyResponse(raw: RawResponse): ClassifiedResponse {
  if (raw.status === 200) {
    try {
      return { kind: 'success', status: raw.status, body: JSON.parse(raw.text) };
    } catch {
      return {
        kind: 'failure',
        failure: {
          kind: 'malformed-payload',
          status: raw.status,
          message: MALFORMED_PAYLOAD_MESSAGE,
          issues: ['body is not valid JSON'],
        },
      };
    }
  }

  if (raw.status === 401) {
    return raw.text.includes(TIER_RESTRICTION_MARKER)
      ? {
          kind: 'failure',
          failure: { kind: 'tier-restricted', status: 401, message: TIER_RESTRICTED_MESSAGE },
        }
      : {
          kind: 'failure',
          failure: { kind: 'invalid-key', status: 401, message: INVALID_KEY_MESSAGE },
        };
  }

  return {
    kind: 'failure',
    failure: { kind: 'unexpected-status', status: raw.status, message: raw.text },
  };
}

/**
 * Classify, then validate a successful body against the resource schema
 */
export function readPayload<S extends z.ZodTypeAny>(
  raw: RawResponse,
  schema: S
): PayloadResult<z.output<S>> {
  const classified = classifyResponse(raw);
  if (classified.kind === 'failure') {
    return { ok: false, failure: classified.failure };
  }

  const parsed = schema.safeParse(classified.body);
  if (!parsed.success) {
    return {
      ok: false,
      failure: {
        kind: 'malformed-payload',
        status: classified.status,
        message: MALFORMED_PAYLOAD_MESSAGE,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      },
    };
  }

  return { ok: true, data: parsed.data };
}
