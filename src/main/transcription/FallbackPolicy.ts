/**
 * FallbackPolicy.ts - What to do with a failed cloud attempt
 *
 * Personal-tier failures belong to the user (wrong key, wrong region) and are
 * surfaced. Shared and public-free tiers are best-effort: infrastructure
 * failures there degrade to the offline model for the same frame.
 */

import type { CredentialTier, FailureKind } from '../../shared/types';

export type FallbackDecision = 'surface' | 'retry-offline';

const OFFLINE_RECOVERABLE: ReadonlySet<FailureKind> = new Set<FailureKind>([
  'unauthorized',
  'forbidden',
  'rate-limited',
  'server-error',
  'timeout',
  'network-error',
]);

export function decide(tier: CredentialTier, kind: FailureKind): FallbackDecision {
  if (tier === 'personal') {
    return 'surface';
  }
  return OFFLINE_RECOVERABLE.has(kind) ? 'retry-offline' : 'surface';
}
