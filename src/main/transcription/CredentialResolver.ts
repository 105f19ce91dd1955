/**
 * CredentialResolver.ts - Credential and quota lookup per tier
 *
 * Three tiers:
 * - personal: the user's own key for the backend (uncapped)
 * - shared: a pooled key from the environment, then the shared settings
 *   (capped to protect the pooled quota)
 * - public-free: no key; the public gateway endpoint (capped hardest)
 *
 * The offline model needs no credential on any tier.
 */

import type { BackendId, CloudBackendId, CredentialTier } from '../../shared/types';
import { normalizeSecret, type CredentialStore } from '../settings';
import type { CredentialResolution } from './types';

// ============================================================================
// Constants
// ============================================================================

const SHARED_KEY_ENV: Record<CloudBackendId, string> = {
  azure: 'AZURE_API_KEY_SHARED',
  google: 'GOOGLE_API_KEY_SHARED',
  yandex: 'YANDEX_API_KEY_SHARED',
  deepgram: 'DEEPGRAM_API_KEY_SHARED',
};

export interface CredentialResolverOptions {
  store: CredentialStore;
  publicEndpoint: string;
  sharedMaxSamples: number;
  publicFreeMaxSamples: number;
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// CredentialResolver Class
// ============================================================================

export class CredentialResolver {
  private readonly store: CredentialStore;
  private readonly publicEndpoint: string;
  private readonly sharedMaxSamples: number;
  private readonly publicFreeMaxSamples: number;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: CredentialResolverOptions) {
    this.store = options.store;
    this.publicEndpoint = options.publicEndpoint.replace(/\/+$/, '');
    this.sharedMaxSamples = options.sharedMaxSamples;
    this.publicFreeMaxSamples = options.publicFreeMaxSamples;
    this.env = options.env ?? process.env;
  }

  resolve(backend: BackendId, tier: CredentialTier): CredentialResolution {
    if (backend === 'offline') {
      return { backend, tier, credential: { kind: 'not-required' }, maxSamples: null };
    }

    switch (tier) {
      case 'personal': {
        const secret = this.store.getApiKey(backend);
        return {
          backend,
          tier,
          credential: secret
            ? { kind: 'secret', tier, secret }
            : { kind: 'absent', tier, reason: `No personal API key configured for ${backend}` },
          maxSamples: null,
        };
      }

      case 'shared': {
        const secret = normalizeSecret(this.env[SHARED_KEY_ENV[backend]]) ?? this.store.getSharedApiKey(backend);
        return {
          backend,
          tier,
          credential: secret
            ? { kind: 'secret', tier, secret }
            : {
                kind: 'absent',
                tier,
                reason: `No shared key for ${backend} (set ${SHARED_KEY_ENV[backend]} or sharedCredentials.${backend})`,
              },
          maxSamples: this.sharedMaxSamples,
        };
      }

      case 'public-free':
        return {
          backend,
          tier,
          credential: { kind: 'public', endpoint: `${this.publicEndpoint}/speech/${backend}` },
          maxSamples: this.publicFreeMaxSamples,
        };
    }
  }

  /**
   * Cap applied to a tier's audio, in samples.
   */
  getCap(backend: BackendId, tier: CredentialTier): number | null {
    return this.resolve(backend, tier).maxSamples;
  }
}
