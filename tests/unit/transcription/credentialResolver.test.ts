import { describe, expect, it } from 'vitest';
import { CredentialResolver } from '../../../src/main/transcription/CredentialResolver';
import type { CredentialStore } from '../../../src/main/settings';
import type { CloudBackendId } from '../../../src/shared/types';

function createStore(personal: Partial<Record<CloudBackendId, string>>, shared: Partial<Record<CloudBackendId, string>> = {}): CredentialStore {
  return {
    getApiKey: (backend) => (backend === 'offline' ? null : personal[backend] ?? null),
    getSharedApiKey: (backend) => (backend === 'offline' ? null : shared[backend] ?? null),
  };
}

function createResolver(store: CredentialStore, env: NodeJS.ProcessEnv = {}): CredentialResolver {
  return new CredentialResolver({
    store,
    publicEndpoint: 'https://gateway.example.test/',
    sharedMaxSamples: 120000,
    publicFreeMaxSamples: 60000,
    env,
  });
}

describe('CredentialResolver', () => {
  it('needs no credential for the offline model on any tier', () => {
    const resolver = createResolver(createStore({}));

    for (const tier of ['personal', 'shared', 'public-free'] as const) {
      expect(resolver.resolve('offline', tier)).toEqual({
        backend: 'offline',
        tier,
        credential: { kind: 'not-required' },
        maxSamples: null,
      });
    }
  });

  describe('personal tier', () => {
    it('returns the user key uncapped', () => {
      const resolver = createResolver(createStore({ azure: 'test-secret' }));

      expect(resolver.resolve('azure', 'personal')).toEqual({
        backend: 'azure',
        tier: 'personal',
        credential: { kind: 'secret', tier: 'personal', secret: 'test-secret' },
        maxSamples: null,
      });
    });

    it('reports an absent key', () => {
      const resolver = createResolver(createStore({}));

      expect(resolver.resolve('google', 'personal').credential).toEqual({
        kind: 'absent',
        tier: 'personal',
        reason: 'No personal API key configured for google',
      });
    });
  });

  describe('shared tier', () => {
    it('prefers the environment over shared settings', () => {
      const resolver = createResolver(createStore({}, { yandex: 'settings-secret' }), {
        YANDEX_API_KEY_SHARED: 'env-secret',
      });

      const resolution = resolver.resolve('yandex', 'shared');

      expect(resolution.credential).toEqual({ kind: 'secret', tier: 'shared', secret: 'env-secret' });
      expect(resolution.maxSamples).toBe(120000);
    });

    it('falls back to shared settings when the environment value is blank', () => {
      const resolver = createResolver(createStore({}, { yandex: 'settings-secret' }), { YANDEX_API_KEY_SHARED: '   ' });

      expect(resolver.resolve('yandex', 'shared').credential).toEqual({
        kind: 'secret',
        tier: 'shared',
        secret: 'settings-secret',
      });
    });

    it('does not use the personal key', () => {
      const resolver = createResolver(createStore({ deepgram: 'test-secret' }));

      expect(resolver.resolve('deepgram', 'shared').credential).toEqual({
        kind: 'absent',
        tier: 'shared',
        reason: 'No shared key for deepgram (set DEEPGRAM_API_KEY_SHARED or sharedCredentials.deepgram)',
      });
    });
  });

  describe('public-free tier', () => {
    it('points at the gateway route for the backend', () => {
      const resolver = createResolver(createStore({}));

      expect(resolver.resolve('google', 'public-free')).toEqual({
        backend: 'google',
        tier: 'public-free',
        credential: { kind: 'public', endpoint: 'https://gateway.example.test/speech/google' },
        maxSamples: 60000,
      });
    });
  });

  it('reports caps per tier', () => {
    const resolver = createResolver(createStore({}));

    expect(resolver.getCap('azure', 'personal')).toBeNull();
    expect(resolver.getCap('azure', 'shared')).toBe(120000);
    expect(resolver.getCap('azure', 'public-free')).toBe(60000);
    expect(resolver.getCap('offline', 'public-free')).toBeNull();
  });
});
