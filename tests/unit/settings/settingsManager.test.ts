/**
 * SettingsManager Unit Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_SETTINGS_PATH,
  SettingsError,
  SettingsManager,
  resolveSettingsPath,
} from '../../../src/main/settings';

describe('SettingsManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'speechgate-settings-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeSettings(content: string): Promise<string> {
    const path = join(dir, 'settings.json');
    await writeFile(path, content, 'utf-8');
    return path;
  }

  describe('load', () => {
    it('uses defaults when the file does not exist', async () => {
      const settings = await SettingsManager.load(join(dir, 'missing.json'), {});

      expect(settings.get('backend')).toBe('offline');
      expect(settings.get('tier')).toBe('personal');
      expect(settings.get('language')).toBe('en-US');
      expect(settings.get('quotas')).toEqual({ sharedMaxSamples: 120000, publicFreeMaxSamples: 60000 });
      expect(settings.get('publicEndpoint')).toBe('https://speech-service-public.eastus.azurecontainer.io');
    });

    it('fills defaults inside partially specified sections', async () => {
      const path = await writeSettings(JSON.stringify({ backend: 'azure', quotas: { publicFreeMaxSamples: 32000 } }));

      const settings = await SettingsManager.load(path, {});

      expect(settings.get('backend')).toBe('azure');
      expect(settings.get('quotas')).toEqual({ sharedMaxSamples: 120000, publicFreeMaxSamples: 32000 });
      expect(settings.get('offline').modelSize).toBe('base');
    });

    it('rejects malformed JSON', async () => {
      const path = await writeSettings('{ "backend": ');

      await expect(SettingsManager.load(path, {})).rejects.toThrow(SettingsError);
      await expect(SettingsManager.load(path, {})).rejects.toThrow(`Settings file ${path} is not valid JSON`);
    });

    it('lists every invalid field', async () => {
      const path = await writeSettings(JSON.stringify({ tier: 'gold', quotas: { sharedMaxSamples: -1 } }));

      const error = await SettingsManager.load(path, {}).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SettingsError);
      const message = error instanceof Error ? error.message : '';
      expect(message).toContain(`Invalid settings in ${path}:`);
      expect(message).toContain('  - tier: ');
      expect(message).toContain('  - quotas.sharedMaxSamples: ');
    });

    it('rejects credentials for unknown backends', async () => {
      const path = await writeSettings(JSON.stringify({ credentials: { watson: 'test-secret' } }));

      await expect(SettingsManager.load(path, {})).rejects.toThrow('  - credentials: ');
    });
  });

  describe('API keys', () => {
    it('prefers the settings file over the environment', () => {
      const settings = new SettingsManager({ credentials: { azure: 'file-secret' } }, { AZURE_API_KEY: 'env-secret' });

      expect(settings.getApiKey('azure')).toBe('file-secret');
    });

    it('falls back to <BACKEND>_API_KEY', () => {
      const settings = new SettingsManager({ credentials: { azure: '  ' } }, { AZURE_API_KEY: ' env-secret ' });

      expect(settings.getApiKey('azure')).toBe('env-secret');
    });

    it('returns null when no key is configured', () => {
      const settings = new SettingsManager({}, {});

      expect(settings.getApiKey('google')).toBeNull();
      expect(settings.getApiKey('offline')).toBeNull();
    });

    it('reads shared keys only from sharedCredentials', () => {
      const settings = new SettingsManager(
        { credentials: { yandex: 'personal-secret' }, sharedCredentials: { deepgram: 'shared-secret' } },
        { YANDEX_API_KEY_SHARED: 'env-secret' }
      );

      expect(settings.getSharedApiKey('deepgram')).toBe('shared-secret');
      expect(settings.getSharedApiKey('yandex')).toBeNull();
    });
  });

  it('applies overrides without touching the original', () => {
    const base = new SettingsManager({ backend: 'google', language: 'ru-RU' }, {});

    const overridden = base.withOverrides({ backend: 'yandex', tier: 'shared' });

    expect(overridden.getAll()).toMatchObject({ backend: 'yandex', tier: 'shared', language: 'ru-RU' });
    expect(base.get('backend')).toBe('google');
  });

  it('throws SettingsError for invalid constructor input', () => {
    expect(() => new SettingsManager({ speechRmsThreshold: 2 }, {})).toThrow('  - speechRmsThreshold: ');
  });

  it('resolves the settings path from SPEECHGATE_SETTINGS', () => {
    expect(resolveSettingsPath({ SPEECHGATE_SETTINGS: '/tmp/custom.json' })).toBe('/tmp/custom.json');
    expect(resolveSettingsPath({})).toBe(DEFAULT_SETTINGS_PATH);
  });
});
