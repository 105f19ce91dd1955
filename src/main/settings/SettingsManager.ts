/**
 * SettingsManager - Validated settings for speechgate
 *
 * Handles:
 * - Loading the JSON settings file (missing file means defaults)
 * - Schema validation with zod, defaults filled per field
 * - Personal API keys (settings file, then <BACKEND>_API_KEY env vars)
 * - The shared-settings pool consulted by the shared tier
 *
 * Persisting settings is the job of the surrounding application; this class
 * only reads them.
 */

import { readFile } from 'fs/promises';
import { homedir, cpus } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { BACKEND_IDS, CREDENTIAL_TIERS, type BackendId, type CloudBackendId } from '../../shared/types';

// ============================================================================
// Schema
// ============================================================================

const DEFAULT_HOME_DIR = join(homedir(), '.speechgate');

const QuotaSchema = z.object({
  sharedMaxSamples: z.number().int().positive().default(120_000),
  publicFreeMaxSamples: z.number().int().positive().default(60_000),
});

const OfflineSchema = z.object({
  modelsDir: z.string().min(1).default(join(DEFAULT_HOME_DIR, 'models')),
  modelSize: z.enum(['tiny', 'base', 'small', 'medium', 'large']).default('base'),
  binaryPath: z.string().min(1).default('whisper-cli'),
  threads: z
    .number()
    .int()
    .positive()
    .default(Math.max(1, Math.floor(cpus().length / 2))),
  noSpeechThreshold: z.number().min(0).max(1).default(0.6),
  /** Upper bound on one whisper-cli run */
  runTimeoutMs: z.number().int().positive().default(120_000),
});

const CredentialMapSchema = z
  .object({
    azure: z.string(),
    google: z.string(),
    yandex: z.string(),
    deepgram: z.string(),
  })
  .partial()
  .strict();

export const SettingsSchema = z.object({
  backend: z.enum(BACKEND_IDS).default('offline'),
  language: z.string().min(2).default('en-US'),
  tier: z.enum(CREDENTIAL_TIERS).default('personal'),
  credentials: CredentialMapSchema.default({}),
  sharedCredentials: CredentialMapSchema.default({}),
  azureRegion: z.string().default('westeurope'),
  publicEndpoint: z.string().url().default('https://speech-service-public.eastus.azurecontainer.io'),
  quotas: QuotaSchema.default({}),
  offline: OfflineSchema.default({}),
  requestTimeoutMs: z.number().int().positive().default(15_000),
  publicRequestTimeoutMs: z.number().int().positive().default(10_000),
  tokenTimeoutMs: z.number().int().positive().default(5_000),
  speechRmsThreshold: z.number().min(0).max(1).default(0.02),
});

export type AppSettings = z.infer<typeof SettingsSchema>;

export type SettingsInput = z.input<typeof SettingsSchema>;

export const DEFAULT_SETTINGS_PATH = join(DEFAULT_HOME_DIR, 'settings.json');

const PERSONAL_KEY_ENV: Record<CloudBackendId, string> = {
  azure: 'AZURE_API_KEY',
  google: 'GOOGLE_API_KEY',
  yandex: 'YANDEX_API_KEY',
  deepgram: 'DEEPGRAM_API_KEY',
};

// ============================================================================
// Errors
// ============================================================================

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

/**
 * Read-side view of settings used by CredentialResolver.
 */
export interface CredentialStore {
  getApiKey(backend: BackendId): string | null;
  getSharedApiKey(backend: BackendId): string | null;
}

// ============================================================================
// SettingsManager Class
// ============================================================================

export class SettingsManager implements CredentialStore {
  private settings: AppSettings;

  constructor(
    settings: SettingsInput = {},
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.settings = parseSettings(settings);
  }

  /**
   * Load settings from a JSON file. A missing file yields defaults;
   * unreadable or invalid content raises SettingsError.
   */
  static async load(path: string = resolveSettingsPath(), env: NodeJS.ProcessEnv = process.env): Promise<SettingsManager> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return new SettingsManager({}, env);
      }
      throw new SettingsError(`Cannot read settings file ${path}: ${describeError(error)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new SettingsError(`Settings file ${path} is not valid JSON: ${describeError(error)}`);
    }

    const result = SettingsSchema.safeParse(json);
    if (!result.success) {
      throw new SettingsError(`Invalid settings in ${path}:\n${formatIssues(result.error)}`);
    }
    return new SettingsManager(result.data, env);
  }

  get<K extends keyof AppSettings>(key: K): AppSettings[K] {
    return this.settings[key];
  }

  getAll(): AppSettings {
    return { ...this.settings };
  }

  /**
   * Apply overrides (CLI flags) on top of the loaded settings.
   */
  withOverrides(overrides: SettingsInput): SettingsManager {
    const merged: SettingsInput = { ...this.settings, ...overrides };
    return new SettingsManager(merged, this.env);
  }

  getApiKey(backend: BackendId): string | null {
    if (backend === 'offline') {
      return null;
    }
    return normalizeSecret(this.settings.credentials[backend]) ?? normalizeSecret(this.env[PERSONAL_KEY_ENV[backend]]);
  }

  getSharedApiKey(backend: BackendId): string | null {
    if (backend === 'offline') {
      return null;
    }
    return normalizeSecret(this.settings.sharedCredentials[backend]);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function resolveSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SPEECHGATE_SETTINGS?.trim();
  return override ? override : DEFAULT_SETTINGS_PATH;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function normalizeSecret(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function parseSettings(input: SettingsInput): AppSettings {
  const result = SettingsSchema.safeParse(input);
  if (!result.success) {
    throw new SettingsError(`Invalid settings:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
