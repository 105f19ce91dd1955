/**
 * doctor.ts - Environment health check for the speechgate CLI
 *
 * Checks that recognition can start with the current settings:
 * - Node.js version compatibility
 * - Settings file (optional; defaults apply without one)
 * - whisper.cpp binary and offline model
 * - Credential resolution for every cloud backend on the selected tier
 *
 * No check makes a network request.
 */

import { existsSync } from 'fs';
import { execFile as execFileCb } from 'child_process';

import type { SettingsManager } from '../main/settings';
import { CLOUD_BACKEND_IDS, type BackendId, type CredentialTier } from '../shared/types';
import { createBackendRegistry } from '../main/transcription/backends';
import { CredentialResolver } from '../main/transcription/CredentialResolver';
import { describeFailure } from '../main/transcription/errors';
import type { BackendRegistry, Credential, OfflineEngine } from '../main/transcription/types';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

export interface DoctorOptions {
  settings: SettingsManager;
  settingsPath: string;
  env?: NodeJS.ProcessEnv;
  offlineEngine?: OfflineEngine;
}

const MIN_NODE_MAJOR = 20;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Safe child environment -- only expose PATH and essential vars.
 */
const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
};

/**
 * Execute a command and report whether it ran successfully.
 */
function commandRuns(command: string, args: string[]): Promise<boolean> {
  return new Promise((resolve) => {
    execFileCb(command, args, { env: SAFE_CHILD_ENV }, (error) => {
      resolve(!error);
    });
  });
}

function parseMajor(version: string): number | null {
  const match = version.match(/^v?(\d+)\./);
  return match ? parseInt(match[1], 10) : null;
}

function describeCredential(credential: Credential): string {
  switch (credential.kind) {
    case 'secret':
      return `${credential.tier} key configured`;
    case 'public':
      return `public endpoint ${credential.endpoint}`;
    case 'not-required':
      return 'no credential needed';
    case 'absent':
      return credential.reason;
  }
}

// ============================================================================
// Check functions
// ============================================================================

export function checkNodeVersion(version: string = process.version): DoctorCheck {
  const major = parseMajor(version);

  if (major === null) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: `speechgate requires Node.js >= ${MIN_NODE_MAJOR}`,
    };
  }

  if (major >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'pass', message: `${version} (>= ${MIN_NODE_MAJOR})` };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: `speechgate requires Node.js >= ${MIN_NODE_MAJOR}. Upgrade at https://nodejs.org`,
  };
}

function checkSettingsFile(settingsPath: string): DoctorCheck {
  if (!existsSync(settingsPath)) {
    return {
      name: 'Settings',
      status: 'warn',
      message: `No settings file at ${settingsPath}; defaults in use`,
      hint: 'Create the file or set SPEECHGATE_SETTINGS to configure backends and keys',
    };
  }
  return { name: 'Settings', status: 'pass', message: settingsPath };
}

async function checkWhisperBinary(binaryPath: string, required: boolean): Promise<DoctorCheck> {
  if (await commandRuns(binaryPath, ['--help'])) {
    return { name: 'whisper.cpp', status: 'pass', message: `${binaryPath} runs` };
  }
  return {
    name: 'whisper.cpp',
    status: required ? 'fail' : 'warn',
    message: `${binaryPath} not found or not runnable`,
    hint: 'Build whisper.cpp and put whisper-cli on PATH, or set offline.binaryPath in settings',
  };
}

async function checkBackend(
  backend: BackendId,
  registry: BackendRegistry,
  resolver: CredentialResolver,
  options: { tier: CredentialTier; selected: BackendId }
): Promise<DoctorCheck> {
  const resolution = resolver.resolve(backend, options.tier);
  const instance = registry[backend];
  const ready = await instance.initialize(resolution);
  const name = backend === 'offline' ? 'Offline model' : `${backend} (${options.tier})`;

  if (ready) {
    return { name, status: 'pass', message: describeCredential(resolution.credential) };
  }

  const problem = instance.getFailure();
  return {
    name,
    status: backend === options.selected ? 'fail' : 'warn',
    message: problem ? describeFailure(backend, { ...problem, hint: undefined }) : 'not ready',
    hint: problem?.hint,
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result.
 */
export async function runDoctorChecks(options: DoctorOptions): Promise<DoctorResult> {
  const settings = options.settings.getAll();
  const registry = createBackendRegistry(settings, { offlineEngine: options.offlineEngine });
  const resolver = new CredentialResolver({
    store: options.settings,
    publicEndpoint: settings.publicEndpoint,
    sharedMaxSamples: settings.quotas.sharedMaxSamples,
    publicFreeMaxSamples: settings.quotas.publicFreeMaxSamples,
    env: options.env,
  });
  const backendOptions = { tier: settings.tier, selected: settings.backend };

  const checks: DoctorCheck[] = [
    checkNodeVersion(),
    checkSettingsFile(options.settingsPath),
    ...(await Promise.all([
      options.offlineEngine
        ? Promise.resolve<DoctorCheck>({ name: 'whisper.cpp', status: 'pass', message: 'custom offline engine' })
        : checkWhisperBinary(settings.offline.binaryPath, settings.backend === 'offline'),
      checkBackend('offline', registry, resolver, backendOptions),
      ...CLOUD_BACKEND_IDS.map((backend) => checkBackend(backend, registry, resolver, backendOptions)),
    ])),
  ];

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
