/**
 * Shared Types - Core domain model for speechgate
 *
 * Types used by the capture side, the recognition backends, the orchestrator
 * and the CLI. Backend-specific types live beside their backend.
 */

// ============================================================================
// Audio Types
// ============================================================================

/**
 * One fully assembled chunk of normalized audio.
 * Samples are interleaved when channels > 1 and lie in [-1, 1].
 * A frame is never mutated after it has been pushed into an AudioChannel.
 */
export interface AudioFrame {
  readonly samples: Float32Array;
  readonly sampleRate: number;
  readonly channels: number;
}

/**
 * Per-band magnitudes in [0, 1] for visualization. Never used by recognition.
 */
export type LevelMeter = readonly number[];

export const LEVEL_BAND_COUNT = 32;
export const DEFAULT_SAMPLE_RATE = 16000;
export const DEFAULT_CHANNELS = 1;

// ============================================================================
// Backend / Tier Types
// ============================================================================

export const BACKEND_IDS = ['offline', 'azure', 'google', 'yandex', 'deepgram'] as const;

export type BackendId = (typeof BACKEND_IDS)[number];

export type CloudBackendId = Exclude<BackendId, 'offline'>;

export const CLOUD_BACKEND_IDS: readonly CloudBackendId[] = ['azure', 'google', 'yandex', 'deepgram'];

export const CREDENTIAL_TIERS = ['personal', 'shared', 'public-free'] as const;

export type CredentialTier = (typeof CREDENTIAL_TIERS)[number];

export function isBackendId(value: string): value is BackendId {
  return (BACKEND_IDS as readonly string[]).includes(value);
}

export function isCredentialTier(value: string): value is CredentialTier {
  return (CREDENTIAL_TIERS as readonly string[]).includes(value);
}

// ============================================================================
// Outcome Types
// ============================================================================

/**
 * Backend-agnostic failure taxonomy. Every backend maps its transport and
 * vendor errors into one of these kinds.
 */
export type FailureKind =
  | 'bad-request'
  | 'unauthorized'
  | 'forbidden'
  | 'rate-limited'
  | 'server-error'
  | 'timeout'
  | 'network-error'
  | 'model-unavailable';

export interface TranscriptionFailure {
  kind: FailureKind;
  detail: string;
  /** Remediation the user can act on (missing key, missing model, quota) */
  hint?: string;
}

export type TranscriptionOutcome =
  | { status: 'text'; text: string }
  | { status: 'no-speech' }
  | { status: 'failed'; failure: TranscriptionFailure };

/**
 * Diagnostic record of one call against one backend.
 */
export interface TranscriptionAttempt {
  backend: BackendId;
  tier: CredentialTier;
  sampleCount: number;
  outcome: TranscriptionOutcome;
  elapsedMs: number;
  viaFallback: boolean;
}

// ============================================================================
// Session Types
// ============================================================================

export type SessionState = 'idle' | 'starting' | 'running' | 'stopping';

export interface BackendSelection {
  backend: BackendId;
  tier: CredentialTier;
  language: string;
}

export type SessionEvent =
  | { type: 'session-started'; selection: BackendSelection }
  | { type: 'text-recognized'; text: string; backend: BackendId; viaFallback: boolean }
  | { type: 'no-speech-detected'; backend: BackendId | null }
  | { type: 'recognition-failed'; message: string; failure: TranscriptionFailure }
  | { type: 'session-stopped' }
  | { type: 'attempt'; attempt: TranscriptionAttempt };

export type SessionEventCallback = (event: SessionEvent) => void;
