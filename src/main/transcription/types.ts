/**
 * Shared Types for Recognition Backends
 *
 * Every backend (the offline model and each cloud vendor) implements the
 * same small RecognitionBackend contract. The orchestrator holds them in a
 * registry keyed by backend id.
 */

import type {
  AudioFrame,
  BackendId,
  CloudBackendId,
  CredentialTier,
  TranscriptionFailure,
  TranscriptionOutcome,
} from '../../shared/types';

// ============================================================================
// Credential Types
// ============================================================================

export type Credential =
  | { kind: 'secret'; tier: 'personal' | 'shared'; secret: string }
  | { kind: 'public'; endpoint: string }
  | { kind: 'not-required' }
  | { kind: 'absent'; tier: CredentialTier; reason: string };

/**
 * What CredentialResolver.resolve() hands to a backend: the credential and
 * the tier's audio-length cap in samples (null when uncapped).
 */
export interface CredentialResolution {
  backend: BackendId;
  tier: CredentialTier;
  credential: Credential;
  maxSamples: number | null;
}

// ============================================================================
// Backend Contract
// ============================================================================

export type BackendState = 'uninitialized' | 'ready' | 'failed';

export interface RecognitionBackend {
  readonly id: BackendId;

  getState(): BackendState;

  /** Why the backend is not ready, after a failed initialize() */
  getFailure(): TranscriptionFailure | null;

  getLanguage(): string;

  /**
   * Load the model or validate network configuration. Idempotent for an
   * unchanged resolution. Never throws; a failure leaves the backend
   * in the 'failed' state.
   */
  initialize(resolution: CredentialResolution): Promise<boolean>;

  setLanguage(code: string): Promise<void>;

  isReady(): boolean;

  /**
   * Bounded in time; never rejects. Transport errors are classified into
   * the failure taxonomy.
   */
  transcribe(frame: AudioFrame): Promise<TranscriptionOutcome>;
}

export type BackendRegistry = Record<BackendId, RecognitionBackend>;

// ============================================================================
// Cloud Configuration
// ============================================================================

export interface CloudBackendConfig {
  /** Initial language; changed later through setLanguage() */
  language: string;
  requestTimeoutMs: number;
  publicRequestTimeoutMs: number;
}

export type VendorName = CloudBackendId;

// ============================================================================
// Offline Model Types
// ============================================================================

export type WhisperModelSize = 'tiny' | 'base' | 'small' | 'medium' | 'large';

export interface OfflineSegment {
  text: string;
  startMs: number;
  endMs: number;
}

export interface OfflineRunOptions {
  language: string;
  threads: number;
  noSpeechThreshold: number;
}

/**
 * Runs a local model. load() rejects when the model file is missing or
 * corrupt; transcribe() rejects on malformed input or engine failure.
 */
export interface OfflineEngine {
  load(modelPath: string): Promise<void>;
  transcribe(frame: AudioFrame, options: OfflineRunOptions): Promise<OfflineSegment[]>;
}
