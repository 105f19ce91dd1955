/**
 * Transcription Module
 *
 * Recognition backends (offline model, Azure, Google, Yandex, Deepgram),
 * tiered credential resolution, the fallback policy and the orchestrator
 * that runs a recognition session.
 */

// ============================================================================
// Primary API - TranscriptionOrchestrator
// ============================================================================

export { TranscriptionOrchestrator, type OrchestratorOptions } from './TranscriptionOrchestrator';

// ============================================================================
// Supporting Services
// ============================================================================

export { CredentialResolver, type CredentialResolverOptions } from './CredentialResolver';
export { decide, type FallbackDecision } from './FallbackPolicy';
export {
  RecognitionStartError,
  RequestTimeoutError,
  backendLabel,
  classifyHttpStatus,
  classifyTransportError,
  describeFailure,
  failure,
  hintForKind,
} from './errors';

export * from './backends';

// ============================================================================
// Types
// ============================================================================

export type {
  BackendRegistry,
  BackendState,
  CloudBackendConfig,
  Credential,
  CredentialResolution,
  OfflineEngine,
  OfflineRunOptions,
  OfflineSegment,
  RecognitionBackend,
  VendorName,
  WhisperModelSize,
} from './types';
