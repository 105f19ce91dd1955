/**
 * Failure classification and user-facing messages.
 *
 * Backends convert HTTP statuses and transport errors into the shared
 * failure taxonomy here; the orchestrator turns failures into messages.
 */

import type { BackendId, FailureKind, TranscriptionFailure } from '../../shared/types';

const BACKEND_LABELS: Record<BackendId, string> = {
  offline: 'Offline model',
  azure: 'Azure Speech',
  google: 'Google Speech-to-Text',
  yandex: 'Yandex SpeechKit',
  deepgram: 'Deepgram',
};

const KIND_SUMMARIES: Record<FailureKind, string> = {
  'bad-request': 'the request was rejected as invalid',
  unauthorized: 'authorization failed',
  forbidden: 'access was forbidden',
  'rate-limited': 'the request limit was exceeded',
  'server-error': 'the service reported an internal error',
  timeout: 'the request timed out',
  'network-error': 'the service could not be reached',
  'model-unavailable': 'the speech model is not available',
};

export function backendLabel(backend: BackendId): string {
  return BACKEND_LABELS[backend];
}

export function failure(kind: FailureKind, detail: string, hint?: string): TranscriptionFailure {
  return hint === undefined ? { kind, detail } : { kind, detail, hint };
}

/**
 * Map a non-2xx HTTP status to a failure kind.
 */
export function classifyHttpStatus(status: number): FailureKind {
  if (status === 401) return 'unauthorized';
  if (status === 403) return 'forbidden';
  if (status === 429) return 'rate-limited';
  if (status >= 500) return 'server-error';
  return 'bad-request';
}

/**
 * Map a rejected request (fetch, SDK call) to a failure kind.
 * Aborts raised by the request timeout count as timeouts.
 */
export function classifyTransportError(error: unknown): FailureKind {
  if (error instanceof RequestTimeoutError) {
    return 'timeout';
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return 'timeout';
  }
  return 'network-error';
}

export function hintForKind(kind: FailureKind, backend: BackendId): string | undefined {
  switch (kind) {
    case 'unauthorized':
      return `Check the ${backendLabel(backend)} API key in settings, or switch to the shared or public tier.`;
    case 'forbidden':
    case 'rate-limited':
      return `The ${backendLabel(backend)} quota may be exhausted. Try again later or use your own API key.`;
    case 'model-unavailable':
      return 'Download a Whisper model (ggml-<size>.bin) into the models directory, or choose a cloud backend.';
    default:
      return undefined;
  }
}

/**
 * Human-readable description of a failure, with a remediation hint when one
 * exists.
 */
export function describeFailure(backend: BackendId, failed: TranscriptionFailure): string {
  const summary = `${backendLabel(backend)}: ${KIND_SUMMARIES[failed.kind]}`;
  const detail = failed.detail ? ` (${failed.detail})` : '';
  const hint = failed.hint ? ` ${failed.hint}` : '';
  return `${summary}${detail}.${hint}`;
}

// ============================================================================
// Error classes
// ============================================================================

export class RequestTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Raised by TranscriptionOrchestrator.start() when the session cannot enter
 * the running state.
 */
export class RecognitionStartError extends Error {
  public readonly kind: FailureKind | 'invalid-state';

  constructor(message: string, kind: FailureKind | 'invalid-state') {
    super(message);
    this.name = 'RecognitionStartError';
    this.kind = kind;
  }
}
