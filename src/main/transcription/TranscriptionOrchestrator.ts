/**
 * TranscriptionOrchestrator.ts - Recognition session and worker loop
 *
 * Session lifecycle: idle -> starting -> running -> stopping -> idle.
 *
 * While running, one worker loop pulls frames from the AudioChannel and makes
 * one attempt per frame against the selected backend. Attempts are strictly
 * sequential. A failed cloud attempt goes through the FallbackPolicy, which
 * may allow a single offline attempt for the same frame.
 *
 * Selection changes (backend, tier, language) are recorded immediately and
 * picked up by the worker at the top of the next iteration.
 */

import type {
  AudioFrame,
  BackendId,
  BackendSelection,
  CredentialTier,
  SessionEvent,
  SessionEventCallback,
  SessionState,
  TranscriptionFailure,
  TranscriptionOutcome,
} from '../../shared/types';
import { AudioChannel } from '../audio/AudioChannel';
import { calculateRms, truncateFrame } from '../audio/audioUtils';
import { createLogger } from '../utils/Logger';
import { CredentialResolver } from './CredentialResolver';
import { decide } from './FallbackPolicy';
import { RecognitionStartError, describeFailure, failure, hintForKind } from './errors';
import type { BackendRegistry, CredentialResolution, RecognitionBackend } from './types';

const log = createLogger('Orchestrator');

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_SPEECH_RMS_THRESHOLD = 0.02;

export interface OrchestratorOptions {
  channel: AudioChannel;
  backends: BackendRegistry;
  resolver: CredentialResolver;
  selection: BackendSelection;
  /** Frames at or below this RMS are reported as no speech without a backend call; 0 disables */
  speechRmsThreshold?: number;
  /**
   * Upper bound on how long stop() waits for the worker. Unset means stop()
   * waits for the attempt in flight however long it takes.
   */
  joinTimeoutMs?: number;
}

/** Stop signal owned by a single worker run */
interface WorkerToken {
  stopped: boolean;
}

// ============================================================================
// TranscriptionOrchestrator Class
// ============================================================================

export class TranscriptionOrchestrator {
  private readonly channel: AudioChannel;
  private readonly backends: BackendRegistry;
  private readonly resolver: CredentialResolver;
  private readonly speechRmsThreshold: number;
  private readonly joinTimeoutMs: number | null;

  private state: SessionState = 'idle';
  private selection: BackendSelection;
  private token: WorkerToken | null = null;
  private worker: Promise<void> | null = null;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private listeners = new Set<SessionEventCallback>();
  /** True while the worker is parked in waitForFrame */
  private parked: boolean = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: OrchestratorOptions) {
    this.channel = options.channel;
    this.backends = options.backends;
    this.resolver = options.resolver;
    this.selection = { ...options.selection };
    this.speechRmsThreshold = options.speechRmsThreshold ?? DEFAULT_SPEECH_RMS_THRESHOLD;
    this.joinTimeoutMs = options.joinTimeoutMs ?? null;
  }

  // ============================================================================
  // Public API
  // ============================================================================

  getState(): SessionState {
    return this.state;
  }

  getSelection(): BackendSelection {
    return { ...this.selection };
  }

  /**
   * Subscribe to session events. Returns an unsubscribe function.
   */
  onEvent(callback: SessionEventCallback): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  setLanguage(code: string): void {
    const trimmed = code.trim();
    if (!trimmed) {
      throw new Error('Language code must not be empty');
    }
    this.selection = { ...this.selection, language: trimmed };
    log.info(`Language set to ${trimmed} (applies from the next frame)`);
  }

  setBackend(backend: BackendId): void {
    this.selection = { ...this.selection, backend };
    log.info(`Backend set to ${backend} (applies from the next frame)`);
  }

  setTier(tier: CredentialTier): void {
    this.selection = { ...this.selection, tier };
    log.info(`Tier set to ${tier} (applies from the next frame)`);
  }

  /**
   * Make the selected backend ready and start the worker.
   * Rejects with RecognitionStartError and stays idle when that fails.
   * A worker left over from a stop() that timed out is awaited first.
   */
  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new RecognitionStartError(`Cannot start recognition while ${this.state}`, 'invalid-state');
    }

    this.state = 'starting';
    this.starting = this.performStart();
    try {
      await this.starting;
    } catch (error) {
      this.state = 'idle';
      throw error;
    } finally {
      this.starting = null;
    }
  }

  /**
   * Stop the worker and wait for the attempt in flight, if any, to finish.
   * Safe to call repeatedly and after the worker exited on its own.
   */
  async stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }

    if (this.starting) {
      try {
        await this.starting;
      } catch (error) {
        log.debug(`Start did not complete before stop: ${errorText(error)}`);
      }
    }

    if (this.state !== 'running') {
      return;
    }

    this.stopping = this.performStop();
    try {
      await this.stopping;
    } finally {
      this.stopping = null;
    }
  }

  /**
   * Resolves once the worker has handled every frame pushed so far and is
   * waiting for the next one (or the session is no longer running).
   */
  async drain(): Promise<void> {
    // Let a frame handed straight to the parked worker reach it first
    await new Promise<void>((resolve) => setImmediate(resolve));
    if (this.state !== 'running' || (this.parked && !this.channel.hasPendingFrame())) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  private async performStart(): Promise<void> {
    if (this.worker) {
      log.info('Waiting for the previous worker to finish its attempt');
      await this.worker;
      this.worker = null;
    }

    const selection = { ...this.selection };
    const backend = this.backends[selection.backend];

    const resolution = await this.prepare(backend, selection);
    if (!resolution) {
      const problem =
        backend.getFailure() ?? failure('model-unavailable', `${selection.backend} backend is not ready`);
      log.warn(`Start failed: ${problem.kind}`);
      throw new RecognitionStartError(describeFailure(backend.id, problem), problem.kind);
    }

    const token: WorkerToken = { stopped: false };
    this.token = token;
    this.channel.start();
    this.state = 'running';
    log.info(`Session started (${selection.backend}, ${selection.tier}, ${selection.language})`);
    this.emit({ type: 'session-started', selection });
    this.worker = this.runWorker(token);
  }

  private async performStop(): Promise<void> {
    this.state = 'stopping';
    if (this.token) {
      this.token.stopped = true;
      this.token = null;
    }
    this.channel.stop();

    const worker = this.worker;
    const joinTimeoutMs = this.joinTimeoutMs;
    if (worker) {
      const finished =
        joinTimeoutMs === null ? await worker.then(() => true) : await waitWithTimeout(worker, joinTimeoutMs);
      if (finished) {
        this.worker = null;
      } else {
        // Kept so the next start() waits for it
        log.warn(`Worker did not finish within ${joinTimeoutMs} ms`);
      }
    }

    this.state = 'idle';
    this.releaseIdleWaiters();
    log.info('Session stopped');
    this.emit({ type: 'session-stopped' });
  }

  // ============================================================================
  // Worker
  // ============================================================================

  private async runWorker(token: WorkerToken): Promise<void> {
    while (!token.stopped) {
      this.parked = true;
      if (!this.channel.hasPendingFrame()) {
        this.releaseIdleWaiters();
      }
      const frame = await this.channel.waitForFrame();
      this.parked = false;
      if (!frame) {
        if (token.stopped || !this.channel.isRecording()) {
          break;
        }
        continue;
      }

      // Read once; changes made during this attempt apply to the next frame
      const selection = { ...this.selection };
      try {
        await this.processFrame(frame, selection);
      } catch (error) {
        log.error('Unexpected error while processing frame', error);
        const unexpected = failure('server-error', errorText(error));
        this.emit({
          type: 'recognition-failed',
          message: describeFailure(selection.backend, unexpected),
          failure: unexpected,
        });
      }
    }
    this.parked = false;
    this.releaseIdleWaiters();
    log.debug('Worker exited');
  }

  private releaseIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private async processFrame(frame: AudioFrame, selection: BackendSelection): Promise<void> {
    if (this.speechRmsThreshold > 0 && calculateRms(frame.samples) <= this.speechRmsThreshold) {
      this.emit({ type: 'no-speech-detected', backend: null });
      return;
    }

    const backend = this.backends[selection.backend];
    const outcome = await this.attempt(backend, selection, frame, false);
    if (outcome.status !== 'failed') {
      this.emitOutcome(outcome, backend.id, false);
      return;
    }

    if (backend.id === 'offline' || decide(selection.tier, outcome.failure.kind) === 'surface') {
      this.emitFailure(backend.id, outcome.failure);
      return;
    }

    log.info(`${backend.id} failed (${outcome.failure.kind}), retrying frame offline`);
    await this.retryOffline(selection, frame, backend.id, outcome.failure);
  }

  /**
   * The single offline attempt allowed for a frame whose cloud attempt failed.
   */
  private async retryOffline(
    selection: BackendSelection,
    frame: AudioFrame,
    cloudBackend: BackendId,
    cloudFailure: TranscriptionFailure
  ): Promise<void> {
    const offline = this.backends.offline;
    const outcome = await this.attempt(offline, selection, frame, true);

    if (outcome.status !== 'failed') {
      this.emitOutcome(outcome, offline.id, true);
      return;
    }

    const offlineFailure = outcome.failure;
    const message = `${describeFailure(cloudBackend, cloudFailure)} Offline fallback failed: ${describeFailure(offline.id, offlineFailure)}`;
    this.emit({
      type: 'recognition-failed',
      message,
      failure: {
        ...offlineFailure,
        hint: offlineFailure.hint ?? hintForKind(offlineFailure.kind, offline.id),
      },
    });
  }

  private async attempt(
    backend: RecognitionBackend,
    selection: BackendSelection,
    frame: AudioFrame,
    viaFallback: boolean
  ): Promise<TranscriptionOutcome> {
    const startedAt = Date.now();
    const resolution = await this.prepare(backend, selection);

    let outcome: TranscriptionOutcome;
    let sampleCount = 0;
    if (!resolution) {
      outcome = {
        status: 'failed',
        failure: backend.getFailure() ?? failure('model-unavailable', `${backend.id} backend is not ready`),
      };
    } else {
      sampleCount = truncateFrame(frame, resolution.maxSamples).samples.length;
      outcome = await backend.transcribe(frame);
    }

    const elapsedMs = Date.now() - startedAt;
    log.debug(
      `Attempt ${backend.id}/${selection.tier}${viaFallback ? ' (fallback)' : ''}: ${outcome.status} in ${elapsedMs} ms`
    );
    this.emit({
      type: 'attempt',
      attempt: { backend: backend.id, tier: selection.tier, sampleCount, outcome, elapsedMs, viaFallback },
    });
    return outcome;
  }

  /**
   * Apply the selection's language and credential to a backend.
   * Returns the resolution when the backend is ready, null otherwise.
   */
  private async prepare(backend: RecognitionBackend, selection: BackendSelection): Promise<CredentialResolution | null> {
    if (backend.getLanguage() !== selection.language) {
      await backend.setLanguage(selection.language);
    }
    const resolution = this.resolver.resolve(backend.id, selection.tier);
    const ready = await backend.initialize(resolution);
    return ready ? resolution : null;
  }

  // ============================================================================
  // Events
  // ============================================================================

  private emitOutcome(
    outcome: Exclude<TranscriptionOutcome, { status: 'failed' }>,
    backend: BackendId,
    viaFallback: boolean
  ): void {
    if (outcome.status === 'text') {
      this.emit({ type: 'text-recognized', text: outcome.text, backend, viaFallback });
    } else {
      this.emit({ type: 'no-speech-detected', backend });
    }
  }

  private emitFailure(backend: BackendId, failed: TranscriptionFailure): void {
    const message = describeFailure(backend, failed);
    log.warn(message);
    this.emit({ type: 'recognition-failed', message, failure: failed });
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.error(`Listener failed on ${event.type}`, error);
      }
    }
  }
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves true when the promise settles in time, false on timeout.
 */
async function waitWithTimeout(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timeoutHandle: ReturnType<typeof setTimeout> | null = null;
  const timeout = new Promise<false>((resolve) => {
    timeoutHandle = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}
