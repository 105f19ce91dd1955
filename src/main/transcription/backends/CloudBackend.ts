/**
 * CloudBackend.ts - RecognitionBackend for a cloud speech vendor
 *
 * The vendor-specific parts (auth, request shape, response parsing, language
 * codes) live in a VendorAdapter. This class owns everything the vendors have
 * in common:
 * - readiness from the resolved credential
 * - quota truncation before encoding
 * - WAV encoding
 * - the public-gateway mode
 * - turning any stray rejection into a classified failure
 */

import type { AudioFrame, CloudBackendId, TranscriptionFailure, TranscriptionOutcome } from '../../../shared/types';
import { encodePcm16Wav, truncateFrame } from '../../audio/audioUtils';
import { createLogger, type Logger } from '../../utils/Logger';
import { backendLabel, classifyTransportError, failure, hintForKind } from '../errors';
import type { BackendState, CloudBackendConfig, CredentialResolution, RecognitionBackend } from '../types';
import { errorMessage, parseJsonBody, postRequest, wavBlob, withQuery } from './http';

// ============================================================================
// Vendor Adapter Contract
// ============================================================================

export interface VendorRequest {
  /** Frame after quota truncation */
  frame: AudioFrame;
  wav: Buffer;
  secret: string;
  tier: 'personal' | 'shared';
  /** Already in the vendor's language format */
  language: string;
  timeoutMs: number;
}

export interface VendorAdapter {
  readonly id: CloudBackendId;

  normalizeLanguage(code: string): string;

  /**
   * Configuration problems that make a keyed credential unusable
   * (e.g. a missing region). null when usable.
   */
  validate(tier: 'personal' | 'shared'): TranscriptionFailure | null;

  /** One recognition with a personal or shared key. Never rejects. */
  recognize(request: VendorRequest): Promise<TranscriptionOutcome>;

  /** Interpret a 2xx JSON body from the vendor (or the public gateway). */
  parseResponse(body: unknown): TranscriptionOutcome;
}

// ============================================================================
// CloudBackend Class
// ============================================================================

export class CloudBackend implements RecognitionBackend {
  readonly id: CloudBackendId;

  private state: BackendState = 'uninitialized';
  private lastFailure: TranscriptionFailure | null = null;
  private resolution: CredentialResolution | null = null;
  private resolutionKey: string | null = null;
  private language: string;
  private readonly log: Logger;

  constructor(
    private readonly adapter: VendorAdapter,
    private readonly config: CloudBackendConfig
  ) {
    this.id = adapter.id;
    this.language = config.language;
    this.log = createLogger(`Cloud:${adapter.id}`);
  }

  getState(): BackendState {
    return this.state;
  }

  getFailure(): TranscriptionFailure | null {
    return this.lastFailure;
  }

  getLanguage(): string {
    return this.language;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  async initialize(resolution: CredentialResolution): Promise<boolean> {
    const key = resolutionKey(resolution);
    if (this.state === 'ready' && key === this.resolutionKey) {
      return true;
    }

    const problem = this.checkResolution(resolution);
    if (problem) {
      this.state = 'failed';
      this.lastFailure = problem;
      this.resolution = null;
      this.resolutionKey = null;
      this.log.warn(`Not ready on ${resolution.tier} tier: ${problem.detail}`);
      return false;
    }

    this.resolution = resolution;
    this.resolutionKey = key;
    this.state = 'ready';
    this.lastFailure = null;
    this.log.debug(`Ready on ${resolution.tier} tier`);
    return true;
  }

  async setLanguage(code: string): Promise<void> {
    this.language = code;
  }

  async transcribe(frame: AudioFrame): Promise<TranscriptionOutcome> {
    const resolution = this.resolution;
    if (this.state !== 'ready' || !resolution) {
      return {
        status: 'failed',
        failure: this.lastFailure ?? failure('unauthorized', `${backendLabel(this.id)} is not initialized`),
      };
    }

    const capped = truncateFrame(frame, resolution.maxSamples);
    if (capped !== frame) {
      this.log.debug(`Truncated frame from ${frame.samples.length} to ${capped.samples.length} samples`);
    }
    const wav = encodePcm16Wav(capped);
    const language = this.adapter.normalizeLanguage(this.language);
    const credential = resolution.credential;

    try {
      if (credential.kind === 'public') {
        return await this.recognizePublic(credential.endpoint, wav, language);
      }
      if (credential.kind === 'secret') {
        return await this.adapter.recognize({
          frame: capped,
          wav,
          secret: credential.secret,
          tier: credential.tier,
          language,
          timeoutMs: this.config.requestTimeoutMs,
        });
      }
      return { status: 'failed', failure: failure('unauthorized', `no usable credential (${credential.kind})`) };
    } catch (error) {
      // Adapters classify their own errors; this catches SDK surprises
      return { status: 'failed', failure: failure(classifyTransportError(error), errorMessage(error)) };
    }
  }

  private async recognizePublic(endpoint: string, wav: Buffer, language: string): Promise<TranscriptionOutcome> {
    const result = await postRequest({
      url: withQuery(endpoint, { lang: language, public_access: true }),
      headers: { 'Content-Type': 'audio/wav' },
      body: wavBlob(wav),
      timeoutMs: this.config.publicRequestTimeoutMs,
    });
    if (!result.ok) {
      return { status: 'failed', failure: result.failure };
    }
    const parsed = parseJsonBody(result.text);
    if (!parsed.ok) {
      return { status: 'failed', failure: parsed.failure };
    }
    return this.adapter.parseResponse(parsed.value);
  }

  private checkResolution(resolution: CredentialResolution): TranscriptionFailure | null {
    const credential = resolution.credential;
    switch (credential.kind) {
      case 'absent':
        return failure('unauthorized', credential.reason, hintForKind('unauthorized', this.id));
      case 'not-required':
        return failure('bad-request', `${backendLabel(this.id)} cannot run without a credential or public endpoint`);
      case 'public':
        return null;
      case 'secret':
        return this.adapter.validate(credential.tier);
    }
  }
}

function resolutionKey(resolution: CredentialResolution): string {
  const credential = resolution.credential;
  const identity =
    credential.kind === 'secret'
      ? `${credential.tier}:${credential.secret}`
      : credential.kind === 'public'
        ? credential.endpoint
        : credential.kind;
  return `${resolution.tier}|${identity}|${resolution.maxSamples ?? 'uncapped'}`;
}
