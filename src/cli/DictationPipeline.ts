/**
 * DictationPipeline.ts - Recognition session wiring for CLI usage
 *
 * Builds the channel, backends, resolver and orchestrator from settings and
 * feeds them audio from a WAV file or a raw PCM stream. Recognized text goes
 * to the output callback, one line per frame; everything else to the log.
 */

import { readFile } from 'fs/promises';

import { AudioChannel } from '../main/audio/AudioChannel';
import { FrameAssembler } from '../main/audio/FrameAssembler';
import { computeLevelMeter, decodeWav } from '../main/audio/audioUtils';
import type { SettingsManager } from '../main/settings';
import { createBackendRegistry, longestAttemptChainMs } from '../main/transcription/backends';
import { CredentialResolver } from '../main/transcription/CredentialResolver';
import { RecognitionStartError } from '../main/transcription/errors';
import { TranscriptionOrchestrator } from '../main/transcription/TranscriptionOrchestrator';
import type { OfflineEngine } from '../main/transcription/types';
import type { AudioFrame, SessionEvent } from '../shared/types';

// ============================================================================
// Types
// ============================================================================

export interface DictationPipelineOptions {
  settings: SettingsManager;
  /** Length of each recognition frame */
  frameSeconds: number;
  offlineEngine?: OfflineEngine;
  env?: NodeJS.ProcessEnv;
}

export interface PcmFormat {
  sampleRate: number;
  channels: number;
}

export interface DictationResult {
  framesProcessed: number;
  recognized: number;
  noSpeech: number;
  failed: number;
  viaFallback: number;
  durationSeconds: number;
}

type LogFn = (message: string) => void;

// ============================================================================
// Exit code constants
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

/** Added to the longest attempt chain when stop() waits for the worker */
const JOIN_MARGIN_MS = 10_000;

// ============================================================================
// DictationPipeline Class
// ============================================================================

export class DictationPipeline {
  private readonly channel = new AudioChannel();
  private readonly orchestrator: TranscriptionOrchestrator;
  private readonly frameSeconds: number;
  private result: DictationResult = emptyResult();

  constructor(
    options: DictationPipelineOptions,
    private readonly output: LogFn,
    private readonly log: LogFn
  ) {
    if (!(options.frameSeconds > 0)) {
      throw new CLIError(`Frame length must be positive (got ${options.frameSeconds})`, 'user');
    }
    this.frameSeconds = options.frameSeconds;

    const settings = options.settings.getAll();
    this.orchestrator = new TranscriptionOrchestrator({
      channel: this.channel,
      backends: createBackendRegistry(settings, { offlineEngine: options.offlineEngine }),
      resolver: new CredentialResolver({
        store: options.settings,
        publicEndpoint: settings.publicEndpoint,
        sharedMaxSamples: settings.quotas.sharedMaxSamples,
        publicFreeMaxSamples: settings.quotas.publicFreeMaxSamples,
        env: options.env,
      }),
      selection: { backend: settings.backend, tier: settings.tier, language: settings.language },
      speechRmsThreshold: settings.speechRmsThreshold,
      joinTimeoutMs: longestAttemptChainMs(settings) + JOIN_MARGIN_MS,
    });
    this.orchestrator.onEvent((event) => this.handleEvent(event));
  }

  /**
   * Transcribe a WAV file frame by frame. Each frame is handed over only
   * after the previous one has been fully handled, so nothing is dropped.
   */
  async transcribeFile(path: string): Promise<DictationResult> {
    const audio = await this.readWav(path);
    const startTime = Date.now();
    this.result = emptyResult();

    await this.startSession();
    try {
      for (const frame of splitFrames(audio, this.frameSeconds)) {
        this.channel.push(frame, computeLevelMeter(frame.samples));
        await this.orchestrator.drain();
      }
    } finally {
      await this.orchestrator.stop();
    }

    return this.finish(startTime);
  }

  /**
   * Transcribe raw little-endian 16-bit PCM until the stream ends.
   * Frames the recognizer cannot keep up with are replaced by newer ones.
   */
  async listen(input: NodeJS.ReadableStream, format: PcmFormat): Promise<DictationResult> {
    const startTime = Date.now();
    this.result = emptyResult();
    const assembler = new FrameAssembler(this.channel, {
      sampleRate: format.sampleRate,
      channels: format.channels,
      thresholdBytes: Math.max(2 * format.channels, Math.round(this.frameSeconds * format.sampleRate) * format.channels * 2),
    });

    await this.startSession();
    try {
      await new Promise<void>((resolve, reject) => {
        input.on('data', (chunk: Buffer | string) => {
          assembler.write(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
        });
        input.once('end', () => resolve());
        input.once('error', (error: Error) => reject(new CLIError(`Input stream failed: ${error.message}`, 'system')));
      });
      assembler.flush();
      await this.orchestrator.drain();
    } finally {
      await this.orchestrator.stop();
    }

    return this.finish(startTime);
  }

  /**
   * Stop the session, waiting for the frame in flight.
   */
  async abort(): Promise<void> {
    await this.orchestrator.stop();
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private async startSession(): Promise<void> {
    try {
      await this.orchestrator.start();
    } catch (error) {
      if (error instanceof RecognitionStartError) {
        throw new CLIError(error.message, error.kind === 'invalid-state' ? 'system' : 'user');
      }
      throw error;
    }
  }

  private async readWav(path: string): Promise<AudioFrame> {
    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'ENOENT') {
        throw new CLIError(`Audio file not found: ${path}`, 'user');
      }
      if (code === 'EACCES') {
        throw new CLIError(`Permission denied: cannot read ${path}`, 'user');
      }
      throw new CLIError(`Cannot read audio file: ${path} (${code})`, 'system');
    }

    try {
      return decodeWav(buffer);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CLIError(`Unsupported audio file ${path}: ${message}`, 'user');
    }
  }

  private handleEvent(event: SessionEvent): void {
    switch (event.type) {
      case 'text-recognized':
        this.result.framesProcessed++;
        this.result.recognized++;
        if (event.viaFallback) {
          this.result.viaFallback++;
          this.log(`(offline fallback) ${event.text}`);
        }
        this.output(event.text);
        break;
      case 'no-speech-detected':
        this.result.framesProcessed++;
        this.result.noSpeech++;
        break;
      case 'recognition-failed':
        this.result.framesProcessed++;
        this.result.failed++;
        this.log(event.message);
        break;
      default:
        break;
    }
  }

  private finish(startTime: number): DictationResult {
    return { ...this.result, durationSeconds: (Date.now() - startTime) / 1000 };
  }
}

// ============================================================================
// Frame splitting
// ============================================================================

/**
 * Split decoded audio into frames of `frameSeconds` (the last may be shorter).
 */
export function splitFrames(audio: AudioFrame, frameSeconds: number): AudioFrame[] {
  const samplesPerFrame = Math.max(1, Math.round(frameSeconds * audio.sampleRate)) * audio.channels;
  const frames: AudioFrame[] = [];
  for (let offset = 0; offset < audio.samples.length; offset += samplesPerFrame) {
    frames.push({
      samples: audio.samples.slice(offset, offset + samplesPerFrame),
      sampleRate: audio.sampleRate,
      channels: audio.channels,
    });
  }
  return frames;
}

function emptyResult(): DictationResult {
  return { framesProcessed: 0, recognized: 0, noSpeech: 0, failed: 0, viaFallback: 0, durationSeconds: 0 };
}

// ============================================================================
// Error class
// ============================================================================

export class CLIError extends Error {
  public readonly severity: 'user' | 'system';

  constructor(message: string, severity: 'user' | 'system') {
    super(message);
    this.name = 'CLIError';
    this.severity = severity;
  }
}
