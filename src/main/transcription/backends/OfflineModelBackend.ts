/**
 * OfflineModelBackend.ts - Local Whisper model recognition
 *
 * Picks the model file from the models directory by size and language
 * (English prefers the .en model when one is present), loads it through an
 * OfflineEngine and runs frames locally. No network, no quota.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import type { AudioFrame, TranscriptionFailure, TranscriptionOutcome } from '../../../shared/types';
import { createLogger } from '../../utils/Logger';
import { failure, hintForKind } from '../errors';
import type {
  BackendState,
  OfflineEngine,
  RecognitionBackend,
  WhisperModelSize,
} from '../types';
import { errorMessage } from './http';
import { isEnglish, toPrimaryLanguage } from './language';

const log = createLogger('OfflineModel');

export interface OfflineModelOptions {
  modelsDir: string;
  modelSize: WhisperModelSize;
  language: string;
  threads: number;
  noSpeechThreshold: number;
  engine: OfflineEngine;
}

export class OfflineModelBackend implements RecognitionBackend {
  readonly id = 'offline' as const;

  private state: BackendState = 'uninitialized';
  private lastFailure: TranscriptionFailure | null = null;
  private loadedModelPath: string | null = null;
  private language: string;

  constructor(private readonly options: OfflineModelOptions) {
    this.language = options.language;
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

  /**
   * Model file for the current language: ggml-<size>.en.bin for English when
   * present, otherwise the multilingual ggml-<size>.bin.
   */
  getModelPath(): string {
    const { modelsDir, modelSize } = this.options;
    if (isEnglish(this.language)) {
      const englishOnly = join(modelsDir, `ggml-${modelSize}.en.bin`);
      if (existsSync(englishOnly)) {
        return englishOnly;
      }
    }
    return join(modelsDir, `ggml-${modelSize}.bin`);
  }

  /**
   * The offline model takes no credential; the resolution is ignored.
   */
  async initialize(): Promise<boolean> {
    const modelPath = this.getModelPath();
    if (this.state === 'ready' && modelPath === this.loadedModelPath) {
      return true;
    }

    if (!existsSync(modelPath)) {
      this.markFailed(
        failure('model-unavailable', `model file not found: ${modelPath}`, hintForKind('model-unavailable', this.id))
      );
      return false;
    }

    try {
      await this.options.engine.load(modelPath);
    } catch (error) {
      this.markFailed(failure('model-unavailable', errorMessage(error), hintForKind('model-unavailable', this.id)));
      return false;
    }

    this.loadedModelPath = modelPath;
    this.state = 'ready';
    this.lastFailure = null;
    log.info(`Ready with ${modelPath}`);
    return true;
  }

  /**
   * Reloads when the language change selects a different model file.
   */
  async setLanguage(code: string): Promise<void> {
    this.language = code;
    if (this.state === 'ready' && this.getModelPath() !== this.loadedModelPath) {
      log.info(`Language changed to ${code}, reloading model`);
      await this.initialize();
    }
  }

  async transcribe(frame: AudioFrame): Promise<TranscriptionOutcome> {
    if (this.state !== 'ready' || !this.loadedModelPath) {
      return {
        status: 'failed',
        failure:
          this.lastFailure ??
          failure('model-unavailable', 'offline model is not loaded', hintForKind('model-unavailable', this.id)),
      };
    }
    if (frame.samples.length === 0) {
      return { status: 'no-speech' };
    }

    const modelPath = this.loadedModelPath;
    try {
      const segments = await this.options.engine.transcribe(frame, {
        language: toPrimaryLanguage(this.language),
        threads: this.options.threads,
        noSpeechThreshold: this.options.noSpeechThreshold,
      });
      const text = segments
        .map((segment) => segment.text.trim())
        .filter((segmentText) => segmentText.length > 0)
        .join(' ');
      return text ? { status: 'text', text } : { status: 'no-speech' };
    } catch (error) {
      if (!existsSync(modelPath)) {
        const missing = failure(
          'model-unavailable',
          `model file disappeared: ${modelPath}`,
          hintForKind('model-unavailable', this.id)
        );
        this.markFailed(missing);
        return { status: 'failed', failure: missing };
      }
      return { status: 'failed', failure: failure('bad-request', errorMessage(error)) };
    }
  }

  private markFailed(problem: TranscriptionFailure): void {
    this.state = 'failed';
    this.lastFailure = problem;
    this.loadedModelPath = null;
    log.warn(problem.detail);
  }
}
