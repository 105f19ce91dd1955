/**
 * WhisperCppEngine.ts - OfflineEngine backed by the whisper.cpp CLI
 *
 * Each frame is written to a temporary 16-bit WAV file, run through
 * `whisper-cli` with JSON output, and the JSON segments are read back.
 */

import { execFile } from 'child_process';
import { randomUUID } from 'crypto';
import { open, readFile, unlink, writeFile, type FileHandle } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { promisify } from 'util';
import { z } from 'zod';
import type { AudioFrame } from '../../../shared/types';
import { encodePcm16Wav } from '../../audio/audioUtils';
import { createLogger } from '../../utils/Logger';
import type { OfflineEngine, OfflineRunOptions, OfflineSegment } from '../types';

const execFileAsync = promisify(execFile);
const log = createLogger('WhisperCpp');

/** "ggml" magic as written by whisper.cpp's model converter */
export const GGML_MAGIC = 0x67676d6c;

const DEFAULT_RUN_TIMEOUT_MS = 120_000;

const WhisperJsonSchema = z.object({
  transcription: z.array(
    z.object({
      text: z.string(),
      offsets: z.object({ from: z.number(), to: z.number() }).optional(),
    })
  ),
});

export class ModelLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelLoadError';
  }
}

export interface WhisperCppEngineOptions {
  binaryPath: string;
  timeoutMs?: number;
}

export class WhisperCppEngine implements OfflineEngine {
  private modelPath: string | null = null;
  private readonly timeoutMs: number;

  constructor(private readonly options: WhisperCppEngineOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
  }

  async load(modelPath: string): Promise<void> {
    await verifyModelFile(modelPath);
    this.modelPath = modelPath;
    log.info(`Model loaded: ${modelPath}`);
  }

  async transcribe(frame: AudioFrame, options: OfflineRunOptions): Promise<OfflineSegment[]> {
    const modelPath = this.modelPath;
    if (!modelPath) {
      throw new ModelLoadError('No model loaded');
    }

    const base = join(tmpdir(), `speechgate-offline-${randomUUID()}`);
    const wavPath = `${base}.wav`;
    const jsonPath = `${base}.json`;

    try {
      await writeFile(wavPath, encodePcm16Wav(frame));
      await execFileAsync(
        this.options.binaryPath,
        [
          '-m', modelPath,
          '-f', wavPath,
          '-l', options.language,
          '-t', String(options.threads),
          '--no-speech-thold', String(options.noSpeechThreshold),
          '-nt',
          '-np',
          '-oj',
          '-of', base,
        ],
        { timeout: this.timeoutMs }
      );

      const parsed = WhisperJsonSchema.safeParse(JSON.parse(await readFile(jsonPath, 'utf-8')));
      if (!parsed.success) {
        throw new Error('whisper.cpp produced unexpected JSON output');
      }
      return parsed.data.transcription.map((segment) => ({
        text: segment.text,
        startMs: segment.offsets?.from ?? 0,
        endMs: segment.offsets?.to ?? 0,
      }));
    } finally {
      await removeQuietly(wavPath);
      await removeQuietly(jsonPath);
    }
  }
}

/**
 * Reject unless the file exists and starts with the ggml magic number.
 */
export async function verifyModelFile(modelPath: string): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await open(modelPath, 'r');
  } catch (error) {
    throw new ModelLoadError(`Model file not readable: ${modelPath} (${(error as NodeJS.ErrnoException).code ?? 'unknown'})`);
  }

  try {
    const header = Buffer.alloc(4);
    const { bytesRead } = await handle.read(header, 0, 4, 0);
    if (bytesRead < 4 || header.readUInt32LE(0) !== GGML_MAGIC) {
      throw new ModelLoadError(`Not a ggml model file: ${modelPath}`);
    }
  } finally {
    await handle.close();
  }
}

async function removeQuietly(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      log.debug(`Could not remove temp file ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
