/**
 * DeepgramAdapter.ts - Deepgram prerecorded recognition via @deepgram/sdk
 *
 * Keyed requests go through the SDK (transcribeFile with nova-3); the
 * public gateway is handled by CloudBackend like every other vendor.
 */

import { createClient, DeepgramApiError } from '@deepgram/sdk';
import type { DeepgramClient } from '@deepgram/sdk';
import { z } from 'zod';
import type { TranscriptionFailure, TranscriptionOutcome } from '../../../shared/types';
import { RequestTimeoutError, classifyHttpStatus, classifyTransportError, failure } from '../errors';
import type { VendorAdapter, VendorRequest } from './CloudBackend';
import { errorMessage } from './http';

const DEEPGRAM_MODEL = 'nova-3';

const DeepgramResultSchema = z.object({
  results: z.object({
    channels: z.array(
      z.object({
        alternatives: z.array(z.object({ transcript: z.string() })),
      })
    ),
  }),
});

export class DeepgramAdapter implements VendorAdapter {
  readonly id = 'deepgram' as const;

  private client: DeepgramClient | null = null;
  private clientKey: string | null = null;

  normalizeLanguage(code: string): string {
    return code.trim();
  }

  validate(): TranscriptionFailure | null {
    return null;
  }

  async recognize(request: VendorRequest): Promise<TranscriptionOutcome> {
    const client = this.getClient(request.secret);

    try {
      const response = await withTimeout(
        client.listen.prerecorded.transcribeFile(request.wav, {
          model: DEEPGRAM_MODEL,
          language: request.language,
          smart_format: true,
          punctuate: true,
        }),
        request.timeoutMs,
        `no response within ${request.timeoutMs} ms`
      );

      if (response.error) {
        return { status: 'failed', failure: classifyDeepgramError(response.error) };
      }
      return this.parseResponse(response.result);
    } catch (error) {
      return { status: 'failed', failure: classifyDeepgramError(error) };
    }
  }

  parseResponse(body: unknown): TranscriptionOutcome {
    const parsed = DeepgramResultSchema.safeParse(body);
    if (!parsed.success) {
      return { status: 'failed', failure: failure('server-error', 'unexpected Deepgram response shape') };
    }
    const text = parsed.data.results.channels[0]?.alternatives[0]?.transcript.trim() ?? '';
    return text ? { status: 'text', text } : { status: 'no-speech' };
  }

  private getClient(key: string): DeepgramClient {
    if (!this.client || this.clientKey !== key) {
      this.client = createClient(key);
      this.clientKey = key;
    }
    return this.client;
  }
}

function classifyDeepgramError(error: unknown): TranscriptionFailure {
  if (error instanceof DeepgramApiError) {
    return failure(classifyHttpStatus(error.status), error.message);
  }
  return failure(classifyTransportError(error), errorMessage(error));
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, timeoutMessage: string): Promise<T> {
  let timeoutHandle: ReturnType<typeof setTimeout> | null = null;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new RequestTimeoutError(timeoutMessage));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}
