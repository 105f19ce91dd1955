/**
 * YandexAdapter.ts - Yandex SpeechKit v1 short-audio recognition
 */

import { z } from 'zod';
import type { TranscriptionFailure, TranscriptionOutcome } from '../../../shared/types';
import { failure } from '../errors';
import type { VendorAdapter, VendorRequest } from './CloudBackend';
import { parseJsonBody, postRequest, wavBlob, withQuery } from './http';
import { toRegionalLocale } from './language';

const RECOGNIZE_URL = 'https://stt.api.cloud.yandex.net/speech/v1/stt:recognize';

const YandexResponseSchema = z.object({
  result: z.string().optional(),
});

export class YandexAdapter implements VendorAdapter {
  readonly id = 'yandex' as const;

  normalizeLanguage(code: string): string {
    return toRegionalLocale(code);
  }

  validate(): TranscriptionFailure | null {
    return null;
  }

  async recognize(request: VendorRequest): Promise<TranscriptionOutcome> {
    const result = await postRequest({
      url: withQuery(RECOGNIZE_URL, {
        lang: request.language,
        format: 'lpcm',
        sampleRateHertz: request.frame.sampleRate,
      }),
      headers: { Authorization: `Api-Key ${request.secret}` },
      body: wavBlob(request.wav),
      timeoutMs: request.timeoutMs,
    });
    if (!result.ok) {
      return { status: 'failed', failure: result.failure };
    }
    const parsed = parseJsonBody(result.text);
    if (!parsed.ok) {
      return { status: 'failed', failure: parsed.failure };
    }
    return this.parseResponse(parsed.value);
  }

  parseResponse(body: unknown): TranscriptionOutcome {
    const parsed = YandexResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { status: 'failed', failure: failure('server-error', 'unexpected Yandex response shape') };
    }
    const text = parsed.data.result?.trim() ?? '';
    return text ? { status: 'text', text } : { status: 'no-speech' };
  }
}
