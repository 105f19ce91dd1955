/**
 * GoogleAdapter.ts - Google Cloud Speech-to-Text v1 recognize
 */

import { z } from 'zod';
import type { TranscriptionFailure, TranscriptionOutcome } from '../../../shared/types';
import { classifyHttpStatus, failure } from '../errors';
import type { VendorAdapter, VendorRequest } from './CloudBackend';
import { parseJsonBody, postRequest, withQuery } from './http';

const RECOGNIZE_URL = 'https://speech.googleapis.com/v1/speech:recognize';

const GoogleResponseSchema = z.object({
  results: z
    .array(
      z.object({
        alternatives: z.array(z.object({ transcript: z.string().optional() })).optional(),
      })
    )
    .optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string().optional(),
    })
    .optional(),
});

export class GoogleAdapter implements VendorAdapter {
  readonly id = 'google' as const;

  normalizeLanguage(code: string): string {
    return code.trim();
  }

  validate(): TranscriptionFailure | null {
    return null;
  }

  async recognize(request: VendorRequest): Promise<TranscriptionOutcome> {
    const auth = googleAuth(request.secret);
    const body = JSON.stringify({
      config: {
        encoding: 'LINEAR16',
        sampleRateHertz: request.frame.sampleRate,
        audioChannelCount: request.frame.channels,
        languageCode: request.language,
        enableAutomaticPunctuation: true,
      },
      audio: { content: request.wav.toString('base64') },
    });

    const result = await postRequest({
      url: auth.query ? withQuery(RECOGNIZE_URL, auth.query) : RECOGNIZE_URL,
      headers: { 'Content-Type': 'application/json', ...auth.headers },
      body,
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
    const parsed = GoogleResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { status: 'failed', failure: failure('server-error', 'unexpected Google response shape') };
    }

    const response = parsed.data;
    if (response.error) {
      return {
        status: 'failed',
        failure: failure(classifyHttpStatus(response.error.code), response.error.message ?? `error ${response.error.code}`),
      };
    }

    const text = (response.results ?? [])
      .map((result) => result.alternatives?.[0]?.transcript?.trim() ?? '')
      .filter((transcript) => transcript.length > 0)
      .join(' ');
    return text ? { status: 'text', text } : { status: 'no-speech' };
  }
}

/**
 * OAuth access tokens go in the Authorization header; API keys in the query.
 */
function googleAuth(secret: string): { headers: Record<string, string>; query: Record<string, string> | null } {
  if (secret.startsWith('Bearer ')) {
    return { headers: { Authorization: secret }, query: null };
  }
  if (secret.startsWith('ya29.')) {
    return { headers: { Authorization: `Bearer ${secret}` }, query: null };
  }
  return { headers: {}, query: { key: secret } };
}
