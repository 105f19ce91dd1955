/**
 * AzureAdapter.ts - Azure Speech short-audio REST recognition
 *
 * A subscription key is exchanged for an access token (issueToken) before
 * recognition; tokens are cached per key and region for nine minutes.
 * Keys that already are JWTs are sent as-is.
 */

import { z } from 'zod';
import type { TranscriptionFailure, TranscriptionOutcome } from '../../../shared/types';
import { createLogger } from '../../utils/Logger';
import { failure } from '../errors';
import type { VendorAdapter, VendorRequest } from './CloudBackend';
import { parseJsonBody, postRequest, wavBlob, withQuery } from './http';
import { toRegionalLocale } from './language';

const log = createLogger('Azure');

const TOKEN_TTL_MS = 9 * 60 * 1000;
const SHARED_FALLBACK_REGION = 'eastus';
const NO_SPEECH_STATUSES = new Set(['NoMatch', 'InitialSilenceTimeout', 'BabbleTimeout']);

const AzureResponseSchema = z.object({
  RecognitionStatus: z.string(),
  DisplayText: z.string().optional(),
  NBest: z
    .array(
      z.object({
        Display: z.string().optional(),
        Lexical: z.string().optional(),
      })
    )
    .optional(),
});

export interface AzureAdapterOptions {
  region: string;
  tokenTimeoutMs: number;
  now?: () => number;
}

interface CachedToken {
  token: string;
  expiresAt: number;
}

export class AzureAdapter implements VendorAdapter {
  readonly id = 'azure' as const;

  private readonly tokens = new Map<string, CachedToken>();
  private readonly now: () => number;

  constructor(private readonly options: AzureAdapterOptions) {
    this.now = options.now ?? Date.now;
  }

  normalizeLanguage(code: string): string {
    return toRegionalLocale(code);
  }

  validate(tier: 'personal' | 'shared'): TranscriptionFailure | null {
    if (this.regionFor(tier)) {
      return null;
    }
    return failure('bad-request', 'no Azure region configured', 'Set azureRegion in settings (for example "westeurope").');
  }

  async recognize(request: VendorRequest): Promise<TranscriptionOutcome> {
    const region = this.regionFor(request.tier);
    const token = await this.getAccessToken(request.secret, region);
    if (!token.ok) {
      return { status: 'failed', failure: token.failure };
    }

    const result = await postRequest({
      url: withQuery(
        `https://${region}.stt.speech.microsoft.com/speech/recognition/conversation/cognitiveservices/v1`,
        { language: request.language, format: 'detailed', profanity: 'raw' }
      ),
      headers: {
        Authorization: `Bearer ${token.token}`,
        'Content-Type': `audio/wav; codecs=audio/pcm; samplerate=${request.frame.sampleRate}`,
        Accept: 'application/json',
      },
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
    const parsed = AzureResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { status: 'failed', failure: failure('server-error', 'unexpected Azure response shape') };
    }

    const response = parsed.data;
    if (NO_SPEECH_STATUSES.has(response.RecognitionStatus)) {
      return { status: 'no-speech' };
    }
    if (response.RecognitionStatus !== 'Success') {
      return {
        status: 'failed',
        failure: failure('server-error', `recognition status ${response.RecognitionStatus}`),
      };
    }

    const best = response.NBest?.[0];
    const text = (response.DisplayText || best?.Display || best?.Lexical || '').trim();
    return text ? { status: 'text', text } : { status: 'no-speech' };
  }

  private regionFor(tier: 'personal' | 'shared'): string {
    const region = this.options.region.trim();
    if (region) {
      return region;
    }
    return tier === 'shared' ? SHARED_FALLBACK_REGION : '';
  }

  private async getAccessToken(
    key: string,
    region: string
  ): Promise<{ ok: true; token: string } | { ok: false; failure: TranscriptionFailure }> {
    if (key.startsWith('eyJ')) {
      return { ok: true, token: key };
    }

    const cacheKey = `${region}|${key}`;
    const cached = this.tokens.get(cacheKey);
    if (cached && cached.expiresAt > this.now()) {
      return { ok: true, token: cached.token };
    }

    const result = await postRequest({
      url: `https://${region}.api.cognitive.microsoft.com/sts/v1.0/issueToken`,
      headers: { 'Ocp-Apim-Subscription-Key': key, 'Content-Length': '0' },
      body: null,
      timeoutMs: this.options.tokenTimeoutMs,
    });
    if (!result.ok) {
      log.warn(`Token request failed: ${result.failure.kind}`);
      return { ok: false, failure: { ...result.failure, detail: `token request: ${result.failure.detail}` } };
    }

    const token = result.text.trim();
    if (!token) {
      return { ok: false, failure: failure('server-error', 'token request returned an empty token') };
    }
    this.tokens.set(cacheKey, { token, expiresAt: this.now() + TOKEN_TTL_MS });
    return { ok: true, token };
  }
}
