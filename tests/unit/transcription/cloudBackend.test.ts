/**
 * CloudBackend Unit Tests
 *
 * The vendor REST calls run against a stubbed global fetch:
 * - quota truncation before encoding
 * - per-vendor request shape and auth
 * - public gateway mode
 * - HTTP and transport failure classification
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AzureAdapter } from '../../../src/main/transcription/backends/AzureAdapter';
import { CloudBackend, type VendorAdapter } from '../../../src/main/transcription/backends/CloudBackend';
import { GoogleAdapter } from '../../../src/main/transcription/backends/GoogleAdapter';
import { YandexAdapter } from '../../../src/main/transcription/backends/YandexAdapter';
import type { CloudBackendConfig, CredentialResolution } from '../../../src/main/transcription/types';
import type { CloudBackendId } from '../../../src/shared/types';
import { createFrame } from '../../setup';

const fetchMock = vi.fn<(...args: Parameters<typeof fetch>) => Promise<Response>>();

const CONFIG: CloudBackendConfig = { language: 'en-US', requestTimeoutMs: 1000, publicRequestTimeoutMs: 500 };

function keyed(backend: CloudBackendId, tier: 'personal' | 'shared', maxSamples: number | null = null): CredentialResolution {
  return { backend, tier, credential: { kind: 'secret', tier, secret: 'test-secret' }, maxSamples };
}

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestAt(index: number): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [input, init] = call;
  return { url: typeof input === 'string' ? input : input.toString(), init: init ?? {} };
}

function bodySize(init: RequestInit): number {
  if (!(init.body instanceof Blob)) {
    throw new Error('expected a Blob request body');
  }
  return init.body.size;
}

async function readyBackend(adapter: VendorAdapter, resolution: CredentialResolution, config = CONFIG): Promise<CloudBackend> {
  const backend = new CloudBackend(adapter, config);
  await expect(backend.initialize(resolution)).resolves.toBe(true);
  return backend;
}

describe('CloudBackend', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  describe('readiness', () => {
    it('fails to initialize without a credential and never calls the vendor', async () => {
      const backend = new CloudBackend(new GoogleAdapter(), CONFIG);

      const ready = await backend.initialize({
        backend: 'google',
        tier: 'personal',
        credential: { kind: 'absent', tier: 'personal', reason: 'No personal API key configured for google' },
        maxSamples: null,
      });
      const outcome = await backend.transcribe(createFrame(100));

      expect(ready).toBe(false);
      expect(backend.getState()).toBe('failed');
      expect(backend.getFailure()).toEqual({
        kind: 'unauthorized',
        detail: 'No personal API key configured for google',
        hint: 'Check the Google Speech-to-Text API key in settings, or switch to the shared or public tier.',
      });
      expect(outcome).toEqual({ status: 'failed', failure: backend.getFailure() });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('recovers when a usable credential arrives', async () => {
      const backend = new CloudBackend(new YandexAdapter(), CONFIG);
      await backend.initialize({
        backend: 'yandex',
        tier: 'shared',
        credential: { kind: 'absent', tier: 'shared', reason: 'none' },
        maxSamples: 100,
      });

      await expect(backend.initialize(keyed('yandex', 'shared', 100))).resolves.toBe(true);
      expect(backend.getFailure()).toBeNull();
    });
  });

  describe('quota truncation', () => {
    it('sends at most the shared cap', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ result: 'privet' }));
      const backend = await readyBackend(new YandexAdapter(), keyed('yandex', 'shared', 100));

      const outcome = await backend.transcribe(createFrame(250));

      expect(outcome).toEqual({ status: 'text', text: 'privet' });
      expect(bodySize(requestAt(0).init)).toBe(44 + 100 * 2);
    });

    it('sends the whole frame on the personal tier', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ result: 'privet' }));
      const backend = await readyBackend(new YandexAdapter(), keyed('yandex', 'personal'));

      await backend.transcribe(createFrame(250));

      expect(bodySize(requestAt(0).init)).toBe(44 + 250 * 2);
    });
  });

  describe('Yandex', () => {
    it('posts to stt:recognize with an Api-Key header and a regional locale', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ result: '  добрый день ' }));
      const backend = await readyBackend(new YandexAdapter(), keyed('yandex', 'personal'));
      await backend.setLanguage('ru');

      const outcome = await backend.transcribe(createFrame(10));

      const { url, init } = requestAt(0);
      expect(url).toBe(
        'https://stt.api.cloud.yandex.net/speech/v1/stt:recognize?lang=ru-RU&format=lpcm&sampleRateHertz=16000'
      );
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({ Authorization: 'Api-Key test-secret' });
      expect(outcome).toEqual({ status: 'text', text: 'добрый день' });
    });

    it('reports an empty result as no speech', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ result: '' }));
      const backend = await readyBackend(new YandexAdapter(), keyed('yandex', 'personal'));

      await expect(backend.transcribe(createFrame(10))).resolves.toEqual({ status: 'no-speech' });
    });
  });

  describe('Google', () => {
    it('passes API keys in the query string and the audio as base64', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ results: [{ alternatives: [{ transcript: ' hello ' }] }, { alternatives: [{ transcript: 'world' }] }] })
      );
      const backend = await readyBackend(new GoogleAdapter(), keyed('google', 'personal'));

      const outcome = await backend.transcribe(createFrame(20));

      const { url, init } = requestAt(0);
      expect(url).toBe('https://speech.googleapis.com/v1/speech:recognize?key=test-secret');
      expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(typeof init.body).toBe('string');
      const body: unknown = JSON.parse(String(init.body));
      expect(body).toMatchObject({
        config: {
          encoding: 'LINEAR16',
          sampleRateHertz: 16000,
          audioChannelCount: 1,
          languageCode: 'en-US',
          enableAutomaticPunctuation: true,
        },
      });
      expect(outcome).toEqual({ status: 'text', text: 'hello world' });
    });

    it('sends OAuth access tokens as a bearer header', async () => {
      fetchMock.mockResolvedValue(jsonResponse({}));
      const backend = await readyBackend(new GoogleAdapter(), {
        backend: 'google',
        tier: 'personal',
        credential: { kind: 'secret', tier: 'personal', secret: 'ya29.test-token' },
        maxSamples: null,
      });

      const outcome = await backend.transcribe(createFrame(20));

      const { url, init } = requestAt(0);
      expect(url).toBe('https://speech.googleapis.com/v1/speech:recognize');
      expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer ya29.test-token' });
      expect(outcome).toEqual({ status: 'no-speech' });
    });

    it('classifies an error object in a 2xx body', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: { code: 403, message: 'API disabled' } }));
      const backend = await readyBackend(new GoogleAdapter(), keyed('google', 'personal'));

      await expect(backend.transcribe(createFrame(20))).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'forbidden', detail: 'API disabled' },
      });
    });
  });

  describe('Azure', () => {
    function azureFetch(recognition: unknown): void {
      fetchMock.mockImplementation(async (input) =>
        String(input).includes('issueToken') ? new Response('token-abc') : jsonResponse(recognition)
      );
    }

    it('exchanges the key for a token and reuses it', async () => {
      azureFetch({ RecognitionStatus: 'Success', DisplayText: 'Hello world.' });
      const backend = await readyBackend(
        new AzureAdapter({ region: 'westeurope', tokenTimeoutMs: 100 }),
        keyed('azure', 'personal')
      );

      const first = await backend.transcribe(createFrame(10));
      await backend.transcribe(createFrame(10));

      expect(first).toEqual({ status: 'text', text: 'Hello world.' });
      expect(fetchMock).toHaveBeenCalledTimes(3);
      const token = requestAt(0);
      expect(token.url).toBe('https://westeurope.api.cognitive.microsoft.com/sts/v1.0/issueToken');
      expect(token.init.headers).toEqual({ 'Ocp-Apim-Subscription-Key': 'test-secret', 'Content-Length': '0' });
      const recognition = requestAt(1);
      expect(recognition.url).toBe(
        'https://westeurope.stt.speech.microsoft.com/speech/recognition/conversation/cognitiveservices/v1?language=en-US&format=detailed&profanity=raw'
      );
      expect(recognition.init.headers).toMatchObject({ Authorization: 'Bearer token-abc' });
      expect(requestAt(2).url).toContain('stt.speech.microsoft.com');
    });

    it('requests a new token once the cached one expires', async () => {
      azureFetch({ RecognitionStatus: 'Success', DisplayText: 'Hi.' });
      let now = 1_000_000;
      const backend = await readyBackend(
        new AzureAdapter({ region: 'westeurope', tokenTimeoutMs: 100, now: () => now }),
        keyed('azure', 'personal')
      );

      await backend.transcribe(createFrame(10));
      now += 9 * 60 * 1000 + 1;
      await backend.transcribe(createFrame(10));

      const tokenCalls = fetchMock.mock.calls.filter(([input]) => String(input).includes('issueToken'));
      expect(tokenCalls).toHaveLength(2);
    });

    it('sends a JWT key directly without a token request', async () => {
      azureFetch({ RecognitionStatus: 'Success', DisplayText: 'Hi.' });
      const backend = await readyBackend(new AzureAdapter({ region: 'westeurope', tokenTimeoutMs: 100 }), {
        backend: 'azure',
        tier: 'personal',
        credential: { kind: 'secret', tier: 'personal', secret: 'eyJ.test.token' },
        maxSamples: null,
      });

      await backend.transcribe(createFrame(10));

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(requestAt(0).init.headers).toMatchObject({ Authorization: 'Bearer eyJ.test.token' });
    });

    it('falls back to the best alternative and maps NoMatch to no speech', async () => {
      const adapter = new AzureAdapter({ region: 'westeurope', tokenTimeoutMs: 100 });

      expect(adapter.parseResponse({ RecognitionStatus: 'Success', NBest: [{ Lexical: 'from lexical' }] })).toEqual({
        status: 'text',
        text: 'from lexical',
      });
      expect(adapter.parseResponse({ RecognitionStatus: 'NoMatch' })).toEqual({ status: 'no-speech' });
      expect(adapter.parseResponse({ RecognitionStatus: 'Error' })).toEqual({
        status: 'failed',
        failure: { kind: 'server-error', detail: 'recognition status Error' },
      });
    });

    it('reports a rejected token request as unauthorized', async () => {
      fetchMock.mockResolvedValue(new Response('', { status: 401 }));
      const backend = await readyBackend(
        new AzureAdapter({ region: 'westeurope', tokenTimeoutMs: 100 }),
        keyed('azure', 'shared', 1000)
      );

      await expect(backend.transcribe(createFrame(10))).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'unauthorized', detail: 'token request: HTTP 401' },
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('requires a region for personal keys', async () => {
      const backend = new CloudBackend(new AzureAdapter({ region: ' ', tokenTimeoutMs: 100 }), CONFIG);

      await expect(backend.initialize(keyed('azure', 'personal'))).resolves.toBe(false);
      expect(backend.getFailure()?.kind).toBe('bad-request');
    });

    it('uses the default region for shared keys when none is configured', async () => {
      azureFetch({ RecognitionStatus: 'Success', DisplayText: 'Hi.' });
      const backend = await readyBackend(new AzureAdapter({ region: '', tokenTimeoutMs: 100 }), keyed('azure', 'shared', 1000));

      await backend.transcribe(createFrame(10));

      expect(requestAt(0).url).toBe('https://eastus.api.cognitive.microsoft.com/sts/v1.0/issueToken');
    });
  });

  describe('public gateway', () => {
    it('posts capped WAV audio to the gateway route without credentials', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ results: [{ alternatives: [{ transcript: 'free text' }] }] }));
      const backend = await readyBackend(new GoogleAdapter(), {
        backend: 'google',
        tier: 'public-free',
        credential: { kind: 'public', endpoint: 'https://gateway.example.test/speech/google' },
        maxSamples: 100,
      });

      const outcome = await backend.transcribe(createFrame(250));

      const { url, init } = requestAt(0);
      expect(url).toBe('https://gateway.example.test/speech/google?lang=en-US&public_access=true');
      expect(init.headers).toEqual({ 'Content-Type': 'audio/wav' });
      expect(bodySize(init)).toBe(244);
      expect(outcome).toEqual({ status: 'text', text: 'free text' });
    });
  });

  describe('failure classification', () => {
    it.each([
      [401, 'unauthorized'],
      [429, 'rate-limited'],
      [400, 'bad-request'],
    ])('maps HTTP %i to %s', async (status, kind) => {
      fetchMock.mockResolvedValue(new Response('', { status }));
      const backend = await readyBackend(new YandexAdapter(), keyed('yandex', 'shared', 1000));

      await expect(backend.transcribe(createFrame(10))).resolves.toEqual({
        status: 'failed',
        failure: { kind, detail: `HTTP ${status}` },
      });
    });

    it('includes an excerpt of the error body', async () => {
      fetchMock.mockResolvedValue(new Response(' upstream down ', { status: 503 }));
      const backend = await readyBackend(new YandexAdapter(), keyed('yandex', 'shared', 1000));

      await expect(backend.transcribe(createFrame(10))).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'server-error', detail: 'HTTP 503: upstream down' },
      });
    });

    it('treats an unparsable success body as a server error', async () => {
      fetchMock.mockResolvedValue(new Response('not json'));
      const backend = await readyBackend(new YandexAdapter(), keyed('yandex', 'shared', 1000));

      await expect(backend.transcribe(createFrame(10))).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'server-error', detail: 'unparsable response: not json' },
      });
    });

    it('classifies a connection failure as a network error', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const backend = await readyBackend(new YandexAdapter(), keyed('yandex', 'shared', 1000));

      await expect(backend.transcribe(createFrame(10))).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'network-error', detail: 'fetch failed' },
      });
    });

    it('aborts a request that outlives the timeout', async () => {
      fetchMock.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () =>
              reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }))
            );
          })
      );
      const backend = await readyBackend(new YandexAdapter(), keyed('yandex', 'shared', 1000), {
        ...CONFIG,
        requestTimeoutMs: 20,
      });

      await expect(backend.transcribe(createFrame(10))).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'timeout', detail: 'no response within 20 ms' },
      });
    });
  });
});
