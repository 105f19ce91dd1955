/**
 * Bounded HTTP helpers shared by the cloud backends.
 *
 * One request, one AbortController, one timeout. Every way a request can go
 * wrong comes back as a TranscriptionFailure; nothing here rejects.
 */

import type { TranscriptionFailure } from '../../../shared/types';
import { classifyHttpStatus, classifyTransportError, failure } from '../errors';

export type HttpResult = { ok: true; status: number; text: string } | { ok: false; failure: TranscriptionFailure };

export interface PostRequest {
  url: string;
  headers: Record<string, string>;
  body: string | Blob | null;
  timeoutMs: number;
}

const ERROR_EXCERPT_LENGTH = 200;

export async function postRequest(request: PostRequest): Promise<HttpResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

  try {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });
    const text = await response.text();

    if (!response.ok) {
      return {
        ok: false,
        failure: failure(classifyHttpStatus(response.status), `HTTP ${response.status}${excerpt(text)}`),
      };
    }
    return { ok: true, status: response.status, text };
  } catch (error) {
    const kind = classifyTransportError(error);
    const detail = kind === 'timeout' ? `no response within ${request.timeoutMs} ms` : errorMessage(error);
    return { ok: false, failure: failure(kind, detail) };
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Parse a 2xx body. Unparsable success bodies are a server fault.
 */
export function parseJsonBody(text: string): { ok: true; value: unknown } | { ok: false; failure: TranscriptionFailure } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false, failure: failure('server-error', `unparsable response${excerpt(text)}`) };
  }
}

export function wavBlob(wav: Buffer): Blob {
  return new Blob([new Uint8Array(wav)], { type: 'audio/wav' });
}

export function withQuery(base: string, params: Record<string, string | number | boolean>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function excerpt(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    return '';
  }
  return `: ${trimmed.length > ERROR_EXCERPT_LENGTH ? `${trimmed.slice(0, ERROR_EXCERPT_LENGTH)}...` : trimmed}`;
}
