/**
 * @fileoverview Outbound HTTP helpers for print backends, built on the global fetch.
 *
 * Requests carry Basic authentication (API key as user, empty password) and JSON accept
 * headers. sendRequest applies an AbortController timeout and maps transport failures to
 * PrintProviderError with TIMEOUT or NETWORK codes; HTTP status handling is left to callers.
 */

import * as fs from 'fs';
import { ErrorCode, providerError } from './error.utils';
import { logWarning } from './logging';

export const MIME_JSON = 'application/json';

/**
 * Request description handed to sendRequest
 */
export interface HttpRequestSpec {
  readonly url: string;
  readonly method: 'GET' | 'POST';
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * Response with the body already read as text
 */
export interface HttpResult {
  readonly status: number;
  readonly ok: boolean;
  readonly body: string;
}

/**
 * Base64 of `apiKey:` as used by HTTP Basic authentication
 */
export function buildBasicAuth(apiKey: string): string {
  return Buffer.from(`${apiKey}:`, 'utf8').toString('base64');
}

export function buildJsonGet(url: string, basicAuth: string): HttpRequestSpec {
  return {
    url,
    method: 'GET',
    headers: {
      Authorization: `Basic ${basicAuth}`,
      Accept: MIME_JSON
    }
  };
}

export function buildJsonPost(url: string, basicAuth: string, body: string): HttpRequestSpec {
  return {
    url,
    method: 'POST',
    headers: {
      Authorization: `Basic ${basicAuth}`,
      Accept: MIME_JSON,
      'Content-Type': MIME_JSON
    },
    body
  };
}

/**
 * Execute a request with a timeout and read the body as text
 */
export async function sendRequest(request: HttpRequestSpec, timeoutMs: number): Promise<HttpResult> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers: { ...request.headers },
      body: request.body,
      signal: controller.signal
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, body };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw providerError(
        `Request to ${request.url} timed out after ${timeoutMs}ms`,
        ErrorCode.TIMEOUT,
        { url: request.url, timeoutMs },
        error
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    throw providerError(
      `Request to ${request.url} failed: ${message}`,
      ErrorCode.NETWORK,
      { url: request.url },
      error
    );
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Cut a string to `max` characters, appending "..." when something was removed
 */
export function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.substring(0, max)}...`;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const JOB_ID_KEYS = ['id', 'jobId', 'printJobId'] as const;

/**
 * Job id from a print submission response. A bare number is the id itself; a JSON object
 * yields its `id`, `jobId` or `printJobId`; anything else becomes a truncated preview.
 * Never returns an empty string.
 */
export function extractJobIdOrPreview(rawBody: string | null | undefined, previewMaxLen: number): string {
  const raw = (rawBody ?? '').trim();
  if (raw.length === 0) {
    return '-';
  }
  if (/^\d+$/.test(raw)) {
    return raw;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    logWarning('HTTP', `Unexpected non-JSON response from print provider: ${truncate(raw, Math.max(previewMaxLen, 300))}`);
    return truncate(raw, previewMaxLen);
  }

  if (isJsonObject(parsed)) {
    for (const key of JOB_ID_KEYS) {
      if (key in parsed) {
        return String(parsed[key]);
      }
    }
  }
  return truncate(raw, previewMaxLen);
}

/**
 * Read a file and return its content as base64
 */
export async function encodeFileToBase64(filePath: string): Promise<string> {
  const content = await fs.promises.readFile(filePath);
  return content.toString('base64');
}
