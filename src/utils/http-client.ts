/**
 * HTTP Client
 *
 * Thin GET wrapper over the global fetch with a hard timeout. Every caller
 * (request strategies, robots.txt, sitemaps, the fallback base page) goes
 * through here, and tests swap the transport by passing their own fetchFn.
 */

import { TransportError } from '../types/errors.js';

/**
 * The part of the fetch signature this project uses
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpGetOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  fetchFn?: FetchFn;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Final URL after redirects */
  url: string;
  body: string;
}

/**
 * GET a URL. Network errors and timeouts throw TransportError; HTTP error
 * statuses are returned as-is.
 */
export async function httpGet(url: string, options: HttpGetOptions): Promise<HttpResponse> {
  const { timeoutMs, headers = {}, fetchFn = fetch } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchFn(url, {
      method: 'GET',
      headers,
      redirect: 'follow',
      signal: controller.signal,
    });
    const body = await response.text();
    return {
      status: response.status,
      ok: response.ok,
      url: response.url || url,
      body,
    };
  } catch (error) {
    const reason = controller.signal.aborted
      ? `timed out after ${timeoutMs}ms`
      : error instanceof Error ? error.message : String(error);
    throw new TransportError(`GET ${url} failed: ${reason}`, { url, cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * GET a URL and reject any non-2xx status with a TransportError.
 */
export async function httpGetOk(url: string, options: HttpGetOptions): Promise<HttpResponse> {
  const response = await httpGet(url, options);
  if (!response.ok) {
    throw new TransportError(`GET ${url} returned HTTP ${response.status}`, {
      url,
      httpStatus: response.status,
    });
  }
  return response;
}
