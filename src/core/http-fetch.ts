/**
 * Pure HTTP fetching over a shared undici connection pool.
 * Follows redirects by hand, caps response size, and maps every failure to a
 * FetchError subclass so callers can tell I/O problems from bad input.
 */

import { fetch as undiciFetch, Agent, ProxyAgent, type Dispatcher, type Response } from 'undici';
import { getBrowserHeaders, getRealisticUserAgent } from './user-agents.js';
import {
  BlockedError,
  FetchError,
  NetworkError,
  TimeoutError,
  type FetchConfig,
} from '../types.js';

// ── HTTP status text fallbacks (HTTP/2 omits reason phrases) ──────────────────

const HTTP_STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  410: 'Gone',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

const MAX_REDIRECTS = 5;
const MAX_SIZE = 10 * 1024 * 1024; // 10MB

// ── HTTP connection pool ──────────────────────────────────────────────────────

function createHttpPool(): Agent {
  return new Agent({
    connections: 20,
    keepAliveTimeout: 60000,
    keepAliveMaxTimeout: 60000,
  });
}

let httpPool = createHttpPool();

/** One agent per proxy URL, so proxied requests share connections too. */
const proxyAgents = new Map<string, ProxyAgent>();

function getProxyAgent(proxy: string): ProxyAgent {
  let agent = proxyAgents.get(proxy);
  if (!agent) {
    agent = new ProxyAgent(proxy);
    proxyAgents.set(proxy, agent);
  }
  return agent;
}

/** Close pooled connections (lets the process exit promptly). */
export async function closePool(): Promise<void> {
  const oldPool = httpPool;
  const oldProxies = [...proxyAgents.values()];
  httpPool = createHttpPool();
  proxyAgents.clear();
  await Promise.all([oldPool.close(), ...oldProxies.map((agent) => agent.close())]);
}

export function createAbortError(): Error {
  const error = new Error('Operation aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Validate and sanitize a user agent string
 */
export function validateUserAgent(userAgent: string): string {
  if (userAgent.length > 500) {
    throw new FetchError('User agent too long (max 500 characters)');
  }
  // Allow only printable ASCII characters
  if (!/^[\x20-\x7E]*$/.test(userAgent)) {
    throw new FetchError('User agent contains invalid characters');
  }
  return userAgent;
}

export interface FetchResult {
  /** Decoded response body */
  html: string;
  /** Final URL (after redirects) */
  url: string;
  statusCode: number;
  contentType?: string;
}

/**
 * Fetch one page as text with a browser-like request profile.
 *
 * Status mapping: 403 and bot-check pages → BlockedError; 429 and 5xx →
 * retryable NetworkError; other non-2xx → non-retryable NetworkError;
 * exceeded timeout → TimeoutError. An aborted `signal` rejects with an
 * AbortError, not a FetchError.
 */
export async function simpleFetch(
  url: string,
  config: Pick<FetchConfig, 'userAgent' | 'headers' | 'timeoutMs' | 'proxy'>,
  abortSignal?: AbortSignal,
): Promise<FetchResult> {
  if (abortSignal?.aborted) {
    throw createAbortError();
  }

  const userAgent = config.userAgent ? validateUserAgent(config.userAgent) : getRealisticUserAgent();
  const headers = { ...getBrowserHeaders(userAgent) };
  for (const [key, value] of Object.entries(config.headers ?? {})) {
    if (key.toLowerCase() === 'host') {
      throw new FetchError('Custom Host header is not allowed');
    }
    headers[key] = value;
  }

  const dispatcher: Dispatcher = config.proxy ? getProxyAgent(config.proxy) : httpPool;
  const seenUrls = new Set<string>();
  let currentUrl = url;

  for (let redirectCount = 0; redirectCount <= MAX_REDIRECTS; redirectCount++) {
    if (seenUrls.has(currentUrl)) {
      throw new NetworkError('Redirect loop detected', false);
    }
    seenUrls.add(currentUrl);

    const timeoutController = new AbortController();
    const timer = setTimeout(() => timeoutController.abort(), config.timeoutMs);
    const signal = abortSignal
      ? AbortSignal.any([timeoutController.signal, abortSignal])
      : timeoutController.signal;

    try {
      const response = await undiciFetch(currentUrl, {
        headers,
        signal,
        dispatcher,
        redirect: 'manual',
      });

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get('location');
        if (!location) {
          throw new NetworkError('Redirect response missing Location header', false, response.status);
        }
        const next = new URL(location, currentUrl);
        if (next.protocol !== 'http:' && next.protocol !== 'https:') {
          throw new NetworkError(`Refusing redirect to ${next.protocol} URL`, false, response.status);
        }
        currentUrl = next.href;
        continue;
      }

      if (!response.ok) {
        if (response.status === 403) {
          throw new BlockedError(`HTTP 403: ${currentUrl} is blocking requests. Try another user agent or a proxy.`, 403);
        }
        const statusText = response.statusText || HTTP_STATUS_TEXT[response.status] || 'Unknown Error';
        const retryable = response.status === 429 || response.status >= 500;
        throw new NetworkError(`HTTP ${response.status}: ${statusText}`, retryable, response.status);
      }

      const contentType = response.headers.get('content-type') ?? undefined;
      const html = await readBody(response);
      if (!html) {
        throw new NetworkError('Empty response body', true, response.status);
      }
      if (isBotCheck(html)) {
        throw new BlockedError('Bot verification page returned instead of content.', response.status);
      }

      return { html, url: currentUrl, statusCode: response.status, contentType };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        if (abortSignal?.aborted && !timeoutController.signal.aborted) {
          throw createAbortError();
        }
        throw new TimeoutError(`Request timed out after ${config.timeoutMs}ms`);
      }

      throw describeNetworkFailure(error, currentUrl);
    } finally {
      clearTimeout(timer);
    }
  }

  throw new NetworkError(`Too many redirects (max ${MAX_REDIRECTS})`, false);
}

async function readBody(response: Response): Promise<string> {
  const reader = response.body?.getReader();
  if (!reader) {
    throw new NetworkError('Response body is not readable');
  }

  const chunks: Uint8Array[] = [];
  let totalSize = 0;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      totalSize += value.length;
      if (totalSize > MAX_SIZE) {
        await reader.cancel();
        throw new NetworkError('Response too large (max 10MB)', false);
      }
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }

  return Buffer.concat(chunks).toString('utf-8');
}

function isBotCheck(html: string): boolean {
  return html.includes('cf-browser-verification') ||
    html.includes('Just a moment...') ||
    html.includes('whoa there, pardner!');
}

/** Turn an undici transport error into a NetworkError naming its cause. */
function describeNetworkFailure(error: unknown, url: string): NetworkError {
  const hostname = new URL(url).hostname;
  const cause = error instanceof Error ? error.cause : undefined;
  const causeMsg = cause instanceof Error
    ? `${'code' in cause && typeof cause.code === 'string' ? `${cause.code} ` : ''}${cause.message}`
    : '';

  if (causeMsg.includes('ENOTFOUND') || causeMsg.includes('getaddrinfo')) {
    return new NetworkError(`DNS resolution failed: ${hostname} not found.`, false);
  }
  if (causeMsg.includes('certificate') || causeMsg.includes('CERT') || causeMsg.includes('SSL') || causeMsg.includes('TLS')) {
    return new NetworkError(`TLS/SSL certificate error for ${hostname}.`, false);
  }
  if (causeMsg.includes('ECONNREFUSED')) {
    return new NetworkError(`Connection refused by ${hostname}.`);
  }
  if (causeMsg.includes('ECONNRESET') || causeMsg.includes('EPIPE')) {
    return new NetworkError(`Connection reset by ${hostname}.`);
  }

  const msg = error instanceof Error ? error.message : 'Unknown error';
  return new NetworkError(`Failed to fetch: ${msg}${causeMsg ? ` (${causeMsg})` : ''}`);
}
