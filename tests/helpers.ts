/**
 * DevGate — Test Helpers
 */

import { vi } from 'vitest';
import { loadConfig, type GatewayConfig } from '../src/lib/config';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { 'Content-Type': 'text/html' },
  });
}

export function testConfig(env: NodeJS.ProcessEnv = {}): GatewayConfig {
  return loadConfig(env);
}

/** URL of a fetch call, whichever form it was passed in. */
export function urlOf(input: unknown): URL {
  if (input instanceof URL) return input;
  if (input instanceof Request) return new URL(input.url);
  return new URL(String(input));
}

/**
 * Replace global fetch with a mock answering by URL.
 * The handler may throw to simulate a transport failure.
 */
export function mockFetchByUrl(handler: (url: URL) => Response | Promise<Response>) {
  const mockFetch = vi.fn(async (input: unknown, _init?: RequestInit) => handler(urlOf(input)));
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

/** Header value sent with the n-th fetch call. */
export function sentHeader(mockFetch: ReturnType<typeof mockFetchByUrl>, call: number, name: string): string | null {
  const args = mockFetch.mock.calls[call];
  if (!args) throw new Error(`fetch was not called ${call + 1} times`);
  const [input, init] = args;
  if (input instanceof Request) return input.headers.get(name);
  return new Headers(init?.headers).get(name);
}

/** URLs of every fetch call so far, in call order. */
export function calledUrls(mockFetch: ReturnType<typeof mockFetchByUrl>): URL[] {
  return mockFetch.mock.calls.map(([input]) => urlOf(input));
}
