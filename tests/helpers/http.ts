/**
 * Minimal request/response doubles for invoking route handlers directly
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';

export interface MockRequestOptions {
  method?: string;
  body?: unknown;
  query?: Record<string, string | string[]>;
  headers?: Record<string, string>;
}

export function mockRequest(options: MockRequestOptions = {}): VercelRequest {
  const request = {
    method: options.method ?? 'POST',
    body: options.body,
    query: options.query ?? {},
    cookies: {},
    headers: options.headers ?? {},
  };
  return request as unknown as VercelRequest;
}

export class MockResponse {
  statusCode = 200;
  body: unknown = undefined;
  ended = false;
  readonly headers = new Map<string, string>();

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    this.ended = true;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }

  end(): this {
    this.ended = true;
    return this;
  }

  asResponse(): VercelResponse {
    return this as unknown as VercelResponse;
  }
}

export function bearer(token: string): Record<string, string> {
  return { authorization: `Bearer ${token}` };
}
