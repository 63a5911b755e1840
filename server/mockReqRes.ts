/**
 * Test utils: mock HTTP req/res without sockets.
 * Only what the handler touches: method/url/headers + body stream, writeHead/end.
 */

import { Readable } from "node:stream";
import type { IncomingMessage, ServerResponse } from "node:http";

export interface MockReqOptions {
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  /** Serialized as JSON. */
  body?: unknown;
  /** Sent verbatim; wins over body. */
  rawBody?: string;
}

export interface CapturedResponse {
  readonly statusCode: number;
  readonly headers: Record<string, string>;
  readonly body: string;
  json<T = unknown>(): T;
}

export function mockReq(opts: MockReqOptions = {}): IncomingMessage {
  const payload = opts.rawBody ?? (opts.body !== undefined ? JSON.stringify(opts.body) : "");
  const headers: Record<string, string> = {};
  for (const [k, v] of Object.entries(opts.headers ?? {})) {
    headers[k.toLowerCase()] = v;
  }
  // the handler never needs the socket side of IncomingMessage
  return Object.assign(Readable.from([payload]), {
    method: opts.method ?? "GET",
    url: opts.url ?? "/",
    headers,
  }) as unknown as IncomingMessage;
}

class ResponseRecorder implements CapturedResponse {
  statusCode = 0;
  headers: Record<string, string> = {};
  body = "";

  writeHead(code: number, h?: Record<string, string | string[]>): this {
    this.statusCode = code;
    for (const [k, v] of Object.entries(h ?? {})) {
      this.headers[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
    }
    return this;
  }

  end(chunk?: string | Buffer): this {
    this.body = chunk === undefined ? "" : chunk.toString();
    return this;
  }

  json<T = unknown>(): T {
    return JSON.parse(this.body) as T;
  }
}

export function mockRes(): ServerResponse & CapturedResponse {
  return new ResponseRecorder() as unknown as ServerResponse & CapturedResponse;
}

export function mockReqRes(opts: MockReqOptions = {}): { req: IncomingMessage; res: ServerResponse & CapturedResponse } {
  return { req: mockReq(opts), res: mockRes() };
}
