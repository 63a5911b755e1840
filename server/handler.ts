/**
 * Pure HTTP request handler. No server/listen.
 * Injected deps for testability. Timestamp logic lives in domain/.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { asTimestamp, UINT32_MAX, type Timestamp } from "../domain/core.js";
import { TimestampParseError, ValidationError } from "../domain/errors.js";
import { timestampSpan } from "../domain/minmax.js";
import {
  compareTimestamps,
  endOfTime,
  formatTimestamp,
  isValidTimestamp,
  parseTimestamp,
  startOfTime,
} from "../domain/timestamp.js";
import { apiError, type ErrorCode } from "./apiErrors.js";

const API = "/api/timestamps";

/** POST-only paths; other methods on them fall through to 404. */
const POST_ROUTES: ReadonlySet<string> = new Set([`${API}/span`, `${API}/compare`]);

export interface Logger {
  info: (message: string) => void;
  error: (err: unknown) => void;
}

export interface HandlerDeps {
  logger: Logger;
}

/** Wire shape of a timestamp: seconds plus canonical text. */
export interface TimestampView {
  readonly seconds: number;
  readonly iso: string;
}

function view(ts: Timestamp): TimestampView {
  return { seconds: ts, iso: formatTimestamp(ts) };
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, statusCode: number, code: ErrorCode, message: string, details?: Record<string, unknown>): void {
  sendJson(res, statusCode, apiError(code, message, details));
}

function parseUrl(url: string | undefined, host: string | undefined): URL | null {
  if (url === undefined) return null;
  try {
    const base = host !== undefined ? `http://${host}` : "http://localhost";
    return new URL(url, base);
  } catch {
    return null;
  }
}

function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer | string) => {
      body += typeof chunk === "string" ? chunk : chunk.toString();
    });
    req.on("end", () => {
      try {
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new ValidationError("Invalid JSON"));
      }
    });
    req.on("error", reject);
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/** Decimal seconds in the unsigned 32-bit range, or null. */
function parseSeconds(raw: string): Timestamp | null {
  if (!/^\d{1,10}$/.test(raw)) return null;
  const n = Number(raw);
  return n <= UINT32_MAX ? asTimestamp(n) : null;
}

function sendParseError(res: ServerResponse, err: TimestampParseError, details?: Record<string, unknown>): void {
  sendError(res, 400, "INVALID_TIMESTAMP", err.message, { input: err.input, ...details });
}

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const url = parseUrl(req.url, req.headers.host);
  const pathname = url?.pathname ?? "/";
  const query = url?.searchParams ?? new URLSearchParams();
  const method = req.method ?? "GET";

  // --- Health ---
  if (method === "GET" && pathname === "/health") {
    sendJson(res, 200, { status: "ok" });
    return;
  }

  // --- GET /api/timestamps/parse?text=yyyy-mm-ddThh:mm:ssZ ---
  if (method === "GET" && pathname === `${API}/parse`) {
    const text = query.get("text");
    if (text === null) {
      sendError(res, 400, "INVALID_INPUT", "text required");
      return;
    }
    try {
      sendJson(res, 200, view(parseTimestamp(text)));
    } catch (err) {
      if (!(err instanceof TimestampParseError)) throw err;
      sendParseError(res, err);
    }
    return;
  }

  // --- GET /api/timestamps/bounds ---
  if (method === "GET" && pathname === `${API}/bounds`) {
    sendJson(res, 200, { startOfTime: view(startOfTime()), endOfTime: view(endOfTime()) });
    return;
  }

  // --- GET /api/timestamps/:seconds ---
  const secondsMatch = pathname.match(new RegExp(`^${API}/([^/]+)$`));
  if (method === "GET" && secondsMatch && !POST_ROUTES.has(pathname)) {
    // raw path segment: valid seconds are plain digits, nothing to decode
    const raw = secondsMatch[1] ?? "";
    const ts = parseSeconds(raw);
    if (ts === null) {
      sendError(res, 400, "INVALID_INPUT", "seconds must be an integer in 0..4294967295", { seconds: raw });
      return;
    }
    sendJson(res, 200, { ...view(ts), valid: isValidTimestamp(ts) });
    return;
  }

  // --- POST /api/timestamps/span { timestamps: string[] } ---
  if (method === "POST" && pathname === `${API}/span`) {
    const body = await parseBody(req);
    const timestamps = isRecord(body) ? body.timestamps : undefined;
    if (!isStringArray(timestamps)) {
      sendError(res, 400, "INVALID_INPUT", "timestamps (string[]) required");
      return;
    }
    const parsed: Timestamp[] = [];
    for (const [index, text] of timestamps.entries()) {
      try {
        parsed.push(parseTimestamp(text));
      } catch (err) {
        if (!(err instanceof TimestampParseError)) throw err;
        sendParseError(res, err, { index });
        return;
      }
    }
    const span = timestampSpan(parsed);
    sendJson(res, 200, { first: view(span.first), last: view(span.last), count: span.count });
    return;
  }

  // --- POST /api/timestamps/compare { a, b } ---
  if (method === "POST" && pathname === `${API}/compare`) {
    const body = await parseBody(req);
    const a = isRecord(body) ? body.a : undefined;
    const b = isRecord(body) ? body.b : undefined;
    if (typeof a !== "string" || typeof b !== "string") {
      sendError(res, 400, "INVALID_INPUT", "a and b (string) required");
      return;
    }
    try {
      const order = Math.sign(compareTimestamps(parseTimestamp(a), parseTimestamp(b)));
      sendJson(res, 200, { order });
    } catch (err) {
      if (!(err instanceof TimestampParseError)) throw err;
      sendParseError(res, err);
    }
    return;
  }

  sendError(res, 404, "NOT_FOUND", "Not Found");
}

/** Routes plus error mapping: ValidationError -> 400, anything else -> logged 500. */
export function createHandler(deps: HandlerDeps): RequestHandler {
  return async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      await route(req, res);
    } catch (err) {
      if (err instanceof ValidationError) {
        sendError(res, 400, "INVALID_INPUT", err.message, err.metadata);
        return;
      }
      deps.logger.error(err);
      sendError(res, 500, "INTERNAL_ERROR", "Internal Server Error");
    }
  };
}
