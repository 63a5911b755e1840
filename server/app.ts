/**
 * Server factory: wires the handler into node:http.
 * No routing here; see handler.ts.
 */

import { createServer, type Server } from "node:http";
import { createHandler, type HandlerDeps, type RequestHandler } from "./handler.js";

export interface App {
  readonly server: Server;
  readonly handle: RequestHandler;
}

/** Create HTTP server for use with listen, plus the bare handler for socket-free tests. */
export function createApp(overrides: Partial<HandlerDeps> = {}): App {
  const deps: HandlerDeps = { logger: console, ...overrides };
  const handle = createHandler(deps);
  const server = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      deps.logger.error(err);
      res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: { code: "INTERNAL_ERROR", message: "Internal Server Error" } }));
    });
  });
  return { server, handle };
}
