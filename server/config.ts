/**
 * Server configuration: read from the environment once at startup.
 */

import { assert } from "../domain/validation.js";

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
}

const DEFAULT_PORT = 3_000;
const DEFAULT_HOST = "localhost";

/** PORT (1–65535, default 3000), HOST (default localhost). */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const rawPort = env.PORT?.trim();
  const port = rawPort ? Number(rawPort) : DEFAULT_PORT;
  assert(Number.isInteger(port) && port >= 1 && port <= 65_535, "PORT must be an integer in 1..65535", {
    port: rawPort,
  });
  const host = env.HOST?.trim() || DEFAULT_HOST;
  return { port, host };
}
