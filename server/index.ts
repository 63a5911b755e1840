/**
 * Process entry point: load config, listen.
 */

import { createApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import type { Logger } from "./handler.js";

const logger: Logger = console;
const config = loadServerConfig();
const { server } = createApp({ logger });

server.listen(config.port, config.host, () => {
  logger.info(`Server listening on http://${config.host}:${config.port}`);
});
