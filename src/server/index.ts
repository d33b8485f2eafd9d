import { createServer, type Server } from "http";

import { logger } from "../lib/logger.js";

import { createApp } from "./app.js";

import type { Runtime } from "../runtime.js";

export { createApp, PAYLOAD_PREVIEW_LENGTH, MESSAGE_PREVIEW_LENGTH } from "./app.js";
export { rateLimit } from "./rate-limit.js";

/**
 * Listen on `port` and start the background cycle driver.
 * Resolves with the bound server once it accepts connections.
 */
export async function startServer(runtime: Runtime, port = runtime.config.port): Promise<Server> {
  const server = createServer(createApp(runtime));
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const bound = typeof address === "object" && address ? address.port : port;
  logger.success(`Riposte listening on :${bound}`);
  runtime.driver.start();
  return server;
}
