import { pathToFileURL } from "url";

import { Cache } from "./cache";
import { loadConfig, type Config } from "./config";
import { serve } from "./server";
import { soListen, soStop, type TCPListener } from "./tcp";
import type { Logger, ServeContext } from "./types";

export type RunningServer = {
  listener: TCPListener;
  cache: Cache;
  done: Promise<void>;
  stop: () => Promise<void>;
};

// ----------------------------------------------------
// Open the listener and start the accept loop
// ----------------------------------------------------
export async function startServer(config: Config, log: Logger = console): Promise<RunningServer> {
  const cache = new Cache(config.CACHE_SIZE);
  const ctx: ServeContext = {
    serverRoot: config.SERVER_ROOT,
    serverFiles: config.SERVER_FILES,
    useCache: config.FILE_CACHE,
    log,
    now: () => new Date(),
  };

  const listener = await soListen(config.PORT, config.HOST);
  log.log(`webserver: waiting for connections on port ${config.PORT}...`);

  const done = serve(listener, cache, ctx);
  return {
    listener,
    cache,
    done,
    stop: async () => {
      await soStop(listener);
      await done;
    },
  };
}

export async function main(): Promise<void> {
  const config = loadConfig();

  let server: RunningServer;
  try {
    server = await startServer(config);
  } catch (err) {
    console.error("webserver: fatal error getting listening socket:", err);
    process.exit(1);
  }

  const shutdown = () => {
    server.stop().catch((err) => console.error("shutdown:", err));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.done;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error("webserver:", err);
    process.exit(1);
  });
}
