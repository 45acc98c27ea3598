import type { Server } from "node:http";
import { createApp } from "./app";
import { config, validateConfig } from "./config";
import { createContainer } from "./container";
import { errorMessage, logError, logLine, setLogLevel } from "./log";
import { stopWithTimeout } from "./util/stopWithTimeout";

validateConfig();
setLogLevel(config.logLevel);

const deps = createContainer(config);
const app = createApp(deps);

const server: Server = app.listen(config.port, config.host, () => {
  logLine("[server]", "listening", {
    host: config.host,
    port: config.port,
    cacheTtlSeconds: config.cacheTtlSeconds,
    cacheMaxSize: config.cacheMaxSize,
    fallbackInstances: config.fallbackInstances.length,
  });
});

server.on("error", (err) => {
  logError("[server]", "listen_failed", { message: errorMessage(err) });
  process.exitCode = 1;
});

let stopping = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (stopping) return;
  stopping = true;
  logLine("[server]", "shutdown", { signal, activeStreams: deps.engine.activeSessions });

  const closed = new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  // Live streams keep their sockets open; end them so close() can finish.
  await Promise.all([
    stopWithTimeout("transcoder", () => deps.engine.shutdown(), config.killGraceMs * 3),
    stopWithTimeout("http", () => closed, 5000),
  ]);
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}
