import { isLogLevel, log, setLogLevel } from "shared";
import { Arena } from "./arena.js";
import { loadMap } from "./maps.js";
import { createWSServer } from "./ws.js";
import { createHTTPServer } from "./http.js";
import { config } from "./config.js";

if (isLogLevel(config.logLevel)) {
  setLogLevel(config.logLevel);
} else if (config.isDev) {
  setLogLevel("debug");
}

const arena = new Arena({ map: loadMap(config.arenaMap) });
arena.start(config.tickMs);

const wss = createWSServer(config.wsPort, arena);
const httpServer = createHTTPServer(config.httpPort, arena);

log.info("Server started", {
  gameId: arena.gameId,
  map: arena.map.name,
  httpPort: config.httpPort,
  wsPort: config.wsPort,
  host: config.host,
  env: config.nodeEnv,
});

// Graceful shutdown
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`Received ${signal}, shutting down gracefully...`);

  arena.stop();

  // Stop accepting new connections
  for (const client of wss.clients) {
    client.close(1001, "server shutting down");
  }
  wss.close(() => {
    log.info("WebSocket server closed");
  });

  httpServer.close(() => {
    log.info("HTTP server closed");
  });

  // Give pending I/O a moment to flush, then exit
  setTimeout(() => {
    log.info("Shutdown complete");
    process.exit(0);
  }, 500);
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
