// Backend/src/index.ts
import "dotenv/config";

import * as http from "http";
import { loadConfig } from "./config";
import { buildHttpApp, createRelay, createWSServer } from "./server";

async function main() {
  const config = loadConfig();
  const relay = createRelay({ config });
  const app = buildHttpApp(relay.rooms);

  const server = http.createServer(app); // <-- same server for HTTP + WS
  const ws = createWSServer(server, relay);

  const shutdown = () => {
    console.log("Shutting down");
    ws.close()
      .catch(err => console.error("Relay close failed:", err))
      .finally(() => server.close(() => process.exit(0)));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  server.listen(config.port, config.host, () => {
    console.log(`HTTP/WS listening on http://localhost:${config.port}`);
    console.log(`Health: http://localhost:${config.port}/health`);
    console.log(`Rooms:  ws://localhost:${config.port}/room/{roomId}`);
  });
}

main().catch(err => {
  console.error("Boot failed:", err);
  process.exit(1);
});
