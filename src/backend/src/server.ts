// backend/src/server.ts
import http from "node:http";
import { createApp } from "./app";
import type { AppConfig } from "./config";
import { InMemoryHistoryStore } from "./modules/history/inMemoryHistory";
import { ConverterService } from "./modules/converter/converterService";

export function startServer(config: AppConfig): Promise<http.Server> {
  const history = new InMemoryHistoryStore(config.historyLimit);
  const converter = new ConverterService(history);

  const app = createApp({ converter, history, corsOrigin: config.corsOrigin, staticDir: config.staticDir });
  const server = http.createServer(app);

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, () => {
      const addr = server.address();
      const port = typeof addr === "object" && addr ? addr.port : config.port;
      console.log(`http://localhost:${port}`);
      resolve(server);
    });
  });
}
