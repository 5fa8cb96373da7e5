import "dotenv/config";
import { loadConfig } from "backend-common/config";
import { closeRedis } from "cached-db/client";
import { createApp } from "./app.js";
import { createPortfolioServices } from "./lib/services.js";

const config = loadConfig();
const app = createApp(createPortfolioServices(config));

const server = app.listen(config.port, () => {
  console.log(`Backend server listening on http://localhost:${config.port}`);
  console.log(
    `[backend] Alpha Vantage ${config.alphaVantage.outputSize} series, concurrency ${config.retrievalConcurrency}, timeout ${config.alphaVantage.timeoutMs}ms`
  );
});

function shutdown(signal: string) {
  console.log(`[backend] ${signal} received, shutting down`);
  server.close(() => {
    closeRedis()
      .catch((err: unknown) => console.error("[backend] Failed to close Redis:", err))
      .finally(() => process.exit(0));
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

export default app;
