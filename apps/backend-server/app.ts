import express from "express";
import cors from "cors";
import type { PortfolioServices } from "./lib/services.js";
import { createApiRouter } from "./routes/v1/index.js";

export function createApp(services: PortfolioServices) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api/v1", createApiRouter(services));

  return app;
}
