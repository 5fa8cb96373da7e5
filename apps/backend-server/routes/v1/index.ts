import { Router } from "express";
import type { PortfolioServices } from "../../lib/services.js";
import { createPortfolioRouter } from "./portfolio.js";

export function createApiRouter(services: PortfolioServices): Router {
  const router = Router();

  router.use("/portfolio", createPortfolioRouter(services));

  return router;
}
