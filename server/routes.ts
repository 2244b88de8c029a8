import type { Express } from "express";
import type { Server } from "http";
import type { LifecycleAppConfig } from "@shared/schema";
import { createLifecycleRouter } from "./src/lifecycle/lifecycleRoutes";
import { PipelineCache } from "./src/lifecycle/pipelineCache";

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  appConfig: LifecycleAppConfig
): Promise<Server> {
  const cache = new PipelineCache(Number(process.env.LIFECYCLE_CACHE_SIZE) || 16);

  app.use("/api/lifecycle", createLifecycleRouter(appConfig, cache));

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      cache: { entries: cache.size },
      uptime: process.uptime(),
    });
  });

  return httpServer;
}
