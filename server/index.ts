import "dotenv/config";
import express, { type Request, type Response, type NextFunction } from "express";
import multer from "multer";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { loadLifecycleAppConfig } from "./lifecycle-config";

process.on("unhandledRejection", (reason) => {
  console.error("[Process] Unhandled Rejection:", reason);
});

process.on("uncaughtException", (error) => {
  console.error("[Process] Uncaught Exception:", error);
  process.exit(1);
});

const app = express();
const httpServer = createServer(app);

function gracefulShutdown(signal: string) {
  console.log(`[Process] Received ${signal}, shutting down gracefully...`);
  httpServer.close((err) => {
    if (err) {
      console.error("[Process] Error during shutdown:", err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

app.use(express.json({ limit: "50mb" }));
app.use(express.urlencoded({ extended: false, limit: "50mb" }));

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        const body = JSON.stringify(capturedJsonResponse);
        logLine += ` :: ${body.length > 200 ? `${body.slice(0, 199)}…` : body}`;
      }

      log(logLine);
    }
  });

  next();
});

(async () => {
  try {
    const appConfig = loadLifecycleAppConfig();
    await registerRoutes(httpServer, app, appConfig);

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof multer.MulterError) {
        res.status(400).json({ error: "Bad Request", code: err.code, message: err.message });
        return;
      }
      console.error("[express] Unhandled route error:", err);
      res.status(500).json({ message: err instanceof Error ? err.message : "Internal Server Error" });
    });

    const port = parseInt(process.env.PORT || "5000", 10);
    httpServer.listen(port, "0.0.0.0", () => {
      log(`serving on port ${port}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    if (error instanceof Error) {
      console.error("Error message:", error.message);
    }
    process.exit(1);
  }
})();
