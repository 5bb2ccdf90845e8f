import express, { type NextFunction, type Request, type Response } from "express";
import { getConfig } from "./config";
import { shutdownDatabase } from "./db/client";
import { registerRoutes } from "./routes";
import { DataPipeline } from "./services/dataPipeline";

function log(message: string): void {
  const time = new Date().toLocaleTimeString("en-GB", { hour12: false });
  console.log(`${time} [express] ${message}`);
}

const config = getConfig();
const app = express();
app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown;

  const originalResJson = res.json.bind(res);
  res.json = (bodyJson: unknown) => {
    capturedJsonResponse = bodyJson;
    return originalResJson(bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > 120) {
        logLine = logLine.slice(0, 119) + "…";
      }

      log(logLine);
    }
  });

  next();
});

const dataPipeline = DataPipeline.getInstance();
dataPipeline.initialise().catch(error => {
  const message = error instanceof Error ? error.message : String(error);
  log(`[pipeline] bootstrap error: ${message}`);
});

async function main(): Promise<void> {
  const server = await registerRoutes(app, { pipeline: dataPipeline });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[express] Unhandled error", err);
    const message = err instanceof Error ? err.message : "Internal Server Error";
    res.status(500).json({ success: false, error: message });
  });

  server.listen({
    port: config.port,
    host: "0.0.0.0",
  }, () => {
    log(`serving on port ${config.port}`);
    const lastRun = dataPipeline.getLastRun();
    if (lastRun) {
      log(`[pipeline] last run (${lastRun.trigger}) at ${lastRun.completedAt.toISOString()} in ${lastRun.durationMs}ms`);
    }
  });

  const shutdown = (signal: string) => {
    log(`received ${signal}, shutting down`);
    dataPipeline.stop();
    server.close(() => {
      shutdownDatabase()
        .catch(error => console.error("[db] shutdown failed", error))
        .finally(() => process.exit(0));
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch(error => {
  console.error("[express] Failed to start server", error);
  process.exit(1);
});
