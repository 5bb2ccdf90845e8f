import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import { ZodError } from "zod";
import {
  chatRequestSchema,
  sessionParamsSchema,
  type ChatResponse
} from "@shared/schema";
import { ChatService } from "./services/chatService";
import { DataPipeline } from "./services/dataPipeline";
import { EngineError } from "./services/errors";

export interface RouteDependencies {
  chatService: ChatService;
  pipeline: DataPipeline;
}

function sendError(res: Response, tag: string, error: unknown, fallbackMessage: string): void {
  if (error instanceof ZodError) {
    const message = error.issues.map(issue => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    res.status(400).json({ success: false, error: message });
    return;
  }

  console.error(`[${tag}]`, error);
  if (error instanceof EngineError) {
    res.status(error.statusCode).json({ success: false, error: error.message, code: error.code });
    return;
  }

  res.status(500).json({ success: false, error: error instanceof Error ? error.message : fallbackMessage });
}

export async function registerRoutes(app: Express, deps?: Partial<RouteDependencies>): Promise<Server> {
  const chatService = deps?.chatService ?? ChatService.getInstance();
  const pipeline = deps?.pipeline ?? DataPipeline.getInstance();

  // Health check route
  app.get("/api/health", (_req, res) => {
    const snapshot = pipeline.getSnapshotStatus();
    res.json({
      status: snapshot.loaded ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      generationId: snapshot.generationId,
    });
  });

  app.post("/api/chat", async (req, res) => {
    try {
      const { message, sessionId } = chatRequestSchema.parse(req.body);
      const data: ChatResponse = await chatService.processChatMessage(message, sessionId);
      res.json({ success: true, data });
    } catch (error) {
      sendError(res, "chat", error, "Failed to process chat message");
    }
  });

  app.post("/api/query/analyze", async (req, res) => {
    try {
      const { message, sessionId } = chatRequestSchema.parse(req.body);
      const { sessionId: session, outcome } = await chatService.analyzeQuery(message, sessionId);
      res.json({
        success: true,
        data: {
          sessionId: session,
          intent: outcome.classification.intent,
          confidence: outcome.classification.confidence,
          ruleId: outcome.classification.ruleId,
          resolvedQuery: outcome.classification.query,
          contextResolved: outcome.classification.contextResolved,
          topN: outcome.topN,
          degraded: outcome.degraded,
          context: outcome.context,
        },
      });
    } catch (error) {
      sendError(res, "analyze", error, "Failed to analyze query");
    }
  });

  app.get("/api/chat/:sessionId/history", async (req, res) => {
    try {
      const { sessionId } = sessionParamsSchema.parse(req.params);
      const turns = await chatService.getHistory(sessionId);
      res.json({ success: true, data: { sessionId, turns } });
    } catch (error) {
      sendError(res, "chat", error, "Failed to load history");
    }
  });

  app.delete("/api/chat/:sessionId", async (req, res) => {
    try {
      const { sessionId } = sessionParamsSchema.parse(req.params);
      const removed = await chatService.clearSession(sessionId);
      res.json({ success: true, data: { sessionId, removed } });
    } catch (error) {
      sendError(res, "chat", error, "Failed to clear session");
    }
  });

  app.get("/api/data/status", (_req, res) => {
    res.json({
      success: true,
      data: {
        snapshot: pipeline.getSnapshotStatus(),
        lastRun: pipeline.getLastRun() ?? null,
      },
    });
  });

  app.post("/api/data/refresh", async (_req, res) => {
    try {
      const stats = await pipeline.runFullRefresh("manual");
      res.json({ success: true, data: stats });
    } catch (error) {
      sendError(res, "pipeline", error, "Refresh failed");
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
