import express from "express";
import type { Registry } from "prom-client";
import type { HubStats } from "../stream/SubtitleHub.js";
import type { PipelineHealth } from "../usecases/SubtitlePipeline.js";

export type StatusSources = {
  sessionId: string;
  sourceLanguage: string;
  targetLanguage: string;
  startedAt: number;
  health(): PipelineHealth;
  hubStats(): HubStats;
  viewers(): number;
  clearContext(): void;
  registry: Registry;
};

export function createStatusRouter(sources: StatusSources) {
  const router = express.Router();

  router.get("/health", (_req, res) => {
    const health = sources.health();
    res.status(health.status === "healthy" ? 200 : 503).json(health);
  });

  router.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", sources.registry.contentType);
    res.end(await sources.registry.metrics());
  });

  router.get("/api/status", (_req, res) => {
    const hub = sources.hubStats();
    res.json({
      sessionId: sources.sessionId,
      sourceLanguage: sources.sourceLanguage,
      targetLanguage: sources.targetLanguage,
      uptimeMs: Date.now() - sources.startedAt,
      viewers: sources.viewers(),
      latestSequence: hub.latestSequence ?? null,
      published: hub.published,
      dropped: hub.dropped,
      pipeline: sources.health(),
    });
  });

  // 화제가 바뀌었을 때 번역 문맥 초기화
  router.post("/api/context/clear", (_req, res) => {
    sources.clearContext();
    res.status(204).end();
  });

  return router;
}
