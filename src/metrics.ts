import {
  collectDefaultMetrics,
  Counter,
  Gauge,
  Histogram,
  Registry,
} from "prom-client";
import type { HubObserver } from "./stream/SubtitleHub.js";
import type { PipelineObserver, SegmentOutcome } from "./usecases/SubtitlePipeline.js";
import type { ViewerObserver } from "./viewers/ViewerConnectionManager.js";

const outcomeReason = (outcome: SegmentOutcome): string => {
  switch (outcome.state) {
    case "completed":
      return "ok";
    case "failed":
      return outcome.error.reason;
    case "discarded":
      return outcome.reason;
  }
};

export type Metrics = ReturnType<typeof createMetrics>;

export function createMetrics({ defaults = true }: { defaults?: boolean } = {}) {
  const registry = new Registry();
  if (defaults) collectDefaultMetrics({ register: registry });

  const segments = new Counter({
    name: "subtitles_segments_total",
    help: "Segments that reached a terminal state",
    labelNames: ["state", "reason"] as const,
    registers: [registry],
  });
  const vadDiscarded = new Counter({
    name: "subtitles_vad_discarded_total",
    help: "Utterances dropped by the segmenter for too little speech",
    registers: [registry],
  });
  const stageLatency = new Histogram({
    name: "subtitles_stage_latency_seconds",
    help: "Latency of one recognition or translation attempt",
    labelNames: ["stage", "result"] as const,
    buckets: [0.1, 0.25, 0.5, 1, 2, 4, 8, 16, 32],
    registers: [registry],
  });
  const segmentLatency = new Histogram({
    name: "subtitles_segment_latency_seconds",
    help: "Time from submission to completion of a segment",
    buckets: [0.5, 1, 2, 4, 8, 16, 32],
    registers: [registry],
  });
  const degraded = new Gauge({
    name: "subtitles_backend_degraded",
    help: "1 while a backend is degraded",
    labelNames: ["stage"] as const,
    registers: [registry],
  });
  const viewers = new Gauge({
    name: "subtitles_viewers",
    help: "Connected viewers",
    registers: [registry],
  });
  const viewerRejections = new Counter({
    name: "subtitles_viewer_rejections_total",
    help: "Viewers turned away at the connection limit",
    registers: [registry],
  });
  const hubDropped = new Counter({
    name: "subtitles_hub_dropped_total",
    help: "Subtitles dropped from a full subscriber queue",
    registers: [registry],
  });
  const hubSubscribers = new Gauge({
    name: "subtitles_hub_subscribers",
    help: "Hub subscribers, viewers included",
    registers: [registry],
  });

  degraded.set({ stage: "recognition" }, 0);
  degraded.set({ stage: "translation" }, 0);

  const pipelineObserver: PipelineObserver = {
    onResolved: (outcome) => {
      segments.inc({ state: outcome.state, reason: outcomeReason(outcome) });
      if (outcome.state === "completed") {
        segmentLatency.observe(outcome.elapsedMs / 1000);
      }
    },
    onHealthChange: (stage, state) => {
      degraded.set({ stage }, state === "degraded" ? 1 : 0);
    },
    onStageLatency: (stage, ms, succeeded) => {
      stageLatency.observe({ stage, result: succeeded ? "ok" : "error" }, ms / 1000);
    },
  };

  const hubObserver: HubObserver = {
    onDrop: () => hubDropped.inc(),
    onSubscriberCountChange: (count) => hubSubscribers.set(count),
  };

  const viewerObserver: ViewerObserver = {
    onConnect: (count) => viewers.set(count),
    onDisconnect: (count) => viewers.set(count),
    onRejected: () => viewerRejections.inc(),
  };

  return {
    registry,
    pipelineObserver,
    hubObserver,
    viewerObserver,
    onVadDiscard: () => vadDiscarded.inc(),
  };
}
