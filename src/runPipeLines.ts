import { v4 as uuidv4 } from "uuid";
import { ConsoleOverlaySink } from "./adapters/ConsoleOverlaySink.js";
import { FfmpegLoopbackSource } from "./adapters/FfmpegLoopbackSource.js";
import { HttpSpeechRecognizer } from "./adapters/HttpSpeechRecognizer.js";
import { HttpTranslator } from "./adapters/HttpTranslator.js";
import { JetStreamSubtitlePublisher } from "./adapters/JetStreamSubtitlePublisher.js";
import type { AppConfig } from "./config.js";
import { createMetrics } from "./metrics.js";
import type { SpeechRecognizerPort, TranslatorPort } from "./ports/sttPorts.js";
import { ViewerServer } from "./server/ViewerServer.js";
import { SequenceAllocator } from "./stream/SequenceAllocator.js";
import { SubtitleHub } from "./stream/SubtitleHub.js";
import { VoiceActivitySegmenter } from "./stream/VoiceActivitySegmenter.js";
import { CaptureOrchestrator } from "./usecases/CaptureOrchestrator.js";
import { LoopbackToSubtitleService } from "./usecases/LoopbackToSubtitleService.js";
import { SubtitlePipeline } from "./usecases/SubtitlePipeline.js";
import { ViewerConnectionManager } from "./viewers/ViewerConnectionManager.js";

export function createBackends(config: AppConfig) {
  const recognizer = new HttpSpeechRecognizer({
    url: config.asr.url,
    apiStyle: config.asr.apiStyle,
    model: config.asr.model,
    language: config.sourceLanguage,
    timeoutMs: config.asr.timeoutMs,
    apiKey: config.apiKey,
    normalizeTarget: config.audio.normalize ? config.audio.normalizeTarget : undefined,
  });
  const translator = new HttpTranslator({
    ...config.translation,
    apiKey: config.apiKey,
  });
  return { recognizer, translator };
}

/** Logs each backend's reachability; true when both answered. */
export async function checkBackends(
  recognizer: SpeechRecognizerPort,
  translator: TranslatorPort
): Promise<boolean> {
  const [asrOk, translationOk] = await Promise.all([
    recognizer.checkHealth?.() ?? Promise.resolve(true),
    translator.checkHealth?.() ?? Promise.resolve(true),
  ]);
  console.log(`recognition service: ${asrOk ? "ok" : "unavailable"}`);
  console.log(`translation service: ${translationOk ? "ok" : "unavailable"}`);
  return asrOk && translationOk;
}

export async function runPipelines(
  config: AppConfig
): Promise<{ stop: () => Promise<void> }> {
  const sessionId = uuidv4();
  const startedAt = Date.now();
  const metrics = createMetrics();

  const { recognizer, translator } = createBackends(config);
  if (!(await checkBackends(recognizer, translator))) {
    console.warn("some services are unavailable, continuing anyway");
  }

  const hub = new SubtitleHub(config.broadcast.queueDepth, metrics.hubObserver);
  const viewers = new ViewerConnectionManager(
    hub,
    {
      maxViewers: config.broadcast.maxViewers,
      heartbeatIntervalMs: config.broadcast.heartbeatIntervalMs,
      heartbeatTimeoutMs: config.broadcast.heartbeatTimeoutMs,
      queueDepth: config.broadcast.queueDepth,
    },
    metrics.viewerObserver
  );

  hub.subscribe(new ConsoleOverlaySink(config.overlay));

  let publisher: JetStreamSubtitlePublisher | undefined;
  if (config.nats) {
    publisher = new JetStreamSubtitlePublisher(config.nats.url, config.nats.subjectPrefix);
    await publisher.start();
    hub.subscribe(publisher);
  }

  const pipeline = new SubtitlePipeline(
    recognizer,
    translator,
    hub,
    {
      sessionId,
      sourceLanguage: config.sourceLanguage,
      targetLanguage: config.targetLanguage,
      ...config.pipeline,
    },
    {
      ...metrics.pipelineObserver,
      onHealthChange: (stage, state) => {
        metrics.pipelineObserver.onHealthChange?.(stage, state);
        viewers.broadcastStatus({ type: "status", status: state, backend: stage });
      },
    }
  );

  const server = new ViewerServer(
    viewers,
    {
      sessionId,
      sourceLanguage: config.sourceLanguage,
      targetLanguage: config.targetLanguage,
      startedAt,
      health: () => pipeline.health(),
      hubStats: () => hub.stats(),
      viewers: () => viewers.count(),
      clearContext: () => translator.clearContext(),
      registry: metrics.registry,
    },
    { host: config.broadcast.host, port: config.broadcast.port }
  );
  try {
    await server.listen();
  } catch (err) {
    await publisher?.stop();
    throw err;
  }

  const segmenter = new VoiceActivitySegmenter(
    config.vad,
    new SequenceAllocator(),
    metrics.onVadDiscard
  );
  const orchestrator = new CaptureOrchestrator(segmenter, pipeline, {
    sampleRate: config.audio.sampleRate,
    frameMs: config.audio.frameMs,
  });
  const source = new FfmpegLoopbackSource({
    ...config.capture,
    sampleRate: config.audio.sampleRate,
  });

  // 유즈 케이스 실행
  const service = new LoopbackToSubtitleService(source, orchestrator);
  const serviceStop = await service.run();

  console.log(
    `translating ${config.sourceLanguage} -> ${config.targetLanguage} (session ${sessionId})`
  );

  let stopping: Promise<void> | null = null;
  const stop = () => {
    stopping ??= (async () => {
      await serviceStop();
      await server.close();
      await publisher?.stop();
    })();
    return stopping;
  };

  return { stop };
}
