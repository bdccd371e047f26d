import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export type AsrApiStyle = "asr-webservice" | "openai";
export type TranslationApiStyle = "ollama" | "openai";

export type AppConfig = {
  readonly asr: {
    readonly url: string;
    readonly apiStyle: AsrApiStyle;
    readonly model: string;
    readonly timeoutMs: number;
  };
  readonly translation: {
    readonly url: string;
    readonly apiStyle: TranslationApiStyle;
    readonly model: string;
    readonly timeoutMs: number;
    readonly temperature: number;
    readonly maxTokens: number;
    readonly contextSize: number;
  };
  readonly apiKey?: string;
  readonly sourceLanguage: string;
  readonly targetLanguage: string;
  readonly audio: {
    readonly sampleRate: number;
    readonly frameMs: number;
    readonly normalize: boolean;
    readonly normalizeTarget: number;
  };
  readonly vad: {
    readonly energyThreshold: number;
    readonly onsetMs: number;
    readonly minSpeechMs: number;
    readonly hangMs: number;
    readonly maxSegmentMs: number;
  };
  readonly pipeline: {
    readonly maxInFlight: number;
    readonly maxPending: number;
    readonly maxAttempts: number;
    readonly retryBaseMs: number;
    readonly retryMaxMs: number;
    readonly stalenessMs: number;
    readonly degradedAfter: number;
    readonly shutdownGraceMs: number;
  };
  readonly broadcast: {
    readonly host: string;
    readonly port: number;
    readonly queueDepth: number;
    readonly maxViewers: number;
    readonly heartbeatIntervalMs: number;
    readonly heartbeatTimeoutMs: number;
  };
  readonly capture: {
    readonly command: string;
    readonly inputFormat: string;
    readonly device: string;
  };
  readonly overlay: {
    readonly showOriginal: boolean;
  };
  readonly nats?: {
    readonly url: string;
    readonly subjectPrefix: string;
  };
};

const int = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true");

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z
  .object({
    ASR_URL: z.string().url().default("http://127.0.0.1:9000/asr"),
    ASR_API_STYLE: z.enum(["asr-webservice", "openai"]).default("asr-webservice"),
    ASR_MODEL: z.string().min(1).default("medium"),
    ASR_TIMEOUT_MS: int(500, 300_000, 30_000),

    TRANSLATION_URL: z.string().url().default("http://127.0.0.1:11434/api/chat"),
    TRANSLATION_API_STYLE: z.enum(["ollama", "openai"]).default("ollama"),
    TRANSLATION_MODEL: z.string().min(1).default("qwen2.5:7b"),
    TRANSLATION_TIMEOUT_MS: int(500, 300_000, 30_000),
    TRANSLATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    TRANSLATION_MAX_TOKENS: int(16, 8192, 500),
    TRANSLATION_CONTEXT_SIZE: int(0, 50, 5),

    API_KEY: optionalText,
    SOURCE_LANGUAGE: z.string().min(2).default("ja"),
    TARGET_LANGUAGE: z.string().min(2).default("zh"),

    SAMPLE_RATE: int(8000, 48_000, 16_000),
    FRAME_MS: int(10, 100, 30),
    AUDIO_NORMALIZE: flag(true),
    AUDIO_NORMALIZE_TARGET: int(1000, 32_767, 30_000),

    VAD_ENERGY_THRESHOLD: z.coerce.number().min(0).max(32_767).default(300),
    VAD_ONSET_MS: int(0, 2000, 90),
    VAD_MIN_SPEECH_MS: int(0, 10_000, 500),
    VAD_HANG_MS: int(50, 10_000, 600),
    VAD_MAX_SEGMENT_MS: int(1000, 120_000, 15_000),

    PIPELINE_MAX_IN_FLIGHT: int(1, 64, 3),
    PIPELINE_MAX_PENDING: int(1, 1024, 16),
    PIPELINE_MAX_ATTEMPTS: int(1, 10, 3),
    PIPELINE_RETRY_BASE_MS: int(0, 60_000, 250),
    PIPELINE_RETRY_MAX_MS: int(0, 120_000, 4000),
    PIPELINE_STALENESS_MS: int(1000, 600_000, 20_000),
    PIPELINE_DEGRADED_AFTER: int(1, 1000, 5),
    PIPELINE_SHUTDOWN_GRACE_MS: int(0, 60_000, 2000),

    BROADCAST_HOST: z.string().min(1).default("0.0.0.0"),
    BROADCAST_PORT: int(0, 65_535, 8765),
    BROADCAST_QUEUE_DEPTH: int(1, 10_000, 32),
    BROADCAST_MAX_VIEWERS: int(1, 100_000, 100),
    HEARTBEAT_INTERVAL_MS: int(100, 600_000, 10_000),
    HEARTBEAT_TIMEOUT_MS: int(200, 3_600_000, 30_000),

    CAPTURE_COMMAND: z.string().min(1).default("ffmpeg"),
    CAPTURE_INPUT_FORMAT: z.string().min(1).default("pulse"),
    CAPTURE_DEVICE: z.string().min(1).default("default"),

    OVERLAY_SHOW_ORIGINAL: flag(true),

    NATS_URL: optionalText,
    NATS_SUBJECT_PREFIX: z.string().min(1).default("subtitles"),
  })
  .superRefine((env, ctx) => {
    if (env.VAD_ONSET_MS > env.VAD_MIN_SPEECH_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["VAD_ONSET_MS"],
        message: "must not exceed VAD_MIN_SPEECH_MS",
      });
    }
    if (env.VAD_MIN_SPEECH_MS >= env.VAD_MAX_SEGMENT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["VAD_MIN_SPEECH_MS"],
        message: "must be below VAD_MAX_SEGMENT_MS",
      });
    }
    if (env.HEARTBEAT_INTERVAL_MS >= env.HEARTBEAT_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["HEARTBEAT_INTERVAL_MS"],
        message: "must be below HEARTBEAT_TIMEOUT_MS",
      });
    }
    if (env.PIPELINE_RETRY_BASE_MS > env.PIPELINE_RETRY_MAX_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PIPELINE_RETRY_BASE_MS"],
        message: "must not exceed PIPELINE_RETRY_MAX_MS",
      });
    }
  });

const deepFreeze = <T extends object>(value: T): T => {
  for (const child of Object.values(value)) {
    if (child && typeof child === "object") deepFreeze(child);
  }
  return Object.freeze(value);
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
      )
    );
  }
  const e = parsed.data;

  return deepFreeze<AppConfig>({
    asr: {
      url: e.ASR_URL,
      apiStyle: e.ASR_API_STYLE,
      model: e.ASR_MODEL,
      timeoutMs: e.ASR_TIMEOUT_MS,
    },
    translation: {
      url: e.TRANSLATION_URL,
      apiStyle: e.TRANSLATION_API_STYLE,
      model: e.TRANSLATION_MODEL,
      timeoutMs: e.TRANSLATION_TIMEOUT_MS,
      temperature: e.TRANSLATION_TEMPERATURE,
      maxTokens: e.TRANSLATION_MAX_TOKENS,
      contextSize: e.TRANSLATION_CONTEXT_SIZE,
    },
    apiKey: e.API_KEY,
    sourceLanguage: e.SOURCE_LANGUAGE,
    targetLanguage: e.TARGET_LANGUAGE,
    audio: {
      sampleRate: e.SAMPLE_RATE,
      frameMs: e.FRAME_MS,
      normalize: e.AUDIO_NORMALIZE,
      normalizeTarget: e.AUDIO_NORMALIZE_TARGET,
    },
    vad: {
      energyThreshold: e.VAD_ENERGY_THRESHOLD,
      onsetMs: e.VAD_ONSET_MS,
      minSpeechMs: e.VAD_MIN_SPEECH_MS,
      hangMs: e.VAD_HANG_MS,
      maxSegmentMs: e.VAD_MAX_SEGMENT_MS,
    },
    pipeline: {
      maxInFlight: e.PIPELINE_MAX_IN_FLIGHT,
      maxPending: e.PIPELINE_MAX_PENDING,
      maxAttempts: e.PIPELINE_MAX_ATTEMPTS,
      retryBaseMs: e.PIPELINE_RETRY_BASE_MS,
      retryMaxMs: e.PIPELINE_RETRY_MAX_MS,
      stalenessMs: e.PIPELINE_STALENESS_MS,
      degradedAfter: e.PIPELINE_DEGRADED_AFTER,
      shutdownGraceMs: e.PIPELINE_SHUTDOWN_GRACE_MS,
    },
    broadcast: {
      host: e.BROADCAST_HOST,
      port: e.BROADCAST_PORT,
      queueDepth: e.BROADCAST_QUEUE_DEPTH,
      maxViewers: e.BROADCAST_MAX_VIEWERS,
      heartbeatIntervalMs: e.HEARTBEAT_INTERVAL_MS,
      heartbeatTimeoutMs: e.HEARTBEAT_TIMEOUT_MS,
    },
    capture: {
      command: e.CAPTURE_COMMAND,
      inputFormat: e.CAPTURE_INPUT_FORMAT,
      device: e.CAPTURE_DEVICE,
    },
    overlay: {
      showOriginal: e.OVERLAY_SHOW_ORIGINAL,
    },
    nats: e.NATS_URL
      ? { url: e.NATS_URL, subjectPrefix: e.NATS_SUBJECT_PREFIX }
      : undefined,
  });
}

// .env is read once, at startup, before the first loadConfig()
export function loadEnvFile(): void {
  dotenv.config();
}
