import { z } from "zod";
import type { AsrApiStyle } from "../config.js";
import { RecognitionError } from "../errors.js";
import { err, ok, type Result } from "../ports/result.js";
import type { Segment } from "../ports/segment.js";
import type {
  RecognitionResult,
  SpeechRecognizerPort,
} from "../ports/sttPorts.js";
import { encodeWav, normalizePeak } from "../stream/pcm.js";
import { describeError, parseJson, timedFetch } from "./timedFetch.js";

export type HttpSpeechRecognizerOptions = {
  url: string;
  apiStyle: AsrApiStyle;
  model: string;
  language: string;
  timeoutMs: number;
  apiKey?: string;
  normalizeTarget?: number;
};

const TranscriptBody = z.object({
  text: z.string(),
  language: z.string().optional(),
});

export class HttpSpeechRecognizer implements SpeechRecognizerPort {
  constructor(private readonly options: HttpSpeechRecognizerOptions) {}

  async recognize(
    segment: Segment,
    signal?: AbortSignal
  ): Promise<Result<RecognitionResult, RecognitionError>> {
    const pcm =
      this.options.normalizeTarget !== undefined
        ? normalizePeak(segment.pcm, this.options.normalizeTarget)
        : segment.pcm;
    const wav = encodeWav(pcm, segment.sampleRate);

    const outcome = await timedFetch(
      this.endpoint(),
      { method: "POST", body: this.buildForm(wav), headers: this.headers() },
      this.options.timeoutMs,
      signal
    );

    switch (outcome.kind) {
      case "cancelled":
        return err(new RecognitionError("cancelled", "recognition cancelled"));
      case "timeout":
        return err(
          new RecognitionError(
            "timeout",
            `recognition timed out after ${this.options.timeoutMs}ms`
          )
        );
      case "unreachable":
        return err(
          new RecognitionError(
            "unreachable",
            `recognition endpoint unreachable: ${describeError(outcome.error)}`
          )
        );
    }

    if (!outcome.ok) {
      return err(
        new RecognitionError(
          "server_error",
          `recognition endpoint answered ${outcome.status}: ${outcome.body.slice(0, 200)}`,
          outcome.status
        )
      );
    }

    const parsed = TranscriptBody.safeParse(parseJson(outcome.body));
    if (!parsed.success) {
      // a proxy error page is a broken endpoint, not silence
      return err(
        new RecognitionError(
          "malformed_response",
          `unreadable transcript: ${outcome.body.slice(0, 200)}`
        )
      );
    }

    const text = parsed.data.text.trim();
    if (!text) {
      return err(new RecognitionError("empty_result", "empty transcript"));
    }

    return ok({
      sequence: segment.sequence,
      text,
      language: parsed.data.language || this.options.language,
    });
  }

  /** Sends 250 ms of silence; a 422 still proves the service is up. */
  async checkHealth(): Promise<boolean> {
    const silence = Buffer.alloc(8000);
    const outcome = await timedFetch(
      this.endpoint(),
      {
        method: "POST",
        body: this.buildForm(encodeWav(silence, 16000)),
        headers: this.headers(),
      },
      Math.min(this.options.timeoutMs, 15_000)
    );
    if (outcome.kind !== "response") return false;
    return outcome.ok || outcome.status === 422;
  }

  private endpoint(): string {
    if (this.options.apiStyle === "openai") return this.options.url;

    const url = new URL(this.options.url);
    if (!url.pathname.endsWith("/asr")) {
      url.pathname = `${url.pathname.replace(/\/+$/, "")}/asr`;
    }
    url.searchParams.set("language", this.options.language);
    url.searchParams.set("task", "transcribe");
    url.searchParams.set("output", "json");
    return url.toString();
  }

  private buildForm(wav: Buffer): FormData {
    const form = new FormData();
    const file = new Blob([wav], { type: "audio/wav" });

    if (this.options.apiStyle === "openai") {
      form.append("file", file, "audio.wav");
      form.append("model", this.options.model);
      form.append("language", this.options.language);
      form.append("response_format", "json");
    } else {
      form.append("audio_file", file, "audio.wav");
    }
    return form;
  }

  private headers(): Record<string, string> {
    return this.options.apiKey
      ? { Authorization: `Bearer ${this.options.apiKey}` }
      : {};
  }
}
