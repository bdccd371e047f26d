import { z } from "zod";
import type { TranslationApiStyle } from "../config.js";
import { TranslationError } from "../errors.js";
import { err, ok, type Result } from "../ports/result.js";
import type { TranslatorPort } from "../ports/sttPorts.js";
import { describeError, parseJson, timedFetch } from "./timedFetch.js";

export type HttpTranslatorOptions = {
  url: string;
  apiStyle: TranslationApiStyle;
  model: string;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  contextSize: number;
  apiKey?: string;
};

type ChatMessage = { role: "system" | "user"; content: string };

const OllamaBody = z.union([
  z.object({ message: z.object({ content: z.string() }) }),
  z.object({ response: z.string() }),
]);

const OpenAiBody = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const displayNames = new Intl.DisplayNames(["en"], { type: "language" });

export const languageName = (code: string) => {
  try {
    return displayNames.of(code) ?? code;
  } catch {
    // not a BCP 47 tag; hand it to the model as written
    return code;
  }
};

export function buildSystemPrompt(sourceLanguage: string, targetLanguage: string) {
  const source = languageName(sourceLanguage);
  const target = languageName(targetLanguage);
  return [
    `You are a real-time subtitle translator from ${source} to ${target}.`,
    `Translate the user's ${source} text into natural ${target}.`,
    "Keep the tone and register of the original.",
    "Output only the translation, with no notes or explanations.",
    "If the text cannot be translated, repeat it unchanged.",
  ].join("\n");
}

export class HttpTranslator implements TranslatorPort {
  private history: string[] = [];

  constructor(private readonly options: HttpTranslatorOptions) {}

  async translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<Result<string, TranslationError>> {
    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemPrompt(sourceLanguage, targetLanguage) },
      { role: "user", content: this.buildUserMessage(text) },
    ];

    const outcome = await timedFetch(
      this.options.url,
      {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(this.buildPayload(messages, this.options.maxTokens)),
      },
      this.options.timeoutMs,
      signal
    );

    switch (outcome.kind) {
      case "cancelled":
        return err(new TranslationError("cancelled", "translation cancelled"));
      case "timeout":
        return err(
          new TranslationError(
            "timeout",
            `translation timed out after ${this.options.timeoutMs}ms`
          )
        );
      case "unreachable":
        return err(
          new TranslationError(
            "unreachable",
            `translation endpoint unreachable: ${describeError(outcome.error)}`
          )
        );
    }

    if (!outcome.ok) {
      return err(
        new TranslationError(
          "server_error",
          `translation endpoint answered ${outcome.status}: ${outcome.body.slice(0, 200)}`,
          outcome.status
        )
      );
    }

    const content = this.extractContent(parseJson(outcome.body));
    if (content === undefined) {
      return err(
        new TranslationError(
          "malformed_response",
          `unrecognised translation response: ${outcome.body.slice(0, 200)}`
        )
      );
    }

    // empty output still shows the line, untranslated
    return ok(content.trim() || text);
  }

  async checkHealth(): Promise<boolean> {
    const outcome = await timedFetch(
      this.options.url,
      {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(
          this.buildPayload([{ role: "user", content: "ping" }], 10)
        ),
      },
      Math.min(this.options.timeoutMs, 15_000)
    );
    return outcome.kind === "response" && outcome.ok;
  }

  clearContext() {
    this.history = [];
  }

  private buildUserMessage(text: string): string {
    const context = this.history.slice(-this.options.contextSize);
    if (this.options.contextSize === 0 || context.length === 0) return text;

    return [
      "Earlier lines, for context only:",
      ...context.map((line) => `- ${line}`),
      "",
      "Translate:",
      text,
    ].join("\n");
  }

  /** Called with published lines only, in sequence order. */
  remember(source: string, translated: string) {
    if (this.options.contextSize === 0) return;
    this.history.push(`${source} -> ${translated}`);
    if (this.history.length > this.options.contextSize * 2) {
      this.history = this.history.slice(-this.options.contextSize);
    }
  }

  private buildPayload(messages: ChatMessage[], maxTokens: number) {
    if (this.options.apiStyle === "openai") {
      return {
        model: this.options.model,
        messages,
        temperature: this.options.temperature,
        max_tokens: maxTokens,
        stream: false,
      };
    }
    return {
      model: this.options.model,
      messages,
      stream: false,
      options: {
        temperature: this.options.temperature,
        num_predict: maxTokens,
      },
    };
  }

  private extractContent(body: unknown): string | undefined {
    if (this.options.apiStyle === "openai") {
      const parsed = OpenAiBody.safeParse(body);
      if (!parsed.success) return undefined;
      return parsed.data.choices[0]?.message.content ?? "";
    }

    const parsed = OllamaBody.safeParse(body);
    if (!parsed.success) return undefined;
    return "message" in parsed.data
      ? parsed.data.message.content
      : parsed.data.response;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;
    return headers;
  }
}
