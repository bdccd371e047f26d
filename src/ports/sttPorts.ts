import type { RecognitionError, TranslationError } from "../errors.js";
import type { Result } from "./result.js";
import type { Segment } from "./segment.js";

export type RecognitionResult = {
  sequence: number;
  text: string;
  language?: string;
  confidence?: number;
};

export interface SpeechRecognizerPort {
  recognize(
    segment: Segment,
    signal?: AbortSignal
  ): Promise<Result<RecognitionResult, RecognitionError>>;
  checkHealth?(): Promise<boolean>;
}

export interface TranslatorPort {
  translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<Result<string, TranslationError>>;
  remember?(source: string, translated: string): void;
  checkHealth?(): Promise<boolean>;
}
