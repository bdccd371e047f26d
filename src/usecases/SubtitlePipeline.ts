import {
  isRetryable,
  SegmentFailedError,
  type SegmentFailureReason,
  type StageError,
} from "../errors.js";
import type { Result } from "../ports/result.js";
import type { Segment, SegmentState, TerminalState } from "../ports/segment.js";
import type { SpeechRecognizerPort, TranslatorPort } from "../ports/sttPorts.js";
import type { SubtitleEvent } from "../ports/transcriptPublisher.js";
import { backoffDelay, sleep } from "../stream/backoff.js";
import { ReorderBuffer } from "../stream/ReorderBuffer.js";

export type PipelineOptions = {
  sessionId: string;
  sourceLanguage: string;
  targetLanguage: string;
  maxInFlight: number;
  maxPending: number;
  maxAttempts: number;
  retryBaseMs: number;
  retryMaxMs: number;
  stalenessMs: number;
  degradedAfter: number;
  shutdownGraceMs: number;
};

export type Stage = "recognition" | "translation";
export type HealthState = "healthy" | "degraded";
export type DiscardReason = "empty_result" | "cancelled" | "overflow" | "shutdown";

export type SegmentOutcome =
  | {
      sequence: number;
      state: "completed";
      elapsedMs: number;
      originalText: string;
      translatedText: string;
    }
  | { sequence: number; state: "failed"; elapsedMs: number; error: SegmentFailedError }
  | { sequence: number; state: "discarded"; elapsedMs: number; reason: DiscardReason };

export interface PipelineObserver {
  onResolved?(outcome: SegmentOutcome): void;
  onHealthChange?(stage: Stage, state: HealthState): void;
  onStageLatency?(stage: Stage, ms: number, succeeded: boolean): void;
}

export type PipelineHealth = {
  status: HealthState;
  recognition: HealthState;
  translation: HealthState;
  inFlight: number;
  pending: number;
  waiting: number;
};

export interface SubtitleSink {
  publish(event: SubtitleEvent): unknown;
}

type Completed = { originalText: string; translatedText: string };

type SegmentTask = {
  segment: Segment;
  state: SegmentState;
  submittedAt: number;
  controller: AbortController;
  staleTimer: NodeJS.Timeout | undefined;
  lastError: StageError | undefined;
};

type Resolution =
  | { state: "completed"; value: Completed }
  | { state: "failed"; reason: SegmentFailureReason }
  | { state: "discarded"; reason: DiscardReason };

const isTerminal = (state: SegmentState): state is TerminalState =>
  state === "completed" || state === "failed" || state === "discarded";

/**
 * Owns every sealed segment until it reaches a terminal state.
 *
 * Up to `maxInFlight` segments run recognition and translation at once and
 * may finish in any order; the reorder buffer only hands a subtitle to the
 * sink once every earlier segment has settled. A completed subtitle held
 * behind a slower predecessor keeps its slot until it is released. The
 * reorder buffer, the task table and the slot set are touched only from
 * this class.
 */
export class SubtitlePipeline {
  private readonly tasks = new Map<number, SegmentTask>();
  private pending: SegmentTask[] = [];
  private inFlight = 0;
  /** Dispatched segments that are running or completed but not yet released. */
  private readonly slots = new Set<number>();
  private accepting = true;
  private stopping: Promise<void> | null = null;
  private readonly running = new Set<Promise<void>>();
  private readonly reorder: ReorderBuffer<Completed>;
  private readonly consecutiveFailures: Record<Stage, number> = {
    recognition: 0,
    translation: 0,
  };
  private readonly healthByStage: Record<Stage, HealthState> = {
    recognition: "healthy",
    translation: "healthy",
  };

  constructor(
    private readonly recognizer: SpeechRecognizerPort,
    private readonly translator: TranslatorPort,
    private readonly sink: SubtitleSink,
    private readonly options: PipelineOptions,
    private readonly observer: PipelineObserver = {}
  ) {
    this.reorder = new ReorderBuffer((sequence, value) =>
      this.release(sequence, value)
    );
  }

  /** Never waits: the capture loop calls this between two frames. */
  submit(segment: Segment): boolean {
    if (!this.accepting) {
      this.report({
        sequence: segment.sequence,
        state: "discarded",
        elapsedMs: 0,
        reason: "shutdown",
      });
      return false;
    }

    try {
      this.reorder.register(segment.sequence);
    } catch (error) {
      console.error("pipeline: segment rejected", error);
      this.report({
        sequence: segment.sequence,
        state: "failed",
        elapsedMs: 0,
        error: new SegmentFailedError(segment.sequence, "rejected"),
      });
      return false;
    }

    const task: SegmentTask = {
      segment,
      state: "sealed",
      submittedAt: Date.now(),
      controller: new AbortController(),
      staleTimer: undefined,
      lastError: undefined,
    };
    task.staleTimer = setTimeout(
      () => this.resolve(task, { state: "failed", reason: "stale" }),
      this.options.stalenessMs
    );
    this.tasks.set(segment.sequence, task);

    if (this.slots.size < this.options.maxInFlight) {
      this.dispatch(task);
      return true;
    }

    this.pending.push(task);
    if (this.pending.length > this.options.maxPending) {
      const oldest = this.pending[0];
      if (oldest) this.resolve(oldest, { state: "discarded", reason: "overflow" });
    }
    return true;
  }

  health(): PipelineHealth {
    const degraded =
      this.healthByStage.recognition === "degraded" ||
      this.healthByStage.translation === "degraded";
    return {
      status: degraded ? "degraded" : "healthy",
      recognition: this.healthByStage.recognition,
      translation: this.healthByStage.translation,
      inFlight: this.inFlight,
      pending: this.pending.length,
      waiting: this.reorder.waiting,
    };
  }

  /**
   * Stops accepting segments, drops the ones not yet dispatched and gives
   * in-flight work `graceMs` to finish before cancelling it.
   */
  stop(graceMs = this.options.shutdownGraceMs): Promise<void> {
    if (this.stopping) return this.stopping;
    this.accepting = false;

    const work = (async () => {
      for (const task of [...this.pending]) {
        this.resolve(task, { state: "discarded", reason: "shutdown" });
      }

      if (this.running.size > 0) {
        const grace = new AbortController();
        await Promise.race([
          Promise.allSettled([...this.running]),
          sleep(graceMs, grace.signal),
        ]);
        grace.abort();
      }

      for (const task of [...this.tasks.values()]) {
        this.resolve(task, { state: "discarded", reason: "shutdown" });
      }
      await Promise.allSettled([...this.running]);
      console.log("pipeline stopped");
    })();

    this.stopping = work;
    return work;
  }

  private dispatch(task: SegmentTask) {
    task.state = "dispatched";
    this.inFlight++;
    this.slots.add(task.segment.sequence);

    const run: Promise<void> = this.process(task)
      .catch((error) => {
        console.error(`pipeline: segment ${task.segment.sequence} crashed`, error);
        this.resolve(task, { state: "failed", reason: "rejected" });
      })
      .finally(() => {
        this.inFlight--;
        this.running.delete(run);
        // a completed subtitle frees its slot in release()
        if (task.state !== "completed") this.slots.delete(task.segment.sequence);
        this.pumpPending();
      });
    this.running.add(run);
  }

  private pumpPending() {
    while (this.accepting && this.slots.size < this.options.maxInFlight) {
      const next = this.pending.shift();
      if (!next) return;
      this.dispatch(next);
    }
  }

  private async process(task: SegmentTask): Promise<void> {
    const { segment, controller } = task;
    const { sourceLanguage, targetLanguage } = this.options;

    const recognized = await this.runStage(task, "recognition", () =>
      this.recognizer.recognize(segment, controller.signal)
    );
    if (recognized === undefined) return;

    const translated = await this.runStage(task, "translation", () =>
      this.translator.translate(
        recognized.text,
        sourceLanguage,
        targetLanguage,
        controller.signal
      )
    );
    if (translated === undefined) return;

    this.resolve(task, {
      state: "completed",
      value: { originalText: recognized.text, translatedText: translated },
    });
  }

  /** Returns undefined once the task has been resolved some other way. */
  private async runStage<T>(
    task: SegmentTask,
    stage: Stage,
    call: () => Promise<Result<T, StageError>>
  ): Promise<T | undefined> {
    const sequence = task.segment.sequence;

    for (let attempt = 1; ; attempt++) {
      if (isTerminal(task.state)) return undefined;

      const startedAt = Date.now();
      const result = await call();
      this.observer.onStageLatency?.(stage, Date.now() - startedAt, result.ok);

      if (isTerminal(task.state)) return undefined;
      if (result.ok) {
        this.recordSuccess(stage);
        return result.value;
      }

      const error = result.error;
      task.lastError = error;

      if (error.kind === "cancelled" || error.kind === "empty_result") {
        this.resolve(task, { state: "discarded", reason: error.kind });
        return undefined;
      }

      this.recordFailure(stage);

      if (!isRetryable(error)) {
        this.resolve(task, { state: "failed", reason: "rejected" });
        return undefined;
      }
      if (attempt >= this.options.maxAttempts) {
        this.resolve(task, { state: "failed", reason: "retries_exhausted" });
        return undefined;
      }

      const delay = backoffDelay(attempt, {
        baseMs: this.options.retryBaseMs,
        maxMs: this.options.retryMaxMs,
      });
      console.warn(
        `pipeline: segment ${sequence} ${stage} attempt ${attempt} failed (${error.kind}), retrying in ${delay}ms`
      );
      const slept = await sleep(delay, task.controller.signal);
      if (!slept) return undefined;
    }
  }

  private resolve(task: SegmentTask, resolution: Resolution): boolean {
    if (isTerminal(task.state)) return false;

    const sequence = task.segment.sequence;
    task.state = resolution.state;
    clearTimeout(task.staleTimer);
    task.controller.abort();
    this.tasks.delete(sequence);
    this.pending = this.pending.filter((t) => t !== task);

    const elapsedMs = Date.now() - task.submittedAt;

    if (resolution.state === "completed") {
      // report before settling so observers see outcomes ahead of the publish
      this.report({ sequence, state: "completed", elapsedMs, ...resolution.value });
      this.reorder.settle(sequence, resolution.value);
      return true;
    }

    if (resolution.state === "failed") {
      const error = new SegmentFailedError(sequence, resolution.reason, task.lastError);
      console.warn(`pipeline: ${error.message}`);
      this.reorder.settle(sequence);
      this.report({ sequence, state: "failed", elapsedMs, error });
      return true;
    }

    this.reorder.settle(sequence);
    this.report({ sequence, state: "discarded", elapsedMs, reason: resolution.reason });
    return true;
  }

  private release(sequence: number, value: Completed) {
    const event: SubtitleEvent = {
      sessionId: this.options.sessionId,
      sequence,
      originalText: value.originalText,
      translatedText: value.translatedText,
      sourceLanguage: this.options.sourceLanguage,
      targetLanguage: this.options.targetLanguage,
      emittedAt: new Date().toISOString(),
    };
    this.sink.publish(event);
    this.translator.remember?.(value.originalText, value.translatedText);
    this.slots.delete(sequence);
    this.pumpPending();
  }

  private recordSuccess(stage: Stage) {
    this.consecutiveFailures[stage] = 0;
    if (this.healthByStage[stage] === "degraded") {
      this.healthByStage[stage] = "healthy";
      console.log(`pipeline: ${stage} backend recovered`);
      this.observer.onHealthChange?.(stage, "healthy");
    }
  }

  private recordFailure(stage: Stage) {
    this.consecutiveFailures[stage]++;
    if (
      this.healthByStage[stage] === "healthy" &&
      this.consecutiveFailures[stage] >= this.options.degradedAfter
    ) {
      this.healthByStage[stage] = "degraded";
      console.warn(
        `pipeline: ${stage} backend degraded after ${this.consecutiveFailures[stage]} consecutive failures`
      );
      this.observer.onHealthChange?.(stage, "degraded");
    }
  }

  private report(outcome: SegmentOutcome) {
    this.observer.onResolved?.(outcome);
  }
}
