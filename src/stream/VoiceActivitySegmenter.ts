import type {
  AudioFrame,
  ISequenceAllocator,
  SealReason,
  Segment,
} from "../ports/segment.js";
import { frameEnergy } from "./pcm.js";
import { SequenceAllocator } from "./SequenceAllocator.js";

export type SegmenterOptions = {
  energyThreshold: number;
  onsetMs: number;
  minSpeechMs: number;
  hangMs: number;
  maxSegmentMs: number;
};

type VadState = "SILENCE" | "SPEECH";

export type SegmenterStats = {
  sealed: number;
  discarded: number;
  droppedFrames: number;
};

/**
 * Energy-based utterance detector.
 *
 * SILENCE -> SPEECH once loud frames have lasted `onsetMs`; SPEECH -> SILENCE
 * once quiet frames have lasted `hangMs`. Quiet frames in SILENCE are never
 * buffered, so memory stays under one `maxSegmentMs` worth of audio.
 */
export class VoiceActivitySegmenter {
  private state: VadState = "SILENCE";
  private onset: AudioFrame[] = [];
  private onsetMs = 0;
  private frames: AudioFrame[] = [];
  private bufferedMs = 0;
  private voicedMs = 0;
  private silenceMs = 0;
  private readonly counters: SegmenterStats = {
    sealed: 0,
    discarded: 0,
    droppedFrames: 0,
  };

  constructor(
    private readonly options: SegmenterOptions,
    private readonly sequences: ISequenceAllocator = new SequenceAllocator(),
    private readonly onDiscard?: (durationMs: number, voicedMs: number) => void
  ) {}

  get currentState(): VadState {
    return this.state;
  }

  get stats(): SegmenterStats {
    return { ...this.counters };
  }

  push(frame: AudioFrame): Segment | undefined {
    const loud = frameEnergy(frame.pcm) >= this.options.energyThreshold;

    if (this.state === "SILENCE") {
      this.trackOnset(frame, loud);
      return undefined;
    }

    this.frames.push(frame);
    this.bufferedMs += frame.durationMs;
    if (loud) {
      this.voicedMs += frame.durationMs;
      this.silenceMs = 0;
    } else {
      this.silenceMs += frame.durationMs;
    }

    if (this.silenceMs >= this.options.hangMs) {
      const segment = this.seal("silence");
      this.state = "SILENCE";
      return segment;
    }

    if (this.bufferedMs >= this.options.maxSegmentMs) {
      // continuous speech or noise: cut here and keep listening in SPEECH
      return this.seal("max_duration");
    }

    return undefined;
  }

  /** Drops whatever is being accumulated without emitting it. */
  reset(): void {
    this.state = "SILENCE";
    this.clearOnset();
    this.clearSegment();
  }

  private trackOnset(frame: AudioFrame, loud: boolean) {
    if (!loud) {
      this.counters.droppedFrames += 1 + this.onset.length;
      this.clearOnset();
      return;
    }

    this.onset.push(frame);
    this.onsetMs += frame.durationMs;
    if (this.onsetMs < this.options.onsetMs) return;

    this.state = "SPEECH";
    this.frames = this.onset;
    this.bufferedMs = this.onsetMs;
    this.voicedMs = this.onsetMs;
    this.silenceMs = 0;
    this.onset = [];
    this.onsetMs = 0;
  }

  private seal(reason: SealReason): Segment | undefined {
    const frames = this.frames;
    const durationMs = this.bufferedMs;
    const voicedMs = this.voicedMs;
    this.clearSegment();

    const first = frames[0];
    const last = frames[frames.length - 1];
    if (!first || !last) return undefined;

    if (voicedMs < this.options.minSpeechMs) {
      this.counters.discarded += 1;
      this.onDiscard?.(durationMs, voicedMs);
      return undefined;
    }

    this.counters.sealed += 1;
    return {
      sequence: this.sequences.next(),
      pcm: Buffer.concat(frames.map((f) => f.pcm)),
      sampleRate: first.sampleRate,
      startedAt: first.capturedAt,
      endedAt: last.capturedAt + last.durationMs,
      durationMs,
      voicedMs,
      sealReason: reason,
    };
  }

  private clearOnset() {
    this.onset = [];
    this.onsetMs = 0;
  }

  private clearSegment() {
    this.frames = [];
    this.bufferedMs = 0;
    this.voicedMs = 0;
    this.silenceMs = 0;
  }
}
