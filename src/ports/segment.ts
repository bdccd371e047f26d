export type AudioFrame = {
  readonly pcm: Buffer;
  readonly sampleRate: number;
  readonly capturedAt: number;
  readonly durationMs: number;
};

export type SealReason = "silence" | "max_duration";

export type Segment = {
  readonly sequence: number;
  readonly pcm: Buffer;
  readonly sampleRate: number;
  readonly startedAt: number;
  readonly endedAt: number;
  readonly durationMs: number;
  readonly voicedMs: number;
  readonly sealReason: SealReason;
};

export type SegmentState =
  | "accumulating"
  | "sealed"
  | "dispatched"
  | "completed"
  | "failed"
  | "discarded";

export type TerminalState = Extract<SegmentState, "completed" | "failed" | "discarded">;

export interface ISequenceAllocator {
  next(): number;
}
