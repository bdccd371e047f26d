import type { AudioFrame } from "../ports/segment.js";
import { bytesForDuration } from "./pcm.js";

/**
 * Cuts an arbitrary-sized PCM byte stream into fixed-size frames.
 * Timestamps are derived from the number of samples seen, so they stay
 * monotonic no matter how the chunks arrive.
 */
export class PcmFramer {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly frameBytes: number;
  private readonly frameDurationMs: number;
  private emittedMs = 0;

  constructor(
    private readonly sampleRate: number,
    frameMs: number,
    private readonly origin = 0
  ) {
    this.frameBytes = bytesForDuration(frameMs, sampleRate);
    this.frameDurationMs = (this.frameBytes / 2 / sampleRate) * 1000;
  }

  write(payload: Buffer): AudioFrame[] {
    if (!Buffer.isBuffer(payload) || payload.length === 0) return [];

    this.buffer =
      this.buffer.length === 0 ? payload : Buffer.concat([this.buffer, payload]);

    const frames: AudioFrame[] = [];
    while (this.buffer.length >= this.frameBytes) {
      // copy so the frame does not pin the whole chunk it was cut from
      const pcm = Buffer.from(this.buffer.subarray(0, this.frameBytes));
      this.buffer = this.buffer.subarray(this.frameBytes);
      frames.push({
        pcm,
        sampleRate: this.sampleRate,
        capturedAt: this.origin + this.emittedMs,
        durationMs: this.frameDurationMs,
      });
      this.emittedMs += this.frameDurationMs;
    }
    return frames;
  }

  reset() {
    this.buffer = Buffer.alloc(0);
  }
}
