import type { Readable } from "node:stream";
import type {
  AudioConsumerPort,
  StopStreaming,
} from "../ports/audioConsumerPort.js";
import type { Segment } from "../ports/segment.js";
import { PcmFramer } from "../stream/PcmFramer.js";
import type { VoiceActivitySegmenter } from "../stream/VoiceActivitySegmenter.js";

export interface SegmentSubmitter {
  submit(segment: Segment): boolean;
  stop(graceMs?: number): Promise<void>;
}

export type CaptureOptions = {
  sampleRate: number;
  frameMs: number;
};

/**
 * Capture loop: PCM bytes -> frames -> segmenter -> pipeline.
 * Nothing in here awaits network work; a slow backend can only grow the
 * pipeline's pending queue, never stall the reader.
 */
export class CaptureOrchestrator implements AudioConsumerPort {
  private stopFlag = false;
  private pump: Promise<void> | null = null;

  constructor(
    private readonly segmenter: VoiceActivitySegmenter,
    private readonly pipeline: SegmentSubmitter,
    private readonly options: CaptureOptions
  ) {}

  async start(pcmReadable: Readable): Promise<StopStreaming> {
    const framer = new PcmFramer(this.options.sampleRate, this.options.frameMs);

    this.pump = (async () => {
      for await (const chunk of pcmReadable) {
        if (this.stopFlag) return;
        if (!Buffer.isBuffer(chunk)) continue;

        for (const frame of framer.write(chunk)) {
          const segment = this.segmenter.push(frame);
          if (segment) this.pipeline.submit(segment);
        }
      }
      console.log("capture: pcm stream ended");
    })().catch((e) => console.error("pcm pump error", e));

    return async () => {
      if (this.stopFlag) return;
      this.stopFlag = true;
      // audio not yet sealed is not worth sending
      this.segmenter.reset();
      framer.reset();
      await this.pipeline.stop();
      console.log("stream stopped");
    };
  }

  /** Settles once the PCM stream has ended or failed. */
  finished(): Promise<void> {
    return this.pump ?? Promise.resolve();
  }
}
