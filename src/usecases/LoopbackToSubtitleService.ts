import type { AudioFrameSource } from "../ports/ports.js";
import type { AudioConsumerPort } from "../ports/audioConsumerPort.js";

export class LoopbackToSubtitleService {
  constructor(
    private readonly source: AudioFrameSource,
    private readonly consumer: AudioConsumerPort
  ) {}

  async run(): Promise<() => Promise<void>> {
    console.log("capture service run");

    const { pcmReadable, stop: stopSource } = this.source.start();

    let streamStop: () => Promise<void>;
    try {
      streamStop = await this.consumer.start(pcmReadable);
    } catch (err) {
      stopSource();
      throw err;
    }

    let stopping: Promise<void> | null = null;

    return () => {
      if (stopping) return stopping;
      // 캡처 먼저 끊고, 그 다음 파이프라인 정리
      stopSource();
      stopping = streamStop();
      return stopping;
    };
  }
}
