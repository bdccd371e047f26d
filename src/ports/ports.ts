import type { Readable } from "node:stream";

// 캡처 소스 인터페이스 (s16le mono PCM)
export interface AudioFrameSource {
  start(): {
    pcmReadable: Readable;
    stop: () => void;
  };
}
