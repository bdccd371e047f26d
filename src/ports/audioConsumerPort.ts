import type { Readable } from "node:stream";

export type StopStreaming = () => Promise<void>;

export interface AudioConsumerPort {
  start(pcmReadable: Readable): Promise<StopStreaming>;
}
