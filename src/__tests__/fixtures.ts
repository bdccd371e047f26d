import type { AudioFrame, Segment } from "../ports/segment.js";
import type { SubtitleEvent } from "../ports/transcriptPublisher.js";
import type { ViewerSocket } from "../viewers/ViewerSocket.js";

export const SAMPLE_RATE = 16000;

/** s16le samples alternating +amplitude / -amplitude, so energy == amplitude. */
export function tone(amplitude: number, ms: number, sampleRate = SAMPLE_RATE): Buffer {
  const samples = Math.round((sampleRate * ms) / 1000);
  const pcm = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i++) {
    pcm.writeInt16LE(i % 2 === 0 ? amplitude : -amplitude, i * 2);
  }
  return pcm;
}

export const frame = (amplitude: number, capturedAt = 0, ms = 30): AudioFrame => ({
  pcm: tone(amplitude, ms),
  sampleRate: SAMPLE_RATE,
  capturedAt,
  durationMs: ms,
});

export const segment = (sequence: number): Segment => ({
  sequence,
  pcm: tone(1000, 100),
  sampleRate: SAMPLE_RATE,
  startedAt: 0,
  endedAt: 100,
  durationMs: 100,
  voicedMs: 100,
  sealReason: "silence",
});

export const subtitle = (sequence: number): SubtitleEvent => ({
  sessionId: "session-1",
  sequence,
  originalText: `original ${sequence}`,
  translatedText: `translated ${sequence}`,
  sourceLanguage: "ja",
  targetLanguage: "zh",
  emittedAt: "2026-01-01T00:00:00.000Z",
});

export class FakeSocket implements ViewerSocket {
  readonly sent: string[] = [];
  open = true;
  pings = 0;
  closedWith: { code: number; reason: string } | undefined;
  terminated = false;
  failSends = false;
  private messageHandlers: ((text: string) => void)[] = [];
  private pongHandlers: (() => void)[] = [];
  private closeHandlers: ((code: number) => void)[] = [];

  isOpen() {
    return this.open;
  }

  send(text: string): Promise<void> {
    if (this.failSends) return Promise.reject(new Error("socket write failed"));
    this.sent.push(text);
    return Promise.resolve();
  }

  ping() {
    this.pings++;
  }

  close(code: number, reason: string) {
    this.closedWith = { code, reason };
    this.open = false;
  }

  terminate() {
    this.terminated = true;
    this.open = false;
  }

  onMessage(handler: (text: string) => void) {
    this.messageHandlers.push(handler);
  }

  onPong(handler: () => void) {
    this.pongHandlers.push(handler);
  }

  onClose(handler: (code: number) => void) {
    this.closeHandlers.push(handler);
  }

  onError(_handler: (error: Error) => void) {}

  receive(text: string) {
    for (const handler of this.messageHandlers) handler(text);
  }

  pong() {
    for (const handler of this.pongHandlers) handler();
  }

  peerClose(code = 1000) {
    this.open = false;
    for (const handler of this.closeHandlers) handler(code);
  }

  messages(): unknown[] {
    return this.sent.map((text) => JSON.parse(text));
  }
}
