import { z } from "zod";
import type {
  SubtitleEvent,
  SubtitleSubscriber,
} from "../ports/transcriptPublisher.js";
import type { ViewerSocket } from "./ViewerSocket.js";

export type ViewerState = "connecting" | "open" | "closing" | "dead";

const ClientMessage = z.object({
  type: z.enum(["ping", "heartbeat"]),
});

export type WelcomeMessage = {
  type: "welcome";
  connectionId: string;
  viewers: number;
};

export type SubtitleMessage = {
  type: "subtitle";
  sequence: number;
  translated: string;
  original: string;
  emittedAt: string;
};

export type StatusMessage = {
  type: "status";
  status: string;
  [detail: string]: unknown;
};

export const toSubtitleMessage = (event: SubtitleEvent): SubtitleMessage => ({
  type: "subtitle",
  sequence: event.sequence,
  translated: event.translatedText,
  original: event.originalText,
  emittedAt: event.emittedAt,
});

const parseMessage = (text: string) => {
  try {
    return ClientMessage.safeParse(JSON.parse(text));
  } catch {
    return undefined;
  }
};

export class ViewerConnection implements SubtitleSubscriber {
  private viewerState: ViewerState = "connecting";
  private lastHeartbeat: number;
  private lastDelivered: number | undefined;

  constructor(
    readonly id: string,
    private readonly socket: ViewerSocket,
    private readonly now: () => number = Date.now
  ) {
    this.lastHeartbeat = now();
    socket.onMessage((text) => this.handleMessage(text));
    socket.onPong(() => this.touch());
  }

  get state(): ViewerState {
    return this.viewerState;
  }

  get lastDeliveredSequence(): number | undefined {
    return this.lastDelivered;
  }

  async open(welcome: WelcomeMessage): Promise<void> {
    if (this.viewerState !== "connecting") return;
    await this.socket.send(JSON.stringify(welcome));
    if (this.viewerState === "connecting") this.viewerState = "open";
  }

  async deliver(event: SubtitleEvent): Promise<void> {
    if (this.viewerState !== "open" || !this.socket.isOpen()) return;
    await this.socket.send(JSON.stringify(toSubtitleMessage(event)));
    this.lastDelivered = event.sequence;
  }

  async sendStatus(status: StatusMessage): Promise<void> {
    if (this.viewerState !== "open" || !this.socket.isOpen()) return;
    await this.socket.send(JSON.stringify(status));
  }

  isExpired(timeoutMs: number): boolean {
    return this.now() - this.lastHeartbeat > timeoutMs;
  }

  /** Protocol-level ping; browsers answer it without any client code. */
  probe(): void {
    if (this.viewerState === "open" && this.socket.isOpen()) this.socket.ping();
  }

  markDead(): void {
    if (this.viewerState === "dead") return;
    this.viewerState = "dead";
    this.socket.terminate();
  }

  close(code: number, reason: string): void {
    if (this.viewerState === "dead" || this.viewerState === "closing") return;
    this.viewerState = "closing";
    this.socket.close(code, reason);
  }

  /** The peer went away on its own. */
  closed(): void {
    if (this.viewerState !== "dead") this.viewerState = "closing";
  }

  private touch() {
    this.lastHeartbeat = this.now();
  }

  private handleMessage(text: string) {
    this.touch();
    const parsed = parseMessage(text);
    if (!parsed?.success) return;

    this.socket.send(JSON.stringify({ type: "pong" })).catch((err) => {
      console.warn(`viewer ${this.id}: pong failed`, err);
    });
  }
}
