import { v4 as uuidv4 } from "uuid";
import type { SubtitleHub, Subscription } from "../stream/SubtitleHub.js";
import { ViewerConnection, type StatusMessage } from "./ViewerConnection.js";
import type { ViewerSocket } from "./ViewerSocket.js";

export const CLOSE_TRY_AGAIN_LATER = 1013;
export const CLOSE_GOING_AWAY = 1001;

export type ViewerManagerOptions = {
  maxViewers: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  queueDepth?: number;
};

export type DisconnectReason = "closed" | "dead" | "shutdown";

export interface ViewerObserver {
  onConnect?(viewers: number): void;
  onDisconnect?(viewers: number, reason: DisconnectReason): void;
  onRejected?(): void;
}

type Entry = {
  connection: ViewerConnection;
  subscription: Subscription | undefined;
};

/**
 * Owns every viewer socket: admission, the hub subscription, liveness and
 * teardown. A viewer that fails only ever takes itself down.
 */
export class ViewerConnectionManager {
  private readonly viewers = new Map<string, Entry>();
  private sweepTimer: NodeJS.Timeout | undefined;
  private closing = false;

  constructor(
    private readonly hub: SubtitleHub,
    private readonly options: ViewerManagerOptions,
    private readonly observer: ViewerObserver = {},
    private readonly newId: () => string = uuidv4
  ) {}

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.heartbeatIntervalMs);
  }

  count(): number {
    return this.viewers.size;
  }

  async accept(socket: ViewerSocket): Promise<ViewerConnection | undefined> {
    if (this.closing) {
      socket.close(CLOSE_GOING_AWAY, "server shutting down");
      return undefined;
    }
    if (this.viewers.size >= this.options.maxViewers) {
      console.warn(`viewer rejected: limit of ${this.options.maxViewers} reached`);
      socket.close(CLOSE_TRY_AGAIN_LATER, "viewer limit reached");
      this.observer.onRejected?.();
      return undefined;
    }

    const id = this.newId();
    const connection = new ViewerConnection(id, socket);
    const entry: Entry = { connection, subscription: undefined };
    this.viewers.set(id, entry);

    socket.onClose(() => {
      connection.closed();
      this.remove(id, "closed");
    });
    socket.onError((err) => console.warn(`viewer ${id}: socket error`, err.message));

    console.log(`viewer connected: ${id} (viewers ${this.viewers.size})`);
    this.observer.onConnect?.(this.viewers.size);

    try {
      await connection.open({
        type: "welcome",
        connectionId: id,
        viewers: this.viewers.size,
      });
    } catch (err) {
      console.warn(`viewer ${id}: welcome failed`, err);
      this.remove(id, "dead");
      connection.markDead();
      return undefined;
    }

    // closed while the welcome was in flight
    if (this.viewers.get(id) !== entry) return undefined;

    entry.subscription = this.hub.subscribe(connection, {
      replayLatest: true,
      queueDepth: this.options.queueDepth,
    });
    return connection;
  }

  /** Drops viewers silent for longer than the timeout and pings the rest. */
  sweep(): void {
    for (const [id, { connection }] of [...this.viewers]) {
      if (connection.isExpired(this.options.heartbeatTimeoutMs)) {
        console.warn(`viewer ${id}: no heartbeat for ${this.options.heartbeatTimeoutMs}ms`);
        this.remove(id, "dead");
        connection.markDead();
        continue;
      }
      connection.probe();
    }
  }

  broadcastStatus(status: StatusMessage): void {
    for (const [id, { connection }] of this.viewers) {
      connection.sendStatus(status).catch((err) => {
        console.warn(`viewer ${id}: status send failed`, err);
      });
    }
  }

  closeAll(): void {
    this.closing = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    for (const [id, { connection }] of [...this.viewers]) {
      this.remove(id, "shutdown");
      connection.close(CLOSE_GOING_AWAY, "server shutting down");
    }
  }

  private remove(id: string, reason: DisconnectReason) {
    const entry = this.viewers.get(id);
    if (!entry) return;
    this.viewers.delete(id);
    entry.subscription?.unsubscribe();
    console.log(`viewer disconnected: ${id} (${reason}, viewers ${this.viewers.size})`);
    this.observer.onDisconnect?.(this.viewers.size, reason);
  }
}
