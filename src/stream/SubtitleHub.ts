import type {
  SubtitleEvent,
  SubtitleSubscriber,
} from "../ports/transcriptPublisher.js";
import { BoundedQueue } from "./BoundedQueue.js";

export interface HubObserver {
  onDrop?(subscriberId: string, sequence: number): void;
  onDeliveryError?(subscriberId: string, error: unknown): void;
  onSubscriberCountChange?(count: number): void;
}

export type SubscribeOptions = {
  replayLatest?: boolean;
  queueDepth?: number;
};

export type Subscription = {
  readonly id: string;
  unsubscribe(): void;
  dropped(): number;
  lastDeliveredSequence(): number | undefined;
};

export type HubStats = {
  subscribers: number;
  published: number;
  dropped: number;
  latestSequence: number | undefined;
};

class SubscriberChannel {
  private readonly queue: BoundedQueue<SubtitleEvent>;
  private draining = false;
  closed = false;
  dropped = 0;
  lastDelivered: number | undefined;

  constructor(
    readonly subscriber: SubtitleSubscriber,
    queueDepth: number,
    private readonly onDrop: (event: SubtitleEvent) => void,
    private readonly onError: (error: unknown) => void
  ) {
    this.queue = new BoundedQueue(queueDepth);
  }

  push(event: SubtitleEvent) {
    if (this.closed) return;
    const evicted = this.queue.push(event);
    if (evicted) {
      this.dropped++;
      this.onDrop(evicted);
    }
    if (!this.draining) {
      this.drain().catch((err) => this.onError(err));
    }
  }

  close() {
    this.closed = true;
    this.queue.clear();
  }

  private async drain() {
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next && !this.closed) {
        await this.subscriber.deliver(next);
        this.lastDelivered = next.sequence;
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}

/**
 * Fan-out point for finished subtitles. `publish` never waits on a
 * subscriber: each one has its own bounded queue and drain loop, and a
 * full queue loses its oldest line rather than stalling the pipeline.
 */
export class SubtitleHub {
  private readonly channels = new Map<string, SubscriberChannel>();
  private latestEvent: SubtitleEvent | undefined;
  private publishedCount = 0;
  private droppedCount = 0;

  constructor(
    private readonly defaultQueueDepth: number,
    private readonly observer: HubObserver = {}
  ) {}

  publish(event: SubtitleEvent): boolean {
    if (this.latestEvent && event.sequence <= this.latestEvent.sequence) {
      console.warn(
        `hub: rejected out-of-order subtitle ${event.sequence} (latest ${this.latestEvent.sequence})`
      );
      return false;
    }

    this.latestEvent = event;
    this.publishedCount++;
    for (const channel of this.channels.values()) {
      channel.push(event);
    }
    return true;
  }

  subscribe(
    subscriber: SubtitleSubscriber,
    { replayLatest = false, queueDepth = this.defaultQueueDepth }: SubscribeOptions = {}
  ): Subscription {
    if (this.channels.has(subscriber.id)) {
      throw new Error(`subscriber ${subscriber.id} is already subscribed`);
    }

    const id = subscriber.id;
    const channel = new SubscriberChannel(
      subscriber,
      queueDepth,
      (evicted) => {
        this.droppedCount++;
        this.observer.onDrop?.(id, evicted.sequence);
      },
      (error) => {
        console.error(`hub: delivery to ${id} failed`, error);
        this.observer.onDeliveryError?.(id, error);
        this.remove(id, channel);
      }
    );
    this.channels.set(id, channel);
    this.observer.onSubscriberCountChange?.(this.channels.size);

    if (replayLatest && this.latestEvent) channel.push(this.latestEvent);

    return {
      id,
      unsubscribe: () => this.remove(id, channel),
      dropped: () => channel.dropped,
      lastDeliveredSequence: () => channel.lastDelivered,
    };
  }

  latest(): SubtitleEvent | undefined {
    return this.latestEvent;
  }

  stats(): HubStats {
    return {
      subscribers: this.channels.size,
      published: this.publishedCount,
      dropped: this.droppedCount,
      latestSequence: this.latestEvent?.sequence,
    };
  }

  private remove(id: string, channel: SubscriberChannel) {
    channel.close();
    if (this.channels.get(id) !== channel) return;
    this.channels.delete(id);
    this.observer.onSubscriberCountChange?.(this.channels.size);
  }
}
