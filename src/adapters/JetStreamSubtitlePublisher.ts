import {
  connect,
  headers,
  NatsError,
  StringCodec,
  type ConnectionOptions,
  type JetStreamClient,
  type NatsConnection,
} from "nats";
import type {
  SubtitleEvent,
  SubtitlePublisherPort,
  SubtitleSubscriber,
} from "../ports/transcriptPublisher.js";

type ConnectionState = "connected" | "closed";

export type JetStreamConnection = Pick<
  NatsConnection,
  "getServer" | "closed" | "drain" | "isClosed"
> & {
  jetstream(): Pick<JetStreamClient, "publish">;
};

type Connector = (options: ConnectionOptions) => Promise<JetStreamConnection>;

const ALLOWED_PROTOCOLS = new Set(["nats:", "tls:", "ws:", "wss:"]);

export function toConnectionOptions(natsUrl: string): ConnectionOptions {
  const url = new URL(natsUrl.replace(/^\[|\]$/g, ""));
  if (!ALLOWED_PROTOCOLS.has(url.protocol)) {
    throw new Error(`Invalid NATS schema: ${url.protocol}`);
  }

  const options: ConnectionOptions = {
    servers: `${url.protocol}//${url.hostname}${url.port ? `:${url.port}` : ""}`,
  };
  if (url.username) options.user = decodeURIComponent(url.username);
  if (url.password) options.pass = decodeURIComponent(url.password);
  return options;
}

/**
 * Mirrors every subtitle onto `{prefix}.{sessionId}`. The Nats-Msg-Id
 * header lets JetStream drop duplicates if a publish is repeated.
 */
export class JetStreamSubtitlePublisher
  implements SubtitlePublisherPort, SubtitleSubscriber
{
  readonly id = "jetstream";
  private connection: JetStreamConnection | undefined;
  private jetStream: Pick<JetStreamClient, "publish"> | undefined;
  private state: ConnectionState = "closed";
  private readonly stringCodec = StringCodec();

  constructor(
    private readonly natsUrl: string,
    private readonly subjectPrefix = "subtitles",
    private readonly connector: Connector = connect
  ) {}

  async start() {
    console.log("publisher start");

    const connection = await this.connector(toConnectionOptions(this.natsUrl));
    console.log("connected to:", connection.getServer());

    this.connection = connection;
    this.jetStream = connection.jetstream();
    this.state = "connected";

    connection
      .closed()
      .then((err) => {
        this.state = "closed";
        if (err) {
          console.error("NATS - closed with error:", err.message);
        } else {
          console.log("NATS - connection closed");
        }
      })
      .catch((err) => console.error("NATS - close watcher failed:", err));
  }

  async stop() {
    const connection = this.connection;
    if (!connection) return;
    try {
      await connection.drain();
    } catch (err) {
      console.error("NATS - stop error:", err);
    } finally {
      await connection.closed();
      this.state = "closed";
    }
  }

  async publish(event: SubtitleEvent): Promise<void> {
    const { connection, jetStream } = this;
    if (this.state !== "connected" || !connection || !jetStream || connection.isClosed()) {
      console.warn("NATS - publish dropped", event.sequence);
      return;
    }

    const subject = `${this.subjectPrefix}.${event.sessionId}`;
    const msgHeaders = headers();
    msgHeaders.set("Nats-Msg-Id", `${event.sessionId}:${event.sequence}`);
    msgHeaders.set("Content-Type", "application/json");

    const payload = this.stringCodec.encode(JSON.stringify(event));

    try {
      await jetStream.publish(subject, payload, { headers: msgHeaders });
    } catch (err) {
      if (err instanceof NatsError && err.code === "CONNECTION_CLOSED") {
        console.warn("NATS - connection closed during publish");
        return;
      }
      throw err;
    }
  }

  // one failed publish must not unsubscribe the mirror from the hub
  deliver(event: SubtitleEvent): Promise<void> {
    return this.publish(event).catch((err) => {
      console.error(`NATS - publish of ${event.sequence} failed:`, err);
    });
  }
}
