import express from "express";
import http from "node:http";
import { WebSocketServer } from "ws";
import { createStatusRouter, type StatusSources } from "../router/status.js";
import type { ViewerConnectionManager } from "../viewers/ViewerConnectionManager.js";
import { wrapWebSocket } from "../viewers/wsSocket.js";

export type ViewerServerOptions = {
  host: string;
  port: number;
};

/** HTTP status routes and the viewer WebSocket share one port. */
export class ViewerServer {
  private readonly server: http.Server;
  private readonly wss: WebSocketServer;

  constructor(
    private readonly viewers: ViewerConnectionManager,
    status: StatusSources,
    private readonly options: ViewerServerOptions
  ) {
    const app = express();
    app.use(express.json());
    app.use(createStatusRouter(status));
    app.use(
      (
        err: unknown,
        _req: express.Request,
        res: express.Response,
        _next: express.NextFunction
      ) => {
        console.error("unhandled", err);
        if (res.headersSent) return;
        res.status(500).json({ error: "unhandled", message: String(err) });
      }
    );

    this.server = http.createServer(app);
    this.wss = new WebSocketServer({ server: this.server });

    this.wss.on("connection", (socket, req) => {
      console.log("connection from", req.socket.remoteAddress);
      this.viewers.accept(wrapWebSocket(socket)).catch((err) => {
        console.error("viewer accept failed", err);
        socket.terminate();
      });
    });
    this.wss.on("error", (err) => console.error("websocket server error:", err));
  }

  listen(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once("error", onError);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off("error", onError);
        console.log(
          `viewer server listening on ws://${this.options.host}:${this.options.port}`
        );
        this.viewers.start();
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    this.viewers.closeAll();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
    const closed = new Promise<void>((resolve, reject) =>
      this.server.close((err) => (err ? reject(err) : resolve()))
    );
    this.server.closeIdleConnections();
    await closed;
  }
}
