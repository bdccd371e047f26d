import { WebSocket, type RawData } from "ws";
import type { ViewerSocket } from "./ViewerSocket.js";

const toText = (data: RawData): string => {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
};

export function wrapWebSocket(socket: WebSocket): ViewerSocket {
  return {
    isOpen: () => socket.readyState === WebSocket.OPEN,
    send: (text) =>
      new Promise<void>((resolve, reject) => {
        socket.send(text, (err) => (err ? reject(err) : resolve()));
      }),
    ping: () => socket.ping(),
    close: (code, reason) => socket.close(code, reason),
    terminate: () => socket.terminate(),
    onMessage: (handler) => {
      socket.on("message", (data) => handler(toText(data)));
    },
    onPong: (handler) => {
      socket.on("pong", () => handler());
    },
    onClose: (handler) => {
      socket.on("close", (code) => handler(code));
    },
    onError: (handler) => {
      socket.on("error", handler);
    },
  };
}
