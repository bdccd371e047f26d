/** The part of a WebSocket a viewer connection needs. */
export interface ViewerSocket {
  isOpen(): boolean;
  send(text: string): Promise<void>;
  ping(): void;
  close(code: number, reason: string): void;
  terminate(): void;
  onMessage(handler: (text: string) => void): void;
  onPong(handler: () => void): void;
  onClose(handler: (code: number) => void): void;
  onError(handler: (error: Error) => void): void;
}
