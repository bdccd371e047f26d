export type SubtitleEvent = {
  readonly sessionId: string;
  readonly sequence: number;
  readonly originalText: string;
  readonly translatedText: string;
  readonly sourceLanguage: string;
  readonly targetLanguage: string;
  readonly emittedAt: string;
};

export interface SubtitlePublisherPort {
  start?(): Promise<void>;
  stop?(): Promise<void>;
  publish(message: SubtitleEvent): Promise<void>;
}

/**
 * Anything the hub can deliver to. `deliver` resolving means the event has
 * left this process (or been rendered); the hub does not send the next one
 * to the same subscriber before that.
 */
export interface SubtitleSubscriber {
  readonly id: string;
  deliver(event: SubtitleEvent): Promise<void> | void;
}

export interface OverlaySink {
  onSubtitle(event: SubtitleEvent): void;
}
