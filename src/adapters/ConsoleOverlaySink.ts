import type {
  OverlaySink,
  SubtitleEvent,
  SubtitleSubscriber,
} from "../ports/transcriptPublisher.js";

export type OverlayOptions = {
  showOriginal: boolean;
};

export const formatOverlayLines = (
  event: SubtitleEvent,
  { showOriginal }: OverlayOptions
): string[] => {
  const lines = [`[${event.sequence}] ${event.translatedText}`];
  if (showOriginal && event.originalText !== event.translatedText) {
    lines.push(`    ${event.originalText}`);
  }
  return lines;
};

/** Terminal stand-in for the on-screen overlay. */
export class ConsoleOverlaySink implements OverlaySink, SubtitleSubscriber {
  readonly id = "overlay";

  constructor(
    private readonly options: OverlayOptions,
    private readonly write: (line: string) => void = (line) => console.log(line)
  ) {}

  onSubtitle(event: SubtitleEvent): void {
    for (const line of formatOverlayLines(event, this.options)) {
      this.write(line);
    }
  }

  deliver(event: SubtitleEvent): void {
    this.onSubtitle(event);
  }
}
