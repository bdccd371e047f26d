import { frame } from "../../__tests__/fixtures.js";
import type { Segment } from "../../ports/segment.js";
import { VoiceActivitySegmenter } from "../VoiceActivitySegmenter.js";

const LOUD = 1000;
const QUIET = 50;

const options = {
  energyThreshold: 300,
  onsetMs: 90,
  minSpeechMs: 150,
  hangMs: 90,
  maxSegmentMs: 600,
};

/** Feeds one 30 ms frame per amplitude, timestamped back to back. */
function feed(segmenter: VoiceActivitySegmenter, amplitudes: number[], start = 0) {
  const sealed: Segment[] = [];
  amplitudes.forEach((amplitude, i) => {
    const out = segmenter.push(frame(amplitude, start + i * 30));
    if (out) sealed.push(out);
  });
  return sealed;
}

const repeat = (amplitude: number, count: number) =>
  Array.from({ length: count }, () => amplitude);

describe("VoiceActivitySegmenter", () => {
  test("silence alone never produces a segment", () => {
    const segmenter = new VoiceActivitySegmenter(options);
    expect(feed(segmenter, repeat(QUIET, 10))).toEqual([]);
    expect(segmenter.currentState).toBe("SILENCE");
    expect(segmenter.stats).toEqual({ sealed: 0, discarded: 0, droppedFrames: 10 });
  });

  test("an utterance keeps its onset frames and seals after the hang time", () => {
    const segmenter = new VoiceActivitySegmenter(options);
    const sealed = feed(segmenter, [
      QUIET,
      QUIET,
      ...repeat(LOUD, 5),
      ...repeat(QUIET, 3),
    ]);

    expect(sealed).toHaveLength(1);
    const [segment] = sealed;
    expect(segment).toMatchObject({
      sequence: 1,
      sampleRate: 16000,
      startedAt: 60,
      endedAt: 300,
      durationMs: 240,
      voicedMs: 150,
      sealReason: "silence",
    });
    expect(segment?.pcm.length).toBe(8 * 960);
    expect(segmenter.currentState).toBe("SILENCE");
    expect(segmenter.stats.droppedFrames).toBe(2);
  });

  test("a broken onset is dropped without entering speech", () => {
    const segmenter = new VoiceActivitySegmenter(options);
    expect(feed(segmenter, [LOUD, LOUD, QUIET])).toEqual([]);
    expect(segmenter.currentState).toBe("SILENCE");
    expect(segmenter.stats.droppedFrames).toBe(3);
  });

  test("short blips are discarded and consume no sequence number", () => {
    const onDiscard = vi.fn();
    const segmenter = new VoiceActivitySegmenter(options, undefined, onDiscard);

    expect(feed(segmenter, [...repeat(LOUD, 3), ...repeat(QUIET, 3)])).toEqual([]);
    expect(onDiscard).toHaveBeenCalledWith(180, 90);
    expect(segmenter.stats.discarded).toBe(1);

    const [next] = feed(segmenter, [...repeat(LOUD, 6), ...repeat(QUIET, 3)], 1000);
    expect(next?.sequence).toBe(1);
  });

  test("continuous speech is cut at the max duration and keeps listening", () => {
    const segmenter = new VoiceActivitySegmenter(options);
    const sealed = feed(segmenter, [...repeat(LOUD, 25), ...repeat(QUIET, 3)]);

    expect(sealed.map((s) => [s.sequence, s.sealReason, s.durationMs])).toEqual([
      [1, "max_duration", 600],
      [2, "silence", 240],
    ]);
    expect(sealed[1]?.startedAt).toBe(600);
    expect(segmenter.stats.sealed).toBe(2);
  });

  test("reset drops the utterance in progress", () => {
    const segmenter = new VoiceActivitySegmenter(options);
    feed(segmenter, repeat(LOUD, 5));
    expect(segmenter.currentState).toBe("SPEECH");

    segmenter.reset();
    expect(segmenter.currentState).toBe("SILENCE");
    expect(feed(segmenter, repeat(QUIET, 5), 150)).toEqual([]);
    expect(segmenter.stats.sealed).toBe(0);
  });
});
