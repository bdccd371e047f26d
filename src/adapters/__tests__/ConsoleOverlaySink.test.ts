import { subtitle } from "../../__tests__/fixtures.js";
import { ConsoleOverlaySink, formatOverlayLines } from "../ConsoleOverlaySink.js";

describe("formatOverlayLines", () => {
  test("prints the translation under its sequence number", () => {
    expect(formatOverlayLines(subtitle(4), { showOriginal: false })).toEqual([
      "[4] translated 4",
    ]);
  });

  test("adds the original text when asked and it differs", () => {
    expect(formatOverlayLines(subtitle(4), { showOriginal: true })).toEqual([
      "[4] translated 4",
      "    original 4",
    ]);

    const same = { ...subtitle(5), translatedText: "original 5" };
    expect(formatOverlayLines(same, { showOriginal: true })).toEqual(["[5] original 5"]);
  });
});

describe("ConsoleOverlaySink", () => {
  test("writes each delivered event line by line", () => {
    const lines: string[] = [];
    const sink = new ConsoleOverlaySink({ showOriginal: true }, (line) => lines.push(line));

    sink.deliver(subtitle(1));
    sink.deliver(subtitle(2));

    expect(sink.id).toBe("overlay");
    expect(lines).toEqual([
      "[1] translated 1",
      "    original 1",
      "[2] translated 2",
      "    original 2",
    ]);
  });
});
