import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { tone } from "../../__tests__/fixtures.js";
import { frameEnergy } from "../../stream/pcm.js";
import {
  buildCaptureArgs,
  FfmpegLoopbackSource,
  type FfmpegLoopbackOptions,
} from "../FfmpegLoopbackSource.js";

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly kills: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals) {
    this.kills.push(signal);
    queueMicrotask(() => {
      this.signalCode = signal;
      this.emit("close", null, signal);
    });
    return true;
  }

  exit(code: number) {
    this.exitCode = code;
    this.emit("close", code, null);
  }
}

const options: FfmpegLoopbackOptions = {
  command: "ffmpeg",
  inputFormat: "pulse",
  device: "default",
  sampleRate: 16000,
  stallTimeoutMs: 10_000,
  healthCheckIntervalMs: 5000,
  restartDelayMs: 1000,
};

function setup() {
  const children: FakeChild[] = [];
  const spawner = vi.fn((_command: string, _args: string[]) => {
    const child = new FakeChild();
    children.push(child);
    return child;
  });
  const source = new FfmpegLoopbackSource(options, spawner);
  return { source, spawner, children };
}

describe("buildCaptureArgs", () => {
  test("reads the device as mono s16le at the configured rate", () => {
    expect(buildCaptureArgs(options)).toEqual([
      "-hide_banner",
      "-loglevel",
      "warning",
      "-fflags",
      "nobuffer",
      "-f",
      "pulse",
      "-i",
      "default",
      "-vn",
      "-ac",
      "1",
      "-ar",
      "16000",
      "-acodec",
      "pcm_s16le",
      "-f",
      "s16le",
      "pipe:1",
    ]);
  });
});

describe("FfmpegLoopbackSource", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  test("forwards audio from every child through one readable", async () => {
    const { source, children } = setup();
    const { pcmReadable, stop } = source.start();
    const received: Buffer[] = [];
    pcmReadable.on("data", (chunk: Buffer) => received.push(chunk));

    children[0]?.stdout.write(Buffer.from([1, 2]));
    await vi.advanceTimersByTimeAsync(0);
    children[0]?.exit(1);
    await vi.advanceTimersByTimeAsync(1000);
    children[1]?.stdout.write(Buffer.from([3, 4]));
    await vi.advanceTimersByTimeAsync(0);

    expect(Buffer.concat(received)).toEqual(Buffer.from([1, 2, 3, 4]));
    stop();
  });

  test("a sample split across chunks is joined before it is forwarded", async () => {
    const { source, children } = setup();
    const { pcmReadable, stop } = source.start();
    const received: Buffer[] = [];
    pcmReadable.on("data", (chunk: Buffer) => received.push(chunk));

    children[0]?.stdout.write(Buffer.from([1, 2, 3]));
    await vi.advanceTimersByTimeAsync(0);
    expect(Buffer.concat(received)).toEqual(Buffer.from([1, 2]));

    children[0]?.stdout.write(Buffer.from([4]));
    await vi.advanceTimersByTimeAsync(0);
    expect(Buffer.concat(received)).toEqual(Buffer.from([1, 2, 3, 4]));
    stop();
  });

  test("an odd trailing byte from a dead child does not shift the next child's samples", async () => {
    const { source, children } = setup();
    const { pcmReadable, stop } = source.start();
    const received: Buffer[] = [];
    pcmReadable.on("data", (chunk: Buffer) => received.push(chunk));

    children[0]?.stdout.write(Buffer.from([0x7f]));
    await vi.advanceTimersByTimeAsync(0);
    children[0]?.exit(1);
    await vi.advanceTimersByTimeAsync(1000);
    children[1]?.stdout.write(tone(100, 90));
    await vi.advanceTimersByTimeAsync(0);

    const forwarded = Buffer.concat(received);
    expect(forwarded).toEqual(tone(100, 90));
    expect(frameEnergy(forwarded)).toBe(100);
    stop();
  });

  test("respawns ffmpeg after it exits on its own", async () => {
    const { source, spawner, children } = setup();
    const { stop } = source.start();

    children[0]?.exit(1);
    await vi.advanceTimersByTimeAsync(999);
    expect(spawner).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(spawner).toHaveBeenCalledTimes(2);
    expect(spawner.mock.calls[1]?.[1]).toEqual(buildCaptureArgs(options));
    stop();
  });

  test("kills and respawns a child that stops producing audio", async () => {
    const { source, spawner, children } = setup();
    const { stop } = source.start();

    await vi.advanceTimersByTimeAsync(10_000);
    expect(children[0]?.kills).toEqual([]);

    await vi.advanceTimersByTimeAsync(5000);
    expect(children[0]?.kills).toEqual(["SIGTERM"]);

    await vi.advanceTimersByTimeAsync(1000);
    expect(spawner).toHaveBeenCalledTimes(2);
    stop();
  });

  test("a child that keeps producing audio is left alone", async () => {
    const { source, spawner, children } = setup();
    const { stop } = source.start();

    for (let i = 0; i < 6; i++) {
      await vi.advanceTimersByTimeAsync(4000);
      children[0]?.stdout.write(Buffer.alloc(32));
    }
    await vi.advanceTimersByTimeAsync(0);

    expect(spawner).toHaveBeenCalledTimes(1);
    expect(children[0]?.kills).toEqual([]);
    stop();
  });

  test("stop terminates the child and ends the stream without respawning", async () => {
    const { source, spawner, children } = setup();
    const { pcmReadable, stop } = source.start();
    const ended = vi.fn();
    pcmReadable.on("end", ended);
    pcmReadable.resume();

    stop();
    await vi.advanceTimersByTimeAsync(30_000);

    expect(children[0]?.kills).toEqual(["SIGTERM"]);
    expect(spawner).toHaveBeenCalledTimes(1);
    expect(ended).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });
});
