import { spawn } from "node:child_process";
import { PassThrough } from "node:stream";
import type { Readable } from "node:stream";
import type { AudioFrameSource } from "../ports/ports.js";
import { BYTES_PER_SAMPLE } from "../stream/pcm.js";

export type FfmpegLoopbackOptions = {
  command: string;
  inputFormat: string;
  device: string;
  sampleRate: number;
  stallTimeoutMs?: number;
  healthCheckIntervalMs?: number;
  restartDelayMs?: number;
};

/** The slice of a child process the capture loop uses. */
export interface CaptureProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal: NodeJS.Signals): boolean;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
}

export type Spawner = (command: string, args: string[]) => CaptureProcess;

const defaultSpawner: Spawner = (command, args) =>
  spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });

export function buildCaptureArgs(options: FfmpegLoopbackOptions): string[] {
  return [
    "-hide_banner",
    "-loglevel",
    "warning",
    "-fflags",
    "nobuffer",
    "-f",
    options.inputFormat,
    "-i",
    options.device,
    "-vn",
    "-ac",
    "1",
    "-ar",
    String(options.sampleRate),
    "-acodec",
    "pcm_s16le",
    "-f",
    "s16le",
    "pipe:1",
  ];
}

/**
 * Reads the loopback (monitor) device through an ffmpeg child and exposes
 * one continuous s16le stream. The child is respawned when it exits or
 * stops producing audio; the readable survives restarts.
 */
export class FfmpegLoopbackSource implements AudioFrameSource {
  private childProcess: CaptureProcess | undefined;
  private healthCheckTimer: NodeJS.Timeout | null = null;
  private restarting = false;
  private readonly killedChildren = new WeakSet<CaptureProcess>();
  private readonly killTimers = new WeakMap<CaptureProcess, NodeJS.Timeout>();

  constructor(
    private readonly options: FfmpegLoopbackOptions,
    private readonly spawner: Spawner = defaultSpawner
  ) {}

  start(): { pcmReadable: Readable; stop: () => void } {
    const output = new PassThrough();
    const stallTimeoutMs = this.options.stallTimeoutMs ?? 10_000;
    let stopped = false;
    let lastDataAt = Date.now();
    let childStartAt = Date.now();
    let lastStderrLogAt = 0;

    const attach = () => {
      const child = this.spawner(this.options.command, buildCaptureArgs(this.options));
      this.childProcess = child;
      lastDataAt = Date.now();
      childStartAt = lastDataAt;
      // odd byte of a sample split across chunks; dies with its child
      let partial: Buffer | null = null;

      child.stdout.on("data", (chunk: Buffer) => {
        if (this.childProcess !== child) return;
        lastDataAt = Date.now();

        let bytes = partial ? Buffer.concat([partial, chunk]) : chunk;
        partial = null;
        if (bytes.length % BYTES_PER_SAMPLE !== 0) {
          partial = bytes.subarray(bytes.length - 1);
          bytes = bytes.subarray(0, bytes.length - 1);
        }
        if (bytes.length > 0) output.write(bytes);
      });

      child.stderr.on("data", (d: Buffer) => {
        const now = Date.now();
        if (now - lastStderrLogAt > 1000) {
          lastStderrLogAt = now;
          console.warn("ffmpeg stderr:", d.toString().trim());
        }
      });

      child.on("error", (e) => console.error("ffmpeg spawn error:", e));
      child.on("close", (code, signal) => {
        const killedByUs = this.killedChildren.has(child);
        const killTimer = this.killTimers.get(child);
        if (killTimer) {
          clearTimeout(killTimer);
          this.killTimers.delete(child);
        }
        console.log("ffmpeg exit:", { code, signal, killedByUs });
        if (!stopped && !killedByUs) {
          this.requestRestart(attach, "exit", () => stopped);
        }
      });
    };

    attach();

    this.healthCheckTimer = setInterval(() => {
      const now = Date.now();
      if (now - childStartAt < stallTimeoutMs) return;
      if (now - lastDataAt > stallTimeoutMs) {
        console.warn(`ffmpeg produced no audio for ${stallTimeoutMs}ms`);
        this.requestRestart(attach, "stalled", () => stopped);
      }
    }, this.options.healthCheckIntervalMs ?? 5000);

    return {
      pcmReadable: output,
      stop: () => {
        if (stopped) return;
        stopped = true;
        this.disposeChild();
        if (this.healthCheckTimer) {
          clearInterval(this.healthCheckTimer);
          this.healthCheckTimer = null;
        }
        output.end();
      },
    };
  }

  private requestRestart(
    attach: () => void,
    reason: "stalled" | "exit",
    isStopped: () => boolean
  ): void {
    if (this.restarting) return;
    this.restarting = true;
    console.warn("ffmpeg restart requested:", reason);
    this.disposeChild();
    // a device that cannot be opened makes ffmpeg exit at once
    setTimeout(() => {
      try {
        if (!isStopped()) attach();
      } finally {
        this.restarting = false;
      }
    }, this.options.restartDelayMs ?? 1000);
  }

  private disposeChild() {
    const child = this.childProcess;
    if (!child) return;
    this.killedChildren.add(child);
    this.childProcess = undefined;
    if (child.exitCode !== null || child.signalCode !== null) return;

    child.kill("SIGTERM");
    const timer = setTimeout(() => {
      // 2초 안에 안 죽으면 강제 종료
      child.kill("SIGKILL");
    }, 2000);
    this.killTimers.set(child, timer);
  }
}
