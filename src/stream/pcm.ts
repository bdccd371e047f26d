export const BYTES_PER_SAMPLE = 2;
const WAV_HEADER_SIZE = 44;

export const samplesIn = (pcm: Buffer) => Math.floor(pcm.length / BYTES_PER_SAMPLE);

export const bytesForDuration = (durationMs: number, sampleRate: number) =>
  Math.round((sampleRate * durationMs) / 1000) * BYTES_PER_SAMPLE;

/** Mean absolute amplitude of s16le samples, 0..32768. */
export function frameEnergy(pcm: Buffer): number {
  const count = samplesIn(pcm);
  if (count === 0) return 0;

  let sum = 0;
  for (let i = 0; i < count; i++) {
    sum += Math.abs(pcm.readInt16LE(i * BYTES_PER_SAMPLE));
  }
  return sum / count;
}

/**
 * Scales samples so the loudest one lands on `target`. Silent input and
 * input already at or above the target come back unchanged.
 */
export function normalizePeak(pcm: Buffer, target: number): Buffer {
  const count = samplesIn(pcm);
  let peak = 0;
  for (let i = 0; i < count; i++) {
    peak = Math.max(peak, Math.abs(pcm.readInt16LE(i * BYTES_PER_SAMPLE)));
  }
  if (peak === 0 || peak >= target) return pcm;

  const gain = target / peak;
  const out = Buffer.alloc(count * BYTES_PER_SAMPLE);
  for (let i = 0; i < count; i++) {
    const scaled = Math.round(pcm.readInt16LE(i * BYTES_PER_SAMPLE) * gain);
    out.writeInt16LE(Math.max(-32768, Math.min(32767, scaled)), i * BYTES_PER_SAMPLE);
  }
  return out;
}

export function encodeWav(pcm: Buffer, sampleRate: number, channels = 1): Buffer {
  const header = Buffer.alloc(WAV_HEADER_SIZE);
  const blockAlign = channels * BYTES_PER_SAMPLE;

  header.write("RIFF", 0);
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);
  header.write("data", 36);
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}
