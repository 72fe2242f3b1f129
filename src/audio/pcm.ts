/**
 * PCM helpers shared by the recorder, STT adapters and synthesizers.
 * All buffers are mono signed 16-bit little-endian.
 */

export const BYTES_PER_SAMPLE = 2;

export function samplesPerFrame(sampleRateHz: number, frameMs: number): number {
  return Math.floor((sampleRateHz * frameMs) / 1000);
}

export function frameSizeBytes(sampleRateHz: number, frameMs: number): number {
  return samplesPerFrame(sampleRateHz, frameMs) * BYTES_PER_SAMPLE;
}

/** Duration in ms of a PCM byte count at the given rate. */
export function pcmDurationMs(byteLength: number, sampleRateHz: number): number {
  return (byteLength / BYTES_PER_SAMPLE / sampleRateHz) * 1000;
}

/** Root-mean-square amplitude of a frame; 0 for an empty or odd single-byte buffer. */
export function rmsInt16(frame: Buffer): number {
  const n = Math.floor(frame.length / BYTES_PER_SAMPLE);
  if (n <= 0) return 0;
  let acc = 0;
  for (let i = 0; i < n; i++) {
    const s = frame.readInt16LE(i * BYTES_PER_SAMPLE);
    acc += s * s;
  }
  return Math.sqrt(acc / n);
}

/** Upper median: sorted[floor(n / 2)]. */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

/**
 * Prepend a 44-byte WAV header to 16-bit mono PCM.
 * Sample rate typically 16000 for recorder output.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const headerSize = 44;
  const fileSize = headerSize + dataSize;
  const header = Buffer.alloc(headerSize);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

/** A frame filled with a constant sample value (handy for calibration noise and test tones). */
export function constantFrame(sampleRateHz: number, frameMs: number, value: number): Buffer {
  const n = samplesPerFrame(sampleRateHz, frameMs);
  const buf = Buffer.alloc(n * BYTES_PER_SAMPLE);
  for (let i = 0; i < n; i++) buf.writeInt16LE(value, i * BYTES_PER_SAMPLE);
  return buf;
}
