import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { CapturedWaveform, EncodedAudio } from "../types/contracts";

export const PCM16_SCALE = 32767;

const HEADER_BYTES = 44;
const BYTES_PER_SAMPLE = 2;
const PCM_FORMAT = 1;
const MONO = 1;

export interface DecodedWav {
  sampleRateHz: number;
  channels: number;
  samples: Float32Array;
}

/**
 * Scales a float sample to a signed 16-bit integer, truncating toward zero
 * the way `int16(x * 32767)` does on float32 input. The product is rounded
 * to float32 before truncation so samples on the 16-bit grid map back to
 * themselves. Input outside [-1, 1] is clamped first.
 */
export function quantizeSample(x: number): number {
  if (Number.isNaN(x)) {
    return 0;
  }
  const clamped = Math.min(Math.max(x, -1), 1);
  // `| 0` truncates toward zero and normalizes -0.
  return Math.fround(clamped * PCM16_SCALE) | 0;
}

export function computeDurationMinutes(sampleCount: number, sampleRateHz: number): number {
  return sampleCount / sampleRateHz / 60;
}

export function encodeWav(samples: Float32Array, sampleRateHz: number): Buffer {
  const dataBytes = samples.length * BYTES_PER_SAMPLE;
  const wav = Buffer.alloc(HEADER_BYTES + dataBytes);

  wav.write("RIFF", 0, "ascii");
  wav.writeUInt32LE(36 + dataBytes, 4);
  wav.write("WAVE", 8, "ascii");
  wav.write("fmt ", 12, "ascii");
  wav.writeUInt32LE(16, 16);
  wav.writeUInt16LE(PCM_FORMAT, 20);
  wav.writeUInt16LE(MONO, 22);
  wav.writeUInt32LE(sampleRateHz, 24);
  wav.writeUInt32LE(sampleRateHz * MONO * BYTES_PER_SAMPLE, 28);
  wav.writeUInt16LE(MONO * BYTES_PER_SAMPLE, 32);
  wav.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);
  wav.write("data", 36, "ascii");
  wav.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < samples.length; i++) {
    wav.writeInt16LE(quantizeSample(samples[i]), HEADER_BYTES + i * BYTES_PER_SAMPLE);
  }
  return wav;
}

export function decodeWav(wavData: Buffer): DecodedWav {
  if (wavData.length < 12 || wavData.toString("ascii", 0, 4) !== "RIFF" || wavData.toString("ascii", 8, 12) !== "WAVE") {
    throw new Error("Not a RIFF/WAVE file.");
  }

  const fmt = findChunk(wavData, "fmt ");
  if (!fmt || fmt.length < 16) {
    throw new Error("WAVE file has no fmt chunk.");
  }
  const format = fmt.readUInt16LE(0);
  const channels = fmt.readUInt16LE(2);
  const sampleRateHz = fmt.readUInt32LE(4);
  const bitsPerSample = fmt.readUInt16LE(14);
  if (format !== PCM_FORMAT || bitsPerSample !== 16) {
    throw new Error(`Unsupported WAVE encoding (format ${format}, ${bitsPerSample} bits).`);
  }

  const pcm16 = extractPcm16FromWav(wavData);
  const samples = new Float32Array(Math.floor(pcm16.length / BYTES_PER_SAMPLE));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = pcm16.readInt16LE(i * BYTES_PER_SAMPLE) / PCM16_SCALE;
  }
  return { sampleRateHz, channels, samples };
}

export function extractPcm16FromWav(wavData: Buffer): Buffer {
  return findChunk(wavData, "data") ?? Buffer.alloc(0);
}

function findChunk(wavData: Buffer, id: string): Buffer | undefined {
  if (wavData.length < 12 || wavData.toString("ascii", 0, 4) !== "RIFF") {
    return undefined;
  }
  let offset = 12;
  while (offset + 8 <= wavData.length) {
    const chunkId = wavData.toString("ascii", offset, offset + 4);
    const chunkSize = wavData.readUInt32LE(offset + 4);
    if (chunkId === id) {
      return wavData.subarray(offset + 8, offset + 8 + chunkSize);
    }
    offset += 8 + chunkSize;
    if (chunkSize % 2 !== 0) {
      offset++;
    }
  }
  return undefined;
}

/** Overwrites the single-slot waveform file. */
export async function writeWaveformFile(
  wavPath: string,
  waveform: CapturedWaveform
): Promise<EncodedAudio> {
  await mkdir(dirname(wavPath), { recursive: true });
  await writeFile(wavPath, encodeWav(waveform.samples, waveform.sampleRateHz));
  return {
    wavPath,
    sampleRateHz: waveform.sampleRateHz,
    channels: MONO,
    durationMinutes: waveform.durationMinutes
  };
}
