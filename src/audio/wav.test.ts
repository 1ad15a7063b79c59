import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  PCM16_SCALE,
  computeDurationMinutes,
  decodeWav,
  encodeWav,
  extractPcm16FromWav,
  quantizeSample,
  writeWaveformFile
} from "./wav";

let tempDir: string;

beforeAll(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "voice-ledger-wav-"));
});

afterAll(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("quantizeSample", () => {
  it("scales full-scale samples to +/-32767", () => {
    expect(quantizeSample(1)).toBe(32767);
    expect(quantizeSample(-1)).toBe(-32767);
  });

  it("truncates toward zero instead of rounding", () => {
    expect(quantizeSample(0.5)).toBe(16383);
    expect(quantizeSample(-0.5)).toBe(-16383);
    expect(quantizeSample(-0.00001)).toBe(0);
  });

  it("clamps out-of-range input and maps NaN to silence", () => {
    expect(quantizeSample(2)).toBe(32767);
    expect(quantizeSample(-3)).toBe(-32767);
    expect(quantizeSample(Number.NaN)).toBe(0);
  });

  it("maps every float32 sample on the 16-bit grid back to its integer", () => {
    const mismatches: number[] = [];
    for (let k = -PCM16_SCALE; k <= PCM16_SCALE; k++) {
      if (quantizeSample(Math.fround(k / PCM16_SCALE)) !== k) {
        mismatches.push(k);
      }
    }

    expect(mismatches).toEqual([]);
  });
});

describe("computeDurationMinutes", () => {
  it("divides sample count by rate and sixty", () => {
    expect(computeDurationMinutes(44100 * 30, 44100)).toBe(0.5);
    expect(computeDurationMinutes(0, 44100)).toBe(0);
  });
});

describe("encodeWav", () => {
  it("writes a 16-bit mono PCM header and little-endian samples", () => {
    const wav = encodeWav(Float32Array.from([0, 0.5, -1]), 44100);

    expect(wav.length).toBe(50);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.readUInt32LE(4)).toBe(42);
    expect(wav.toString("ascii", 8, 12)).toBe("WAVE");
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(44100);
    expect(wav.readUInt32LE(28)).toBe(88200);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.readUInt32LE(40)).toBe(6);
    expect(wav.readInt16LE(44)).toBe(0);
    expect(wav.readInt16LE(46)).toBe(16383);
    expect(wav.readInt16LE(48)).toBe(-32767);
  });
});

describe("decodeWav", () => {
  it("recovers each sample within one quantization step", () => {
    const input = Float32Array.from([0.25, -0.75, 0.999, -0.3333, 0]);
    const decoded = decodeWav(encodeWav(input, 16000));

    expect(decoded.sampleRateHz).toBe(16000);
    expect(decoded.channels).toBe(1);
    expect(decoded.samples.length).toBe(input.length);
    for (let i = 0; i < input.length; i++) {
      expect(Math.abs(decoded.samples[i] - input[i])).toBeLessThan(1 / PCM16_SCALE + 1e-9);
    }
  });

  it("re-encodes a decoded file byte for byte", () => {
    const original = encodeWav(Float32Array.from([3 / 32767, -3 / 32767, 0.1, -0.9, 1]), 16000);
    const decoded = decodeWav(original);

    expect(encodeWav(decoded.samples, decoded.sampleRateHz).equals(original)).toBe(true);
  });

  it("rejects data that is not a WAVE file", () => {
    expect(() => decodeWav(Buffer.from("definitely not audio"))).toThrow("Not a RIFF/WAVE file.");
  });

  it("returns an empty data chunk for truncated input", () => {
    expect(extractPcm16FromWav(Buffer.alloc(4)).length).toBe(0);
  });
});

describe("writeWaveformFile", () => {
  it("overwrites the single-slot file with the encoded waveform", async () => {
    const wavPath = join(tempDir, "nested", "output.wav");
    await writeWaveformFile(wavPath, {
      samples: Float32Array.from([0.1, 0.2, 0.3]),
      sampleRateHz: 44100,
      durationMinutes: computeDurationMinutes(3, 44100)
    });
    const audio = await writeWaveformFile(wavPath, {
      samples: Float32Array.from([0.5]),
      sampleRateHz: 44100,
      durationMinutes: computeDurationMinutes(1, 44100)
    });

    expect(audio).toEqual({
      wavPath,
      sampleRateHz: 44100,
      channels: 1,
      durationMinutes: 1 / 44100 / 60
    });
    const decoded = decodeWav(await readFile(wavPath));
    expect(decoded.samples.length).toBe(1);
    expect(decoded.samples[0]).toBeCloseTo(16383 / 32767, 6);
  });
});
