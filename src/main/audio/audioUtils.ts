/**
 * Audio Utility Functions
 *
 * PCM decoding, WAV encoding/decoding, level metering and quota truncation
 * shared by the capture side, the cloud backends and the CLI.
 */

import { LEVEL_BAND_COUNT, type AudioFrame, type LevelMeter } from '../../shared/types';

const WAV_HEADER_BYTES = 44;
const PCM16_SCALE = 32767;

/**
 * Decode interleaved little-endian 16-bit PCM into normalized floats.
 * A trailing odd byte is ignored.
 */
export function decodePcm16(raw: Buffer): Float32Array {
  const sampleCount = Math.floor(raw.byteLength / 2);
  const samples = new Float32Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = raw.readInt16LE(i * 2) / 32768;
  }
  return samples;
}

/**
 * Root mean square of the samples; 0 for an empty array.
 */
export function calculateRms(samples: Float32Array): number {
  if (samples.length === 0) {
    return 0;
  }
  let sumOfSquares = 0;
  for (let i = 0; i < samples.length; i++) {
    sumOfSquares += samples[i] * samples[i];
  }
  return Math.sqrt(sumOfSquares / samples.length);
}

/**
 * Derive the visualizer meter: the frame RMS shaped into a bell across the
 * bands (centre bands high, edges low), amplified and clamped to [0, 1].
 */
export function computeLevelMeter(samples: Float32Array, bands: number = LEVEL_BAND_COUNT): LevelMeter {
  const levels = new Array<number>(bands).fill(0);
  if (samples.length === 0) {
    return levels;
  }

  const rms = calculateRms(samples);
  for (let i = 0; i < bands; i++) {
    const amplitude = Math.sin((i / bands) * Math.PI);
    levels[i] = Math.max(0, Math.min(1, rms * amplitude * 5));
  }
  return levels;
}

/**
 * Keep at most `maxSamples` samples of the frame, cut on a channel boundary.
 * Returns the same frame when no cap applies or it already fits.
 */
export function truncateFrame(frame: AudioFrame, maxSamples: number | null): AudioFrame {
  if (maxSamples === null || frame.samples.length <= maxSamples) {
    return frame;
  }
  const kept = maxSamples - (maxSamples % frame.channels);
  return {
    samples: frame.samples.slice(0, kept),
    sampleRate: frame.sampleRate,
    channels: frame.channels,
  };
}

export function frameDurationMs(frame: AudioFrame): number {
  return (frame.samples.length / frame.channels / frame.sampleRate) * 1000;
}

/**
 * Encode a frame as a minimal PCM Int16 WAV container: the 44-byte RIFF
 * header followed by samples scaled by 32767.
 */
export function encodePcm16Wav(frame: AudioFrame): Buffer {
  const { samples, sampleRate, channels } = frame;
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;
  const dataSize = samples.length * bytesPerSample;
  const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataSize);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20); // PCM
  buffer.writeUInt16LE(channels, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(byteRate, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    buffer.writeInt16LE(Math.round(clamped * PCM16_SCALE), WAV_HEADER_BYTES + i * 2);
  }

  return buffer;
}

/**
 * Parse a WAV file held in memory. Supports PCM Int16 and IEEE Float32;
 * samples stay interleaved at the file's own rate and channel count.
 */
export function decodeWav(buffer: Buffer): AudioFrame {
  if (buffer.length < 12) {
    throw new Error('Invalid WAV data: file is shorter than a RIFF header');
  }
  const riff = buffer.toString('ascii', 0, 4);
  const wave = buffer.toString('ascii', 8, 12);
  if (riff !== 'RIFF' || wave !== 'WAVE') {
    throw new Error('Invalid WAV data: missing RIFF/WAVE header');
  }

  let offset = 12;
  let audioFormat = 0;
  let channels = 0;
  let sampleRate = 0;
  let bitsPerSample = 0;
  let fmtFound = false;

  while (offset <= buffer.length - 8) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);

    if (chunkId === 'fmt ') {
      audioFormat = buffer.readUInt16LE(offset + 8);
      channels = buffer.readUInt16LE(offset + 10);
      sampleRate = buffer.readUInt32LE(offset + 12);
      bitsPerSample = buffer.readUInt16LE(offset + 22);
      fmtFound = true;
    }

    if (chunkId === 'data') {
      if (!fmtFound) {
        throw new Error('Invalid WAV data: data chunk before fmt chunk');
      }
      if (channels < 1 || sampleRate < 1) {
        throw new Error(`Invalid WAV data: ${channels} channels at ${sampleRate} Hz`);
      }
      const dataStart = offset + 8;
      const data = buffer.subarray(dataStart, Math.min(dataStart + chunkSize, buffer.length));
      return {
        samples: extractSamples(data, audioFormat, bitsPerSample),
        sampleRate,
        channels,
      };
    }

    offset += 8 + chunkSize;
    // Chunks are word-aligned
    if (chunkSize % 2 !== 0) {
      offset += 1;
    }
  }

  throw new Error('Invalid WAV data: no data chunk found');
}

function extractSamples(data: Buffer, audioFormat: number, bitsPerSample: number): Float32Array {
  if (audioFormat === 1 && bitsPerSample === 16) {
    return decodePcm16(data);
  }
  if (audioFormat === 3 && bitsPerSample === 32) {
    const total = Math.floor(data.length / 4);
    const samples = new Float32Array(total);
    for (let i = 0; i < total; i++) {
      samples[i] = data.readFloatLE(i * 4);
    }
    return samples;
  }
  throw new Error(
    `Unsupported WAV format: audioFormat=${audioFormat}, bitsPerSample=${bitsPerSample}. ` +
      'Expected PCM int16 (format=1, bits=16) or PCM float32 (format=3, bits=32).'
  );
}
