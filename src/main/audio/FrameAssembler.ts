/**
 * FrameAssembler.ts - Raw PCM bytes to AudioChannel frames
 *
 * Accumulates interleaved 16-bit PCM delivered by the capture source and
 * publishes a decoded frame (plus its level meter) once the byte threshold is
 * reached. Only whole sample frames are decoded; a partial one is carried
 * into the next chunk. Decoding happens before push(), outside the channel.
 */

import { DEFAULT_CHANNELS, DEFAULT_SAMPLE_RATE } from '../../shared/types';
import type { AudioChannel } from './AudioChannel';
import { computeLevelMeter, decodePcm16 } from './audioUtils';

export interface FrameAssemblerConfig {
  sampleRate: number;
  channels: number;
  /** Bytes to accumulate before a frame is published */
  thresholdBytes: number;
}

const DEFAULT_CONFIG: FrameAssemblerConfig = {
  sampleRate: DEFAULT_SAMPLE_RATE,
  channels: DEFAULT_CHANNELS,
  thresholdBytes: 8192,
};

export class FrameAssembler {
  private config: FrameAssemblerConfig;
  private pending: Buffer[] = [];
  private pendingBytes: number = 0;
  private framesPushed: number = 0;

  constructor(
    private readonly channel: AudioChannel,
    config?: Partial<FrameAssemblerConfig>
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.thresholdBytes < this.bytesPerSampleFrame()) {
      throw new Error(`thresholdBytes must hold at least one sample frame (${this.bytesPerSampleFrame()} bytes)`);
    }
  }

  /**
   * Append captured bytes; publishes a frame when the threshold is reached.
   */
  write(chunk: Buffer): void {
    if (chunk.length === 0) {
      return;
    }
    this.pending.push(chunk);
    this.pendingBytes += chunk.length;

    if (this.pendingBytes >= this.config.thresholdBytes) {
      this.publish();
    }
  }

  /**
   * Publish whatever whole sample frames are buffered, regardless of threshold.
   */
  flush(): void {
    if (this.pendingBytes >= this.bytesPerSampleFrame()) {
      this.publish();
    }
  }

  reset(): void {
    this.pending = [];
    this.pendingBytes = 0;
  }

  getFramesPushed(): number {
    return this.framesPushed;
  }

  private publish(): void {
    const combined = Buffer.concat(this.pending, this.pendingBytes);
    const usable = combined.length - (combined.length % this.bytesPerSampleFrame());
    const remainder = combined.subarray(usable);

    this.pending = remainder.length > 0 ? [Buffer.from(remainder)] : [];
    this.pendingBytes = remainder.length;

    const samples = decodePcm16(combined.subarray(0, usable));
    this.channel.push(
      { samples, sampleRate: this.config.sampleRate, channels: this.config.channels },
      computeLevelMeter(samples)
    );
    this.framesPushed++;
  }

  private bytesPerSampleFrame(): number {
    return 2 * this.config.channels;
  }
}
