/**
 * AudioChannel.ts - Single-slot hand-off between capture and recognition
 *
 * Holds only the most recent frame. A slow consumer sees the newest audio and
 * never an unbounded backlog. Every method runs to completion without
 * awaiting, so the slot, the ready flag and the recording flag are only ever
 * observed in a consistent state.
 *
 * Waiting consumers are parked as pending promise resolvers:
 * - push() hands the frame to the oldest waiter (consuming it)
 * - stop() resolves every waiter with null
 */

import { LEVEL_BAND_COUNT, type AudioFrame, type LevelMeter } from '../../shared/types';

interface FrameWaiter {
  resolve: (frame: AudioFrame | null) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

function silentLevels(): LevelMeter {
  return new Array<number>(LEVEL_BAND_COUNT).fill(0);
}

export class AudioChannel {
  private frame: AudioFrame | null = null;
  private levels: LevelMeter = silentLevels();
  private ready: boolean = false;
  private recording: boolean = false;
  private waiters: FrameWaiter[] = [];

  // ============================================================================
  // Lifecycle
  // ============================================================================

  start(): void {
    this.recording = true;
  }

  /**
   * Drop the pending frame, mark recording inactive and wake every waiter
   * with null so no consumer stays parked.
   */
  stop(): void {
    this.recording = false;
    this.frame = null;
    this.ready = false;
    this.levels = silentLevels();

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.resolve(null);
    }
  }

  isRecording(): boolean {
    return this.recording;
  }

  hasPendingFrame(): boolean {
    return this.ready;
  }

  // ============================================================================
  // Producer
  // ============================================================================

  /**
   * Publish a fully assembled frame, overwriting any frame not yet consumed.
   * Dropped while recording is inactive.
   */
  push(frame: AudioFrame, levels: LevelMeter): void {
    if (!this.recording) {
      return;
    }

    this.levels = levels;

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      this.frame = null;
      this.ready = false;
      waiter.resolve(frame);
      return;
    }

    this.frame = frame;
    this.ready = true;
  }

  // ============================================================================
  // Consumers
  // ============================================================================

  /**
   * Take the pending frame, waiting for one if necessary.
   * Resolves null when recording stops (or is already stopped) and when
   * `timeoutMs` elapses first.
   */
  waitForFrame(timeoutMs?: number): Promise<AudioFrame | null> {
    if (!this.recording) {
      return Promise.resolve(null);
    }

    if (this.ready && this.frame) {
      const frame = this.frame;
      this.frame = null;
      this.ready = false;
      return Promise.resolve(frame);
    }

    return new Promise((resolve) => {
      const waiter: FrameWaiter = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Latest level meter, for visualization pollers. Does not consume the frame.
   */
  getLevels(): LevelMeter {
    return this.levels;
  }
}
