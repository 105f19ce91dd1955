/**
 * AudioChannel Unit Tests
 *
 * Tests the single-slot hand-off:
 * - newest frame wins when the consumer is behind
 * - waiting consumers receive pushed frames directly
 * - stop() wakes every waiter with null and drops the pending frame
 * - push() while stopped is a no-op
 * - waitForFrame timeouts
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { AudioChannel } from '../../../src/main/audio/AudioChannel';
import { LEVEL_BAND_COUNT } from '../../../src/shared/types';
import { createFrame } from '../../setup';

const LEVELS = new Array<number>(LEVEL_BAND_COUNT).fill(0.25);

describe('AudioChannel', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('single slot', () => {
    it('returns only the most recent of two frames pushed before a wait', async () => {
      const channel = new AudioChannel();
      const first = createFrame(10);
      const second = createFrame(20);
      channel.start();

      channel.push(first, LEVELS);
      channel.push(second, LEVELS);

      await expect(channel.waitForFrame()).resolves.toBe(second);
      expect(channel.hasPendingFrame()).toBe(false);
    });

    it('clears the ready flag when a frame is consumed', async () => {
      const channel = new AudioChannel();
      channel.start();
      channel.push(createFrame(10), LEVELS);
      expect(channel.hasPendingFrame()).toBe(true);

      await channel.waitForFrame();

      expect(channel.hasPendingFrame()).toBe(false);
    });

    it('hands a frame straight to a waiting consumer', async () => {
      const channel = new AudioChannel();
      const frame = createFrame(10);
      channel.start();

      const waiting = channel.waitForFrame();
      channel.push(frame, LEVELS);

      await expect(waiting).resolves.toBe(frame);
      expect(channel.hasPendingFrame()).toBe(false);
    });

    it('serves waiters in arrival order', async () => {
      const channel = new AudioChannel();
      const a = createFrame(1);
      const b = createFrame(2);
      channel.start();

      const first = channel.waitForFrame();
      const second = channel.waitForFrame();
      channel.push(a, LEVELS);
      channel.push(b, LEVELS);

      await expect(first).resolves.toBe(a);
      await expect(second).resolves.toBe(b);
    });
  });

  describe('stop', () => {
    it('wakes a blocked consumer with null', async () => {
      const channel = new AudioChannel();
      channel.start();
      const waiting = channel.waitForFrame();

      channel.stop();

      await expect(waiting).resolves.toBeNull();
    });

    it('wakes every waiter', async () => {
      const channel = new AudioChannel();
      channel.start();
      const waiters = [channel.waitForFrame(), channel.waitForFrame(), channel.waitForFrame()];

      channel.stop();

      await expect(Promise.all(waiters)).resolves.toEqual([null, null, null]);
    });

    it('drops the pending frame and resets the levels', () => {
      const channel = new AudioChannel();
      channel.start();
      channel.push(createFrame(10), LEVELS);

      channel.stop();

      expect(channel.hasPendingFrame()).toBe(false);
      expect(channel.isRecording()).toBe(false);
      expect(channel.getLevels()).toEqual(new Array<number>(LEVEL_BAND_COUNT).fill(0));
    });

    it('returns null immediately when waiting on a stopped channel', async () => {
      const channel = new AudioChannel();

      await expect(channel.waitForFrame()).resolves.toBeNull();
    });

    it('ignores pushes until started again', async () => {
      const channel = new AudioChannel();
      channel.start();
      channel.stop();

      channel.push(createFrame(10), LEVELS);
      channel.start();

      expect(channel.hasPendingFrame()).toBe(false);
    });
  });

  describe('timeouts', () => {
    it('resolves null when no frame arrives in time', async () => {
      vi.useFakeTimers();
      const channel = new AudioChannel();
      channel.start();

      const waiting = channel.waitForFrame(50);
      vi.advanceTimersByTime(50);

      await expect(waiting).resolves.toBeNull();
    });

    it('keeps a frame pushed after a timed-out wait for the next consumer', async () => {
      vi.useFakeTimers();
      const channel = new AudioChannel();
      const frame = createFrame(10);
      channel.start();

      const waiting = channel.waitForFrame(50);
      vi.advanceTimersByTime(50);
      await waiting;
      channel.push(frame, LEVELS);

      expect(channel.hasPendingFrame()).toBe(true);
      await expect(channel.waitForFrame()).resolves.toBe(frame);
    });
  });

  it('exposes the latest levels without consuming the frame', () => {
    const channel = new AudioChannel();
    channel.start();
    channel.push(createFrame(10), LEVELS);

    expect(channel.getLevels()).toBe(LEVELS);
    expect(channel.hasPendingFrame()).toBe(true);
  });
});
