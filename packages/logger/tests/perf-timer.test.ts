/**
 * @fileoverview Tests for performance timing utilities
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { startTimer, measureAsync } from '../src/perf-timer.js';

describe('Performance Timers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('startTimer', () => {
    it('should report rounded elapsed time', () => {
      vi.spyOn(performance, 'now').mockReturnValueOnce(100).mockReturnValueOnce(150.4);

      const timer = startTimer();

      expect(timer.startTime).toBe(100);
      expect(timer.elapsed()).toBe(50);
    });

    it('should freeze the duration once stopped', () => {
      vi.spyOn(performance, 'now')
        .mockReturnValueOnce(0)
        .mockReturnValueOnce(40.6)
        .mockReturnValueOnce(90);

      const timer = startTimer();
      expect(timer.isRunning()).toBe(true);

      expect(timer.stop()).toBe(41);
      expect(timer.isRunning()).toBe(false);
      expect(timer.elapsed()).toBe(41);
      expect(timer.stop()).toBe(41);
    });
  });

  describe('measureAsync', () => {
    it('should return the result with its duration', async () => {
      vi.spyOn(performance, 'now').mockReturnValueOnce(0).mockReturnValueOnce(12.6);

      const { result, duration_ms } = await measureAsync(async () => 'done');

      expect(result).toBe('done');
      expect(duration_ms).toBe(13);
    });

    it('should propagate errors', async () => {
      await expect(
        measureAsync(async () => {
          throw new Error('Test error');
        })
      ).rejects.toThrow('Test error');
    });
  });
});
