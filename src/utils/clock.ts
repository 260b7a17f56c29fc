import { setTimeout as delay } from 'node:timers/promises';
import type { Clock } from '../types/process.js';

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms: number, signal?: AbortSignal) => {
    await delay(Math.max(0, ms), undefined, { signal });
  },
};
