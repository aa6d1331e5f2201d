import { setTimeout as sleepTimer } from 'timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`; rejects with an AbortError if `signal` fires first. */
export const abortableSleep: Sleep = async (ms, signal) => {
  await sleepTimer(ms, undefined, { signal });
};
