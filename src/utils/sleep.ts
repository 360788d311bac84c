import { setTimeout as delay } from 'timers/promises';

/**
 * Promise-based pause. Services take it as a constructor option so tests
 * can record delays instead of waiting.
 */
export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};
