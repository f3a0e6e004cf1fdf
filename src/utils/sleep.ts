import { setTimeout as delay } from 'timers/promises';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  if (ms <= 0) return;
  await delay(ms);
};
