import { setTimeout as delay } from 'node:timers/promises';

/** Waits for the given number of milliseconds. */
export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = async (ms) => {
  if (ms <= 0) {
    return;
  }
  await delay(ms);
};

export type RecordingSleeper = Sleeper & { readonly calls: readonly number[] };

export function createRecordingSleeper(): RecordingSleeper {
  const calls: number[] = [];
  const recorder = async (ms: number): Promise<void> => {
    calls.push(ms);
  };
  return Object.assign(recorder, { calls });
}
