import { toError } from "../../core/errors";

export type TaskOutcome<T> =
  | { ok: true; index: number; value: T }
  | { ok: false; index: number; error: Error };

export type TaskPoolOptions = {
  concurrency: number;
  /** Minimum delay between two consecutive task starts. */
  staggerMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onStart?: (index: number) => void;
  onSettle?: (outcome: TaskOutcome<unknown>) => void;
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `tasks` with at most `concurrency` in flight. Every task settles on
 * its own: a failure is recorded in its outcome and never stops the others.
 * Outcomes are returned in input order.
 */
export const runTaskPool = async <T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  options: TaskPoolOptions
): Promise<Array<TaskOutcome<T>>> => {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const staggerMs = Math.max(0, options.staggerMs ?? 0);
  const wait = options.sleep ?? sleep;
  const outcomes: Array<TaskOutcome<T>> = new Array(tasks.length);

  let cursor = 0;
  let started = 0;
  let startGate: Promise<void> = Promise.resolve();

  // Start slots are chained so that starts stay staggered across workers.
  const takeStartSlot = (): Promise<void> => {
    const first = started === 0;
    started += 1;
    startGate = startGate.then(() => (first || staggerMs === 0 ? undefined : wait(staggerMs)));
    return startGate;
  };

  const worker = async (): Promise<void> => {
    while (cursor < tasks.length) {
      const index = cursor;
      cursor += 1;
      await takeStartSlot();
      options.onStart?.(index);
      let outcome: TaskOutcome<T>;
      try {
        outcome = { ok: true, index, value: await tasks[index]() };
      } catch (error) {
        outcome = { ok: false, index, error: toError(error) };
      }
      outcomes[index] = outcome;
      options.onSettle?.(outcome);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker());
  await Promise.all(workers);
  return outcomes;
};
