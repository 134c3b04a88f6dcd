export type CoalescedRunner<T> = {
  schedule: (input: T) => void;
  /** Runs the pending input now, if any. */
  flush: () => Promise<void>;
  cancel: () => void;
  isPending: () => boolean;
};

/**
 * Collapses bursts of updates (drag, wheel scaling) into one run per
 * scheduling tick with the latest input. A run never starts before the
 * previous one has settled, so results land in schedule order.
 */
export function createCoalescedRunner<T>(
  task: (input: T) => void | Promise<void>,
  opts: { delayMs?: number; onError?: (err: unknown) => void } = {}
): CoalescedRunner<T> {
  const delayMs = opts.delayMs ?? 0;
  const onError = opts.onError ?? ((err: unknown) => console.error("[preview] update failed:", err));

  let timer: ReturnType<typeof setTimeout> | null = null;
  let pending: { input: T } | null = null;
  // runs are chained: one at a time, each picks up the latest input when it starts
  let chain: Promise<void> = Promise.resolve();

  function run(): Promise<void> {
    timer = null;
    chain = chain.then(async () => {
      const next = pending;
      pending = null;
      if (!next) return;

      try {
        await task(next.input);
      } catch (err) {
        onError(err);
      }
    });
    return chain;
  }

  return {
    schedule(input: T) {
      pending = { input };
      if (timer) return;
      timer = setTimeout(() => {
        void run();
      }, delayMs);
    },

    flush() {
      if (timer) clearTimeout(timer);
      return run();
    },

    cancel() {
      if (timer) clearTimeout(timer);
      timer = null;
      pending = null;
    },

    isPending() {
      return pending !== null;
    },
  };
}
