/** Largest delay `setTimeout` honours; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Calls `fn` once after `ms` milliseconds, re-arming in MAX_TIMER_MS steps
 * for longer delays. Returns a cancel function.
 */
export const startTimer = (ms: number, fn: () => void): (() => void) => {
  let remaining = Math.max(0, ms);
  let timer: NodeJS.Timeout | undefined;

  const arm = (): void => {
    const step = Math.min(remaining, MAX_TIMER_MS);
    remaining -= step;
    timer = setTimeout(remaining > 0 ? arm : fn, step);
  };
  arm();

  return () => clearTimeout(timer);
};
