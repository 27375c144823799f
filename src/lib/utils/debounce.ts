/**
 * Debounced forwarder
 *
 * Holds the latest value and forwards it once input has been quiet for
 * `delayMs`. Every new value resets the timer and replaces the pending one.
 */
export interface DebouncedForwarder<T> {
  schedule: (value: T) => void;
  /** Forward the pending value now, if any */
  flush: () => void;
  /** Drop the pending value without forwarding it */
  cancel: () => void;
  isPending: () => boolean;
}

export function createDebouncedForwarder<T>(
  forward: (value: T) => void,
  delayMs: number
): DebouncedForwarder<T> {
  let timerId: ReturnType<typeof setTimeout> | null = null;
  let pending: { value: T } | null = null;

  const clearTimer = () => {
    if (timerId !== null) {
      clearTimeout(timerId);
      timerId = null;
    }
  };

  const flush = () => {
    clearTimer();
    if (pending) {
      const { value } = pending;
      pending = null;
      forward(value);
    }
  };

  const schedule = (value: T) => {
    pending = { value };
    clearTimer();
    timerId = setTimeout(flush, delayMs);
  };

  const cancel = () => {
    clearTimer();
    pending = null;
  };

  const isPending = () => pending !== null;

  return {
    schedule,
    flush,
    cancel,
    isPending
  };
}
