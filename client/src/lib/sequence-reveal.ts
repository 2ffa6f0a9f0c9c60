export const REVEAL_DELAY_MS = 1000;

export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type RevealOptions<T> = {
  delayMs?: number;
  /** False once a newer display generation has started. */
  isCurrent: () => boolean;
  onItem: (item: T, index: number) => void;
  sleep?: Sleep;
};

/**
 * Hands items to `onItem` in order with a pause between consecutive items.
 * Resolves true when every item was shown, false when superseded.
 */
export async function revealInOrder<T>(
  items: readonly T[],
  { delayMs = REVEAL_DELAY_MS, isCurrent, onItem, sleep = delay }: RevealOptions<T>,
): Promise<boolean> {
  for (let index = 0; index < items.length; index += 1) {
    if (!isCurrent()) return false;
    if (index > 0) {
      await sleep(delayMs);
      if (!isCurrent()) return false;
    }
    onItem(items[index], index);
  }
  return isCurrent();
}

/** Monotonic counter; a reveal holding an older ticket is stale. */
export class DisplayGeneration {
  private current = 0;

  next(): number {
    this.current += 1;
    return this.current;
  }

  isCurrent(ticket: number): boolean {
    return ticket === this.current;
  }

  get value(): number {
    return this.current;
  }
}
