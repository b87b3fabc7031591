/** Inclusive bounds; an absent `to` means "through the end of the container". */
export type OrderRange = {
  from: number;
  to?: number;
};

/**
 * One sibling group sharing an order namespace: the set of all columns, or
 * the tasks of one column. Implemented by each persistence backend inside a
 * transaction.
 */
export interface OrderedSet {
  /** Stable name, also used to lock containers in a consistent order. */
  readonly key: string;
  /** Exclusive access to the container until the transaction ends. */
  lock(): Promise<void>;
  count(): Promise<number>;
  /** Adds `delta` to the order of every sibling inside `range`. */
  shift(range: OrderRange, delta: 1 | -1): Promise<void>;
}

export type OrderViolation = {
  container: string;
  kind: 'duplicate' | 'gap';
  order: number;
};

export function clampOrder(requested: number, max: number): number {
  if (max <= 0) return 0;
  return Math.min(Math.max(Math.trunc(requested), 0), max);
}

export async function lockAll(sets: OrderedSet[]): Promise<void> {
  const byKey = new Map(sets.map((s) => [s.key, s] as const));
  const keys = [...byKey.keys()].sort();
  for (const key of keys) {
    const set = byKey.get(key);
    if (set) await set.lock();
  }
}

/**
 * Opens a slot at `requested` (appends when omitted) and returns the order
 * the new sibling must be written with.
 */
export async function insertAt(set: OrderedSet, requested?: number): Promise<number> {
  const size = await set.count();
  const order = clampOrder(requested ?? size, size);
  if (order < size) {
    await set.shift({ from: order }, 1);
  }
  return order;
}

/** Closes the gap left by a sibling removed from `removedOrder`. */
export async function removeAt(set: OrderedSet, removedOrder: number): Promise<void> {
  await set.shift({ from: removedOrder + 1 }, -1);
}

/**
 * Shifts only the siblings strictly between the old and the new position and
 * returns the order the entity must be written with. Returns `current` when
 * nothing moves.
 */
export async function reposition(set: OrderedSet, current: number, requested: number): Promise<number> {
  const size = await set.count();
  const target = clampOrder(requested, size - 1);
  if (target < current) {
    await set.shift({ from: target, to: current - 1 }, 1);
  } else if (target > current) {
    await set.shift({ from: current + 1, to: target }, -1);
  }
  return target;
}

/**
 * Opens a slot in `to`, lets `relocate` rewrite the entity's container and
 * order, then closes the gap in `from`. All three steps run in the caller's
 * transaction.
 */
export async function moveAcross<T>(
  from: OrderedSet,
  to: OrderedSet,
  currentOrder: number,
  requested: number | undefined,
  relocate: (order: number) => Promise<T>
): Promise<T> {
  const order = await insertAt(to, requested);
  const moved = await relocate(order);
  await removeAt(from, currentOrder);
  return moved;
}

/** Reports every container whose orders are not exactly 0..n-1. */
export function findOrderViolations<T extends { order: number }>(
  items: T[],
  containerOf: (item: T) => string
): OrderViolation[] {
  const byContainer = new Map<string, number[]>();
  for (const item of items) {
    const key = containerOf(item);
    const orders = byContainer.get(key) ?? [];
    orders.push(item.order);
    byContainer.set(key, orders);
  }

  const violations: OrderViolation[] = [];
  for (const [container, orders] of byContainer) {
    const seen = new Set<number>();
    for (const order of orders) {
      if (seen.has(order)) violations.push({ container, kind: 'duplicate', order });
      seen.add(order);
    }
    for (let order = 0; order < orders.length; order++) {
      if (!seen.has(order)) violations.push({ container, kind: 'gap', order });
    }
  }
  return violations;
}
