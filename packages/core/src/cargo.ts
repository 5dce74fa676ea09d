import type { CargoEntrySnapshot, CargoSnapshot } from './state-sync/types.js';
import type { ItemPayload, LiveCargo } from './world.js';

export const EMPTY_CARGO: CargoSnapshot = Object.freeze({
  width: 0,
  height: 0,
  items: Object.freeze([]),
});

export function cloneItemPayload(item: ItemPayload): ItemPayload {
  return Object.freeze({
    id: item.id,
    amount: item.amount,
    quality: item.quality,
    state: item.state.slice(),
  });
}

export function isCargoEmpty(cargo: CargoSnapshot): boolean {
  return cargo.items.length === 0;
}

/**
 * Copies the trunk contents. A missing or empty trunk yields the empty
 * cargo snapshot rather than nothing.
 */
export function captureCargo(cargo: LiveCargo | undefined): CargoSnapshot {
  if (!cargo || cargo.items.length === 0) {
    return EMPTY_CARGO;
  }

  const items: CargoEntrySnapshot[] = cargo.items.map((entry) =>
    Object.freeze({
      x: entry.x,
      y: entry.y,
      rotation: entry.rotation,
      item: cloneItemPayload(entry.item),
    }),
  );

  return Object.freeze({
    width: cargo.width,
    height: cargo.height,
    items: Object.freeze(items),
  });
}

/**
 * Inserts every stored entry, in order, as a fresh item. Entries are not
 * merged or deduplicated. Returns the number of insertions.
 */
export function restoreCargo(
  target: LiveCargo | undefined,
  cargo: CargoSnapshot,
): number {
  if (!target || isCargoEmpty(cargo)) {
    return 0;
  }

  for (const entry of cargo.items) {
    target.addItem(entry.x, entry.y, entry.rotation, cloneItemPayload(entry.item));
  }
  return cargo.items.length;
}
