import type { PaintOverride } from '../paint.js';
import type { ItemPayload, Quaternion, Vector3 } from '../world.js';

export interface CargoEntrySnapshot {
  readonly x: number;
  readonly y: number;
  readonly rotation: number;
  readonly item: ItemPayload;
}

/** Trunk contents. Always present; an empty trunk has no items. */
export interface CargoSnapshot {
  readonly width: number;
  readonly height: number;
  readonly items: readonly CargoEntrySnapshot[];
}

interface AttachedEntitySnapshot {
  /** Legacy catalog id; `0` marks a placeholder slot that is never spawned. */
  readonly definitionId: number;
  readonly definitionGuid: string;
  readonly health: number;
  readonly owner: bigint;
  readonly group: bigint;
  readonly position: Vector3;
  readonly rotation: Quaternion;
}

export interface BarricadeSnapshot extends AttachedEntitySnapshot {
  readonly state: Uint8Array;
}

export type StructureSnapshot = AttachedEntitySnapshot;

/**
 * Immutable capture of a vehicle and everything planted on its frame.
 *
 * Array lengths describe the captured vehicle. They are not guaranteed to
 * match the slot counts of a vehicle restored from this snapshot.
 */
export interface VehicleSnapshot {
  readonly definitionId: number;
  /** Authoritative key; the empty GUID defers to `definitionId`. */
  readonly definitionGuid: string;
  /** Informational; restores always create a new instance. */
  readonly instanceId: number;

  /** Capture timestamp (wall clock, diagnostic only). */
  readonly capturedAt: number;

  readonly skinId: number;
  readonly mythicId: number;
  /** Offset along the road for rail-bound vehicles, `0` otherwise. */
  readonly roadPosition: number;

  readonly health: number;
  readonly fuel: number;
  readonly batteryCharge: number;

  /** `0n` means unowned. */
  readonly owner: bigint;
  readonly group: bigint;

  readonly tires: readonly boolean[];
  readonly turrets: readonly Uint8Array[];
  readonly cargo: CargoSnapshot;

  readonly barricades: readonly BarricadeSnapshot[];
  readonly structures: readonly StructureSnapshot[];

  readonly position: Vector3;
  readonly rotation: Quaternion;

  readonly paint: PaintOverride;
}
