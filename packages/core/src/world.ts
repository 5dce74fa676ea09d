import type { NormalizedVehicle } from '@rigsnap/content-schema';

import type { Rgba32 } from './paint.js';
import type {
  BarricadeSnapshot,
  StructureSnapshot,
} from './state-sync/types.js';

export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface Quaternion {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly w: number;
}

export interface PlacementFrame {
  readonly position: Vector3;
  readonly rotation: Quaternion;
}

export interface Ownership {
  readonly owner: bigint;
  readonly group: bigint;
}

export interface ItemPayload {
  readonly id: number;
  readonly amount: number;
  readonly quality: number;
  readonly state: Uint8Array;
}

export interface LiveCargoEntry {
  readonly x: number;
  readonly y: number;
  readonly rotation: number;
  readonly item: ItemPayload;
}

export interface LiveCargo {
  readonly width: number;
  readonly height: number;
  readonly items: readonly LiveCargoEntry[];
  addItem(x: number, y: number, rotation: number, item: ItemPayload): void;
}

export interface LiveTire {
  isAlive: boolean;
}

export interface LiveTurret {
  state: Uint8Array;
}

/**
 * A vehicle instance owned by the world. Every member is read on the world
 * thread; tire liveness and turret state are the only fields the snapshot
 * engine writes directly.
 */
export interface LiveVehicle {
  readonly definitionId: number;
  readonly definitionGuid: string;
  readonly instanceId: number;
  readonly skinId: number;
  readonly mythicId: number;
  readonly roadPosition: number;
  readonly health: number;
  readonly fuel: number;
  readonly batteryCharge: number;
  readonly owner: bigint;
  readonly group: bigint;
  /** `undefined` when the vehicle is unpainted (the clear color). */
  readonly paintColor: Rgba32 | undefined;
  readonly frame: PlacementFrame;
  readonly tires: readonly LiveTire[] | undefined;
  /** One entry per mount slot; a slot may exist without a live turret. */
  readonly turrets: readonly (LiveTurret | undefined)[] | undefined;
  readonly cargo: LiveCargo | undefined;
  /** Publishes the tire alive mask after a batch of tire writes. */
  sendTireAliveMaskUpdate(): void;
}

export interface LiveAttachedEntity {
  readonly isDestroyed: boolean;
}

export type LiveBarricade = LiveAttachedEntity;
export type LiveStructure = LiveAttachedEntity;

/**
 * Capture and spawn contract of one kind of entity that can be planted on a
 * vehicle frame.
 */
export interface AttachedEntityPort<
  TSnapshot,
  TLive extends LiveAttachedEntity = LiveAttachedEntity,
> {
  capture(entity: TLive): TSnapshot;
  /**
   * Spawns the entity planted on `anchor`. `ownership`, when given, replaces
   * the owner and group stored in the snapshot.
   */
  spawn(snapshot: TSnapshot, anchor: LiveVehicle, ownership?: Ownership): TLive;
  destroy(entity: TLive): void;
}

export interface AttachedRegion {
  readonly barricades: readonly LiveBarricade[];
  readonly structures: readonly LiveStructure[];
}

export interface VehicleSpawnRequest {
  readonly definition: NormalizedVehicle;
  readonly skinId: number;
  readonly mythicId: number;
  readonly roadPosition: number;
  readonly frame: PlacementFrame;
  readonly fuel: number;
  readonly health: number;
  readonly batteryCharge: number;
  readonly owner: bigint;
  readonly group: bigint;
  readonly locked: boolean;
  /** Omitted to let the world apply the definition's default paint. */
  readonly paintColor?: Rgba32;
}

export interface VehicleWorld {
  /** Creates a vehicle; resource gauges are clamped by the world. */
  spawnVehicle(request: VehicleSpawnRequest): LiveVehicle;
  destroyVehicle(vehicle: LiveVehicle): void;
  /** Region of entities planted on the vehicle, if it has one. */
  findAttachedRegion(vehicle: LiveVehicle): AttachedRegion | undefined;
  readonly barricades: AttachedEntityPort<BarricadeSnapshot, LiveBarricade>;
  readonly structures: AttachedEntityPort<StructureSnapshot, LiveStructure>;
}
