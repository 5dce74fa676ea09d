import type { NormalizedVehicle } from '@rigsnap/content-schema';

import { TRUCK_GUID, TRUCK_ID } from './catalog-test-helpers.js';
import { EMPTY_CARGO } from './cargo.js';
import { NO_PAINT, type Rgba32 } from './paint.js';
import type {
  BarricadeSnapshot,
  StructureSnapshot,
  VehicleSnapshot,
} from './state-sync/types.js';
import type {
  AttachedEntityPort,
  AttachedRegion,
  ItemPayload,
  LiveAttachedEntity,
  LiveCargoEntry,
  LiveTurret,
  LiveVehicle,
  Ownership,
  PlacementFrame,
  VehicleSpawnRequest,
  VehicleWorld,
} from './world.js';

/** State every turret mount starts with when the world spawns a vehicle. */
export const SPAWN_TURRET_STATE: readonly number[] = Object.freeze([0xff]);

export interface TestTire {
  isAlive: boolean;
}

export interface TestCargo {
  readonly width: number;
  readonly height: number;
  readonly items: LiveCargoEntry[];
  addItem(x: number, y: number, rotation: number, item: ItemPayload): void;
}

export interface TestVehicle extends LiveVehicle {
  readonly definition: NormalizedVehicle;
  health: number;
  fuel: number;
  batteryCharge: number;
  owner: bigint;
  group: bigint;
  locked: boolean;
  paintColor: Rgba32 | undefined;
  frame: PlacementFrame;
  tires: TestTire[] | undefined;
  turrets: (LiveTurret | undefined)[] | undefined;
  cargo: TestCargo | undefined;
  tireMaskUpdates: number;
}

export interface TestAttachedEntity extends LiveAttachedEntity {
  isDestroyed: boolean;
  readonly anchor: LiveVehicle;
}

/**
 * Failure injection. A `*SpawnAt` value makes the spawn call with that
 * zero-based index on the port throw.
 */
export interface TestWorldFaults {
  barricadeSpawnAt?: number;
  structureSpawnAt?: number;
  barricadeDestroy?: boolean;
  destroyVehicle?: boolean;
}

export interface TestWorld extends VehicleWorld {
  /** Ordered log of world mutations, e.g. `spawnVehicle:1`, `destroyBarricade`. */
  readonly log: string[];
  readonly faults: TestWorldFaults;
  readonly vehicles: readonly TestVehicle[];
  readonly destroyedVehicles: readonly LiveVehicle[];
  spawnVehicle(request: VehicleSpawnRequest): TestVehicle;
  /** Makes `vehicle` report an attached region, even an empty one. */
  createRegion(vehicle: LiveVehicle): void;
  plantBarricade(vehicle: LiveVehicle, snapshot: BarricadeSnapshot): TestAttachedEntity;
  plantStructure(vehicle: LiveVehicle, snapshot: StructureSnapshot): TestAttachedEntity;
  barricadeRecord(entity: LiveAttachedEntity): BarricadeSnapshot | undefined;
  structureRecord(entity: LiveAttachedEntity): StructureSnapshot | undefined;
}

export interface CreateTestWorldOptions {
  readonly firstInstanceId?: number;
  /** Paint the world applies when a spawn request carries none. */
  readonly defaultPaint?: Rgba32;
}

interface MutableRegion {
  readonly barricades: TestAttachedEntity[];
  readonly structures: TestAttachedEntity[];
}

const clamp = (value: number, max: number): number =>
  Math.min(Math.max(value, 0), max);

/**
 * In-memory `VehicleWorld` for tests. Spawned vehicles get one live tire per
 * definition tire slot, one turret per mount and a trunk when the definition
 * declares one.
 */
export function createTestWorld(options: CreateTestWorldOptions = {}): TestWorld {
  const log: string[] = [];
  const faults: TestWorldFaults = {};
  const vehicles: TestVehicle[] = [];
  const destroyedVehicles: LiveVehicle[] = [];
  const regions = new Map<LiveVehicle, MutableRegion>();
  const barricadeRecords = new WeakMap<LiveAttachedEntity, BarricadeSnapshot>();
  const structureRecords = new WeakMap<LiveAttachedEntity, StructureSnapshot>();
  let nextInstanceId = options.firstInstanceId ?? 1;
  let barricadeSpawns = 0;
  let structureSpawns = 0;

  const regionOf = (vehicle: LiveVehicle): MutableRegion => {
    const existing = regions.get(vehicle);
    if (existing) {
      return existing;
    }
    const region: MutableRegion = { barricades: [], structures: [] };
    regions.set(vehicle, region);
    return region;
  };

  const removeFrom = (list: TestAttachedEntity[], entity: LiveAttachedEntity): void => {
    const index = list.findIndex((candidate) => candidate === entity);
    if (index >= 0) {
      const [removed] = list.splice(index, 1);
      removed.isDestroyed = true;
    }
  };

  const withOwnership = <TSnapshot extends StructureSnapshot>(
    snapshot: TSnapshot,
    ownership: Ownership | undefined,
  ): TSnapshot =>
    ownership
      ? { ...snapshot, owner: ownership.owner, group: ownership.group }
      : { ...snapshot };

  const plantBarricade = (
    vehicle: LiveVehicle,
    snapshot: BarricadeSnapshot,
  ): TestAttachedEntity => {
    const entity: TestAttachedEntity = { isDestroyed: false, anchor: vehicle };
    barricadeRecords.set(entity, { ...snapshot, state: snapshot.state.slice() });
    regionOf(vehicle).barricades.push(entity);
    return entity;
  };

  const plantStructure = (
    vehicle: LiveVehicle,
    snapshot: StructureSnapshot,
  ): TestAttachedEntity => {
    const entity: TestAttachedEntity = { isDestroyed: false, anchor: vehicle };
    structureRecords.set(entity, { ...snapshot });
    regionOf(vehicle).structures.push(entity);
    return entity;
  };

  const barricades: AttachedEntityPort<BarricadeSnapshot> = {
    capture(entity) {
      const record = barricadeRecords.get(entity);
      if (!record) {
        throw new Error('Unknown barricade.');
      }
      return { ...record, state: record.state.slice() };
    },
    spawn(snapshot, anchor, ownership) {
      const index = barricadeSpawns;
      barricadeSpawns += 1;
      if (faults.barricadeSpawnAt === index) {
        throw new Error(`Barricade spawn ${index} failed.`);
      }
      log.push(`spawnBarricade:${snapshot.definitionId}`);
      return plantBarricade(anchor, withOwnership(snapshot, ownership));
    },
    destroy(entity) {
      if (faults.barricadeDestroy) {
        throw new Error('Barricade destroy failed.');
      }
      log.push(`destroyBarricade:${barricadeRecords.get(entity)?.definitionId ?? 0}`);
      for (const region of regions.values()) {
        removeFrom(region.barricades, entity);
      }
    },
  };

  const structures: AttachedEntityPort<StructureSnapshot> = {
    capture(entity) {
      const record = structureRecords.get(entity);
      if (!record) {
        throw new Error('Unknown structure.');
      }
      return { ...record };
    },
    spawn(snapshot, anchor, ownership) {
      const index = structureSpawns;
      structureSpawns += 1;
      if (faults.structureSpawnAt === index) {
        throw new Error(`Structure spawn ${index} failed.`);
      }
      log.push(`spawnStructure:${snapshot.definitionId}`);
      return plantStructure(anchor, withOwnership(snapshot, ownership));
    },
    destroy(entity) {
      log.push(`destroyStructure:${structureRecords.get(entity)?.definitionId ?? 0}`);
      for (const region of regions.values()) {
        removeFrom(region.structures, entity);
      }
    },
  };

  const createCargo = (width: number, height: number): TestCargo => {
    const items: LiveCargoEntry[] = [];
    return {
      width,
      height,
      items,
      addItem(x, y, rotation, item) {
        log.push(`addItem:${item.id}`);
        items.push({ x, y, rotation, item });
      },
    };
  };

  const world: TestWorld = {
    log,
    faults,
    vehicles,
    destroyedVehicles,
    barricades,
    structures,
    spawnVehicle(request) {
      const { definition } = request;
      const instanceId = nextInstanceId;
      nextInstanceId += 1;
      log.push(`spawnVehicle:${instanceId}`);

      const vehicle: TestVehicle = {
        definition,
        definitionId: definition.id,
        definitionGuid: definition.guid,
        instanceId,
        skinId: request.skinId,
        mythicId: request.mythicId,
        roadPosition: request.roadPosition,
        health: clamp(request.health, definition.maxHealth),
        fuel: clamp(request.fuel, definition.maxFuel),
        batteryCharge: clamp(request.batteryCharge, definition.maxBatteryCharge),
        owner: request.owner,
        group: request.group,
        locked: request.locked,
        paintColor: request.paintColor ?? options.defaultPaint,
        frame: request.frame,
        tires:
          definition.tireCount > 0
            ? Array.from({ length: definition.tireCount }, () => ({ isAlive: true }))
            : undefined,
        turrets:
          definition.turrets.length > 0
            ? definition.turrets.map(() => ({
                state: Uint8Array.from(SPAWN_TURRET_STATE),
              }))
            : undefined,
        cargo: definition.trunk
          ? createCargo(definition.trunk.width, definition.trunk.height)
          : undefined,
        tireMaskUpdates: 0,
        sendTireAliveMaskUpdate() {
          vehicle.tireMaskUpdates += 1;
          log.push('tireMask');
        },
      };
      vehicles.push(vehicle);
      return vehicle;
    },
    destroyVehicle(vehicle) {
      if (faults.destroyVehicle) {
        throw new Error('Vehicle destroy failed.');
      }
      log.push(`destroyVehicle:${vehicle.instanceId}`);
      const index = vehicles.findIndex((candidate) => candidate === vehicle);
      if (index >= 0) {
        vehicles.splice(index, 1);
      }
      regions.delete(vehicle);
      destroyedVehicles.push(vehicle);
    },
    findAttachedRegion(vehicle): AttachedRegion | undefined {
      const region = regions.get(vehicle);
      return region
        ? { barricades: [...region.barricades], structures: [...region.structures] }
        : undefined;
    },
    createRegion(vehicle) {
      regionOf(vehicle);
    },
    plantBarricade,
    plantStructure,
    barricadeRecord(entity) {
      return barricadeRecords.get(entity);
    },
    structureRecord(entity) {
      return structureRecords.get(entity);
    },
  };

  return world;
}

export const IDENTITY_FRAME: PlacementFrame = Object.freeze({
  position: Object.freeze({ x: 0, y: 0, z: 0 }),
  rotation: Object.freeze({ x: 0, y: 0, z: 0, w: 1 }),
});

/** Spawn request with neutral values for everything but the definition. */
export function createSpawnRequest(
  definition: NormalizedVehicle,
  overrides: Partial<VehicleSpawnRequest> = {},
): VehicleSpawnRequest {
  return {
    definition,
    skinId: 0,
    mythicId: 0,
    roadPosition: 0,
    frame: IDENTITY_FRAME,
    fuel: 100,
    health: 100,
    batteryCharge: 100,
    owner: 0n,
    group: 0n,
    locked: false,
    ...overrides,
  };
}

export function createStructureSnapshot(
  overrides: Partial<StructureSnapshot> = {},
): StructureSnapshot {
  return {
    definitionId: 7,
    definitionGuid: '77777777-7777-4777-8777-777777777777',
    health: 250,
    owner: 5n,
    group: 6n,
    position: { x: 1, y: 0.5, z: -2 },
    rotation: { x: 0, y: 0, z: 0, w: 1 },
    ...overrides,
  };
}

export function createBarricadeSnapshot(
  overrides: Partial<BarricadeSnapshot> = {},
): BarricadeSnapshot {
  return {
    ...createStructureSnapshot(),
    state: Uint8Array.of(8, 8),
    ...overrides,
  };
}

/** Snapshot of an untouched, unowned test truck. */
export function createVehicleSnapshot(
  overrides: Partial<VehicleSnapshot> = {},
): VehicleSnapshot {
  return {
    definitionId: TRUCK_ID,
    definitionGuid: TRUCK_GUID,
    instanceId: 500,
    capturedAt: 0,
    skinId: 0,
    mythicId: 0,
    roadPosition: 0,
    health: 100,
    fuel: 100,
    batteryCharge: 100,
    owner: 0n,
    group: 0n,
    tires: [true, true, true, true],
    turrets: [Uint8Array.of(1, 2, 3), Uint8Array.of(9)],
    cargo: EMPTY_CARGO,
    barricades: [],
    structures: [],
    position: { x: 0, y: 0, z: 0 },
    rotation: { x: 0, y: 0, z: 0, w: 1 },
    paint: NO_PAINT,
    ...overrides,
  };
}
