import {
  EMPTY_ASSET_GUID,
  encodeBase64Blob,
  VEHICLE_SAVE_SCHEMA_VERSION,
  vehicleSaveSchemaV1,
  type BarricadeSaveFormat,
  type CargoSaveFormat,
  type ParsedVehicleSaveV1,
  type StructureSaveFormat,
  type VehicleSaveFormatV1,
} from '@rigsnap/content-schema';

import {
  DEFAULT_SNAPSHOT_ENGINE_CONFIG,
  type SnapshotEngineConfig,
} from './config.js';
import { VehicleSaveFormatError } from './errors.js';
import { decodePaintBytes, encodePaintBytes, NO_PAINT_BYTES } from './paint.js';
import type {
  BarricadeSnapshot,
  CargoSnapshot,
  StructureSnapshot,
  VehicleSnapshot,
} from './state-sync/types.js';
import { telemetry } from './telemetry.js';

export interface SchemaMigration {
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly migrate: (data: unknown) => unknown;
}

export interface EncodeVehicleSaveOptions {
  /** Defaults to the snapshot's `capturedAt`. */
  readonly savedAt?: number;
}

export interface LoadVehicleSaveOptions {
  readonly migrations?: readonly SchemaMigration[];
  readonly config?: SnapshotEngineConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNonNegativeInt(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return undefined;
  }
  return Math.floor(value);
}

function getSaveVersion(value: unknown): number | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  return readNonNegativeInt(value.version);
}

/**
 * Saves written before versioning carry the vehicle fields but no version,
 * GUID, paint or structures.
 */
function hasLegacyV0Shape(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) {
    return false;
  }
  return (
    'definitionId' in value &&
    'tires' in value &&
    'turrets' in value &&
    'barricades' in value
  );
}

function migrateLegacyV0ToV1(value: unknown): unknown {
  if (!hasLegacyV0Shape(value)) {
    throw new VehicleSaveFormatError(
      'Legacy vehicle save is missing required fields.',
      'INVALID_SHAPE',
    );
  }

  return {
    ...value,
    version: 1,
    definitionGuid: value.definitionGuid ?? EMPTY_ASSET_GUID,
    paintColor: value.paintColor ?? [...NO_PAINT_BYTES],
    structures: value.structures ?? [],
  };
}

export const DEFAULT_VEHICLE_SAVE_MIGRATIONS: readonly SchemaMigration[] =
  Object.freeze([
    {
      fromVersion: 0,
      toVersion: VEHICLE_SAVE_SCHEMA_VERSION,
      migrate: migrateLegacyV0ToV1,
    },
  ]);

function findMigrationPath(
  migrations: readonly SchemaMigration[],
  fromVersion: number,
  toVersion: number,
): readonly SchemaMigration[] | undefined {
  if (fromVersion === toVersion) {
    return [];
  }

  const migrationsByFrom = new Map<number, SchemaMigration[]>();
  for (const migration of migrations) {
    const list = migrationsByFrom.get(migration.fromVersion);
    if (list) {
      list.push(migration);
    } else {
      migrationsByFrom.set(migration.fromVersion, [migration]);
    }
  }

  const queue: Array<{ version: number; path: SchemaMigration[] }> = [
    { version: fromVersion, path: [] },
  ];
  const visited = new Set<number>([fromVersion]);

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) {
      break;
    }

    for (const migration of migrationsByFrom.get(current.version) ?? []) {
      if (visited.has(migration.toVersion)) {
        continue;
      }

      const path = [...current.path, migration];
      if (migration.toVersion === toVersion) {
        return path;
      }

      visited.add(migration.toVersion);
      queue.push({ version: migration.toVersion, path });
    }
  }

  return undefined;
}

const encodeCargo = (cargo: CargoSnapshot): CargoSaveFormat => ({
  width: cargo.width,
  height: cargo.height,
  items: cargo.items.map((entry) => ({
    x: entry.x,
    y: entry.y,
    rotation: entry.rotation,
    item: {
      id: entry.item.id,
      amount: entry.item.amount,
      quality: entry.item.quality,
      state: encodeBase64Blob(entry.item.state),
    },
  })),
});

const encodeStructure = (structure: StructureSnapshot): StructureSaveFormat => ({
  definitionId: structure.definitionId,
  definitionGuid: structure.definitionGuid,
  health: structure.health,
  owner: structure.owner.toString(),
  group: structure.group.toString(),
  position: { ...structure.position },
  rotation: { ...structure.rotation },
});

const encodeBarricade = (barricade: BarricadeSnapshot): BarricadeSaveFormat => ({
  ...encodeStructure(barricade),
  state: encodeBase64Blob(barricade.state),
});

/**
 * Encode a snapshot into the JSON-safe save format: blobs as base64,
 * identities as decimal strings, paint as its 4-byte form.
 */
export function encodeVehicleSave(
  snapshot: VehicleSnapshot,
  options: EncodeVehicleSaveOptions = {},
): VehicleSaveFormatV1 {
  return {
    version: VEHICLE_SAVE_SCHEMA_VERSION,
    savedAt: options.savedAt ?? snapshot.capturedAt,
    definitionId: snapshot.definitionId,
    definitionGuid: snapshot.definitionGuid,
    instanceId: snapshot.instanceId,
    skinId: snapshot.skinId,
    mythicId: snapshot.mythicId,
    roadPosition: snapshot.roadPosition,
    health: snapshot.health,
    fuel: snapshot.fuel,
    batteryCharge: snapshot.batteryCharge,
    owner: snapshot.owner.toString(),
    group: snapshot.group.toString(),
    tires: [...snapshot.tires],
    turrets: snapshot.turrets.map(encodeBase64Blob),
    cargo: encodeCargo(snapshot.cargo),
    barricades: snapshot.barricades.map(encodeBarricade),
    structures: snapshot.structures.map(encodeStructure),
    position: { ...snapshot.position },
    rotation: { ...snapshot.rotation },
    paintColor: [...encodePaintBytes(snapshot.paint)],
  };
}

function enforceLimits(
  save: ParsedVehicleSaveV1,
  limits: SnapshotEngineConfig['limits'],
): void {
  const violations: string[] = [];

  if (save.tires.length > limits.maxTireSlots) {
    violations.push(
      `${save.tires.length} tire slots exceed the limit of ${limits.maxTireSlots}`,
    );
  }

  save.turrets.forEach((state, index) => {
    if (state.byteLength > limits.maxTurretStateBytes) {
      violations.push(
        `turret ${index} state of ${state.byteLength} bytes exceeds the limit of ${limits.maxTurretStateBytes}`,
      );
    }
  });

  if (save.cargo.items.length > limits.maxCargoItems) {
    violations.push(
      `${save.cargo.items.length} cargo items exceed the limit of ${limits.maxCargoItems}`,
    );
  }

  const attached = save.barricades.length + save.structures.length;
  if (attached > limits.maxAttachedEntities) {
    violations.push(
      `${attached} attached entities exceed the limit of ${limits.maxAttachedEntities}`,
    );
  }

  if (violations.length > 0) {
    throw new VehicleSaveFormatError(
      `Vehicle save exceeds configured limits: ${violations.join('; ')}.`,
      'LIMIT_EXCEEDED',
    );
  }
}

const decodeSnapshot = (save: ParsedVehicleSaveV1): VehicleSnapshot => {
  const freezeAll = <T extends object>(entries: readonly T[]): readonly T[] =>
    Object.freeze(entries.map((entry) => Object.freeze(entry)));

  return Object.freeze({
    definitionId: save.definitionId,
    definitionGuid: save.definitionGuid,
    instanceId: save.instanceId,
    capturedAt: save.savedAt,
    skinId: save.skinId,
    mythicId: save.mythicId,
    roadPosition: save.roadPosition,
    health: save.health,
    fuel: save.fuel,
    batteryCharge: save.batteryCharge,
    owner: save.owner,
    group: save.group,
    tires: Object.freeze(save.tires),
    turrets: Object.freeze(save.turrets),
    cargo: Object.freeze({
      width: save.cargo.width,
      height: save.cargo.height,
      items: Object.freeze(
        save.cargo.items.map((entry) =>
          Object.freeze({ ...entry, item: Object.freeze(entry.item) }),
        ),
      ),
    }),
    barricades: freezeAll(save.barricades),
    structures: freezeAll(save.structures),
    position: Object.freeze(save.position),
    rotation: Object.freeze(save.rotation),
    paint: decodePaintBytes(save.paintColor),
  });
};

/**
 * Load a vehicle save of any known version into a snapshot.
 *
 * Unversioned saves are treated as legacy version 0 and migrated. The
 * migrated value is validated against the current schema and the configured
 * size limits before it is decoded.
 *
 * @throws VehicleSaveFormatError
 */
export function loadVehicleSave(
  value: unknown,
  options: LoadVehicleSaveOptions = {},
): VehicleSnapshot {
  const migrations = options.migrations ?? DEFAULT_VEHICLE_SAVE_MIGRATIONS;
  const config = options.config ?? DEFAULT_SNAPSHOT_ENGINE_CONFIG;
  const targetVersion = VEHICLE_SAVE_SCHEMA_VERSION;

  const detectedVersion = getSaveVersion(value);
  const fromVersion =
    detectedVersion ?? (hasLegacyV0Shape(value) ? 0 : undefined);

  if (fromVersion === undefined) {
    throw new VehicleSaveFormatError(
      'Unable to determine vehicle save version.',
      'UNSUPPORTED_VERSION',
    );
  }

  let migrated: unknown = value;

  if (fromVersion !== targetVersion) {
    const path = findMigrationPath(migrations, fromVersion, targetVersion);
    if (!path) {
      throw new VehicleSaveFormatError(
        `No migration path from version ${fromVersion} to ${targetVersion}.`,
        'NO_MIGRATION_PATH',
      );
    }

    let currentVersion = fromVersion;
    for (const migration of path) {
      migrated = migration.migrate(migrated);
      const nextVersion = getSaveVersion(migrated);
      if (nextVersion !== migration.toVersion) {
        throw new VehicleSaveFormatError(
          `Migration from ${currentVersion} to ${migration.toVersion} did not set the expected version.`,
          'UNSUPPORTED_VERSION',
        );
      }
      currentVersion = nextVersion;
    }

    telemetry.recordProgress('VehicleSaveMigrated', {
      fromVersion,
      toVersion: targetVersion,
    });
  }

  const result = vehicleSaveSchemaV1.safeParse(migrated);
  if (!result.success) {
    throw new VehicleSaveFormatError(
      'Vehicle save failed validation.',
      'INVALID_SHAPE',
      result.error.issues,
    );
  }

  enforceLimits(result.data, config.limits);
  return decodeSnapshot(result.data);
}
