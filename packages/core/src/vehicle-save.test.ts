import { describe, expect, it } from 'vitest';

import { EMPTY_ASSET_GUID } from '@rigsnap/content-schema';

import { BUGGY_ID, createTestCatalog } from './catalog-test-helpers.js';
import { resolveSnapshotEngineConfig } from './config.js';
import { VehicleSaveFormatError } from './errors.js';
import { restoreVehicleSnapshot } from './state-sync/restore.js';
import {
  createBarricadeSnapshot,
  createStructureSnapshot,
  createTestWorld,
  createVehicleSnapshot,
} from './test-world.js';
import { encodeVehicleSave, loadVehicleSave } from './vehicle-save.js';

const catchError = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
};

const legacySave = () => ({
  savedAt: 5,
  definitionId: BUGGY_ID,
  instanceId: 9,
  skinId: 0,
  mythicId: 0,
  roadPosition: 0,
  health: 50,
  fuel: 10,
  batteryCharge: 0,
  owner: '5',
  group: '0',
  tires: [true, false],
  turrets: [],
  cargo: { width: 0, height: 0, items: [] },
  barricades: [
    {
      definitionId: 7,
      health: 100,
      owner: '5',
      group: '0',
      position: { x: 0, y: 1, z: 0 },
      rotation: { x: 0, y: 0, z: 0, w: 1 },
      state: 'AQI=',
    },
  ],
  position: { x: 1, y: 2, z: 3 },
  rotation: { x: 0, y: 0, z: 0, w: 1 },
});

describe('encodeVehicleSave', () => {
  it('writes a JSON-safe save', () => {
    const save = encodeVehicleSave(
      createVehicleSnapshot({
        owner: 76561198000000001n,
        capturedAt: 42,
        paint: { kind: 'rgba', color: { r: 10, g: 20, b: 30, a: 255 } },
        barricades: [createBarricadeSnapshot()],
      }),
    );

    expect(save.version).toBe(1);
    expect(save.savedAt).toBe(42);
    expect(save.owner).toBe('76561198000000001');
    expect(save.turrets).toEqual(['AQID', 'CQ==']);
    expect(save.paintColor).toEqual([10, 20, 30, 255]);
    expect(save.barricades[0]).toMatchObject({ owner: '5', group: '6', state: 'CAg=' });
  });

  it('writes the no-paint sentinel and honours a savedAt override', () => {
    const save = encodeVehicleSave(createVehicleSnapshot(), { savedAt: 7 });

    expect(save.paintColor).toEqual([0, 0, 0, 0]);
    expect(save.savedAt).toBe(7);
  });
});

describe('loadVehicleSave', () => {
  it('reads back an encoded snapshot through JSON', () => {
    const snapshot = createVehicleSnapshot({
      owner: 76561198000000001n,
      group: 3n,
      capturedAt: 42,
      cargo: {
        width: 4,
        height: 3,
        items: [
          { x: 1, y: 2, rotation: 1, item: { id: 30, amount: 2, quality: 90, state: Uint8Array.of(4) } },
        ],
      },
      barricades: [createBarricadeSnapshot()],
      structures: [createStructureSnapshot({ definitionId: 12 })],
      paint: { kind: 'rgba', color: { r: 10, g: 20, b: 30, a: 255 } },
    });

    const loaded = loadVehicleSave(JSON.parse(JSON.stringify(encodeVehicleSave(snapshot))));

    expect(loaded).toEqual(snapshot);
    expect(Object.isFrozen(loaded)).toBe(true);
  });

  it('migrates legacy unversioned saves', () => {
    const loaded = loadVehicleSave(legacySave());

    expect(loaded.definitionGuid).toBe(EMPTY_ASSET_GUID);
    expect(loaded.capturedAt).toBe(5);
    expect(loaded.owner).toBe(5n);
    expect(loaded.paint).toEqual({ kind: 'none' });
    expect(loaded.structures).toEqual([]);
    expect(loaded.barricades[0].definitionGuid).toBe(EMPTY_ASSET_GUID);
    expect(Array.from(loaded.barricades[0].state)).toEqual([1, 2]);
  });

  it('restores a migrated legacy save through its legacy id', () => {
    const { catalog } = createTestCatalog();
    const world = createTestWorld();

    const restored = restoreVehicleSnapshot({
      snapshot: loadVehicleSave(legacySave()),
      world,
      catalog,
    });

    expect(restored.vehicle.definitionId).toBe(BUGGY_ID);
    expect(restored.vehicle.tires?.map((tire) => tire.isAlive)).toEqual([true, false]);
    expect(restored.barricades).toHaveLength(1);
  });

  it('rejects values without a recognisable version', () => {
    const error = catchError(() => loadVehicleSave({ hello: 'world' }));

    expect(error).toBeInstanceOf(VehicleSaveFormatError);
    expect(error).toMatchObject({
      code: 'UNSUPPORTED_VERSION',
      message: 'Unable to determine vehicle save version.',
    });
  });

  it('rejects versions without a migration path', () => {
    const error = catchError(() =>
      loadVehicleSave({ ...encodeVehicleSave(createVehicleSnapshot()), version: 7 }),
    );

    expect(error).toMatchObject({
      code: 'NO_MIGRATION_PATH',
      message: 'No migration path from version 7 to 1.',
    });
  });

  it('rejects migrations that do not set the target version', () => {
    const error = catchError(() =>
      loadVehicleSave(legacySave(), {
        migrations: [{ fromVersion: 0, toVersion: 1, migrate: (data) => data }],
      }),
    );

    expect(error).toMatchObject({
      code: 'UNSUPPORTED_VERSION',
      message: 'Migration from 0 to 1 did not set the expected version.',
    });
  });

  it('reports schema issues for malformed saves', () => {
    const error = catchError(() =>
      loadVehicleSave({
        ...encodeVehicleSave(createVehicleSnapshot()),
        tires: ['yes'],
      }),
    );

    expect(error).toBeInstanceOf(VehicleSaveFormatError);
    expect(error).toMatchObject({ code: 'INVALID_SHAPE' });
    expect(error).toHaveProperty('issues.0.path', ['tires', 0]);
  });

  it('enforces the configured limits', () => {
    const error = catchError(() =>
      loadVehicleSave(encodeVehicleSave(createVehicleSnapshot()), {
        config: resolveSnapshotEngineConfig({
          limits: { maxTireSlots: 2, maxTurretStateBytes: 2 },
        }),
      }),
    );

    expect(error).toMatchObject({
      code: 'LIMIT_EXCEEDED',
      message:
        'Vehicle save exceeds configured limits: 4 tire slots exceed the limit of 2; ' +
        'turret 0 state of 3 bytes exceeds the limit of 2.',
    });
  });
});
