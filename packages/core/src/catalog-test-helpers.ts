import {
  parseAssetCatalog,
  type NormalizedAssetCatalog,
  type NormalizedVehicle,
} from '@rigsnap/content-schema';

import { createAssetCatalog, type AssetCatalog } from './asset-catalog.js';

export const TRUCK_GUID = '11111111-1111-4111-8111-111111111111';
export const BUGGY_GUID = '22222222-2222-4222-8222-222222222222';
export const GUNBOAT_GUID = '33333333-3333-4333-8333-333333333333';
export const CANNON_GUID = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa';
export const LAUNCHER_GUID = 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb';

export const TRUCK_ID = 1;
export const BUGGY_ID = 2;
export const GUNBOAT_ID = 3;
export const CANNON_ID = 101;
export const LAUNCHER_ID = 102;
/** Mounted by the gunboat but absent from the catalog. */
export const MISSING_ITEM_ID = 999;

export const TEST_CATALOG_DOCUMENT = {
  metadata: { id: 'test-catalog', version: '1.0.0' },
  vehicles: [
    {
      id: TRUCK_ID,
      guid: TRUCK_GUID,
      name: 'Test Truck',
      tireCount: 4,
      turrets: [{ itemId: CANNON_ID }, { itemId: LAUNCHER_ID }],
      trunk: { width: 4, height: 3 },
      maxHealth: 500,
      maxFuel: 200,
      maxBatteryCharge: 1000,
    },
    {
      id: BUGGY_ID,
      guid: BUGGY_GUID,
      name: 'Test Buggy',
      tireCount: 2,
    },
    {
      id: GUNBOAT_ID,
      guid: GUNBOAT_GUID,
      name: 'Test Gunboat',
      turrets: [{ itemId: CANNON_ID }, { itemId: MISSING_ITEM_ID }],
    },
  ],
  items: [
    { id: CANNON_ID, guid: CANNON_GUID, name: 'Test Cannon', defaultState: [1, 2, 3] },
    { id: LAUNCHER_ID, guid: LAUNCHER_GUID, name: 'Test Launcher', defaultState: [9] },
  ],
};

export interface TestCatalog {
  readonly normalized: NormalizedAssetCatalog;
  readonly catalog: AssetCatalog;
  vehicle(id: number): NormalizedVehicle;
}

export function createTestCatalog(document: unknown = TEST_CATALOG_DOCUMENT): TestCatalog {
  const { catalog: normalized } = parseAssetCatalog(document);
  return {
    normalized,
    catalog: createAssetCatalog(normalized),
    vehicle(id) {
      const definition = normalized.vehicles.find((vehicle) => vehicle.id === id);
      if (!definition) {
        throw new Error(`Test catalog has no vehicle ${id}.`);
      }
      return definition;
    },
  };
}
