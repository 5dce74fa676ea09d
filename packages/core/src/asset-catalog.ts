import {
  isEmptyAssetGuid,
  normalizeAssetGuid,
  type NormalizedAssetCatalog,
  type NormalizedItem,
  type NormalizedVehicle,
} from '@rigsnap/content-schema';

import { DefinitionNotFoundError } from './errors.js';
import { telemetry } from './telemetry.js';

/**
 * Read-only asset lookup consumed by capture and restore.
 */
export interface AssetCatalog {
  /** GUID first; the legacy id only when the GUID is empty or unknown. */
  findVehicle(guid: string, legacyId: number): NormalizedVehicle | undefined;
  findItem(legacyId: number): NormalizedItem | undefined;
  /** Fresh copy of the state a new instance of `item` starts with. */
  defaultStateFor(item: NormalizedItem): Uint8Array;
}

const indexBy = <Entry, Key>(
  entries: readonly Entry[],
  key: (entry: Entry) => Key,
): ReadonlyMap<Key, Entry> => {
  const index = new Map<Key, Entry>();
  for (const entry of entries) {
    index.set(key(entry), entry);
  }
  return index;
};

export function createAssetCatalog(catalog: NormalizedAssetCatalog): AssetCatalog {
  const vehiclesByGuid = indexBy(catalog.vehicles, (vehicle) => vehicle.guid);
  const vehiclesById = indexBy(catalog.vehicles, (vehicle) => vehicle.id);
  const itemsById = indexBy(catalog.items, (item) => item.id);

  return {
    findVehicle(guid, legacyId) {
      const normalizedGuid = normalizeAssetGuid(guid);
      if (!isEmptyAssetGuid(normalizedGuid)) {
        const byGuid = vehiclesByGuid.get(normalizedGuid);
        if (byGuid) {
          return byGuid;
        }
      }
      return legacyId === 0 ? undefined : vehiclesById.get(legacyId);
    },
    findItem(legacyId) {
      return itemsById.get(legacyId);
    },
    defaultStateFor(item) {
      return Uint8Array.from(item.defaultState);
    },
  };
}

/**
 * Resolves the definition a snapshot was captured from.
 *
 * @throws DefinitionNotFoundError when neither key resolves.
 */
export function resolveVehicleDefinition(
  catalog: AssetCatalog,
  guid: string,
  legacyId: number,
): NormalizedVehicle {
  const definition = catalog.findVehicle(guid, legacyId);
  if (!definition) {
    telemetry.recordError('VehicleDefinitionMissing', { guid, legacyId });
    throw new DefinitionNotFoundError('vehicle', guid, legacyId);
  }
  return definition;
}
