import { z } from 'zod';

import { ContentSchemaError, type ContentSchemaWarning } from './errors.js';
import { itemDefinitionSchema, type Item } from './modules/items.js';
import { catalogMetadataSchema, type CatalogMetadata } from './modules/metadata.js';
import { vehicleDefinitionSchema, type Vehicle } from './modules/vehicles.js';

export type NormalizedVehicle = Vehicle;
export type NormalizedItem = Item;
export type NormalizedCatalogMetadata = CatalogMetadata;

export interface NormalizedAssetCatalog {
  readonly metadata: NormalizedCatalogMetadata;
  readonly vehicles: readonly NormalizedVehicle[];
  readonly items: readonly NormalizedItem[];
}

export interface AssetCatalogValidationResult {
  readonly catalog: NormalizedAssetCatalog;
  readonly warnings: readonly ContentSchemaWarning[];
}

export interface AssetCatalogParseOptions {
  readonly warningSink?: (warning: ContentSchemaWarning) => void;
}

const ensureUniqueKeys = <Entry extends { readonly id: number; readonly guid: string }>(
  label: string,
) => (entries: readonly Entry[], ctx: z.RefinementCtx) => {
  const seenIds = new Map<number, number>();
  const seenGuids = new Map<string, number>();
  entries.forEach((entry, index) => {
    const existingId = seenIds.get(entry.id);
    if (existingId !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate ${label} id ${entry.id} also defined at index ${existingId}.`,
      });
    } else {
      seenIds.set(entry.id, index);
    }

    const existingGuid = seenGuids.get(entry.guid);
    if (existingGuid !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'guid'],
        message: `Duplicate ${label} guid "${entry.guid}" also defined at index ${existingGuid}.`,
      });
    } else {
      seenGuids.set(entry.guid, index);
    }
  });
};

const sortById = <Entry extends { readonly id: number }>(
  entries: readonly Entry[],
): readonly Entry[] =>
  Object.freeze([...entries].sort((left, right) => left.id - right.id));

export const vehicleCollectionSchema = z
  .array(vehicleDefinitionSchema)
  .superRefine(ensureUniqueKeys<NormalizedVehicle>('vehicle'))
  .transform(sortById);

export const itemCollectionSchema = z
  .array(itemDefinitionSchema)
  .superRefine(ensureUniqueKeys<NormalizedItem>('item'))
  .transform(sortById);

export const assetCatalogSchema = z
  .object({
    metadata: catalogMetadataSchema,
    vehicles: vehicleCollectionSchema.default([]),
    items: itemCollectionSchema.default([]),
  })
  .strict();

const collectTurretReferenceWarnings = (
  catalog: NormalizedAssetCatalog,
): ContentSchemaWarning[] => {
  const knownItems = new Set(catalog.items.map((item) => item.id));
  const warnings: ContentSchemaWarning[] = [];

  catalog.vehicles.forEach((vehicle, vehicleIndex) => {
    vehicle.turrets.forEach((mount, mountIndex) => {
      if (knownItems.has(mount.itemId)) {
        return;
      }
      warnings.push({
        code: 'catalog.turret.unknownItem',
        message: `Vehicle ${vehicle.id} mounts unknown item ${mount.itemId} at turret ${mountIndex}.`,
        path: ['vehicles', vehicleIndex, 'turrets', mountIndex, 'itemId'],
        severity: 'warning',
        suggestion:
          'Restores that fall back to default turret state will leave this mount untouched.',
      });
    });
  });

  return warnings;
};

/**
 * Validates and normalizes an asset catalog document.
 *
 * Structural problems (bad ids, duplicate keys) throw a `ContentSchemaError`
 * carrying the zod issues. Cross references that a restore can survive, such
 * as a turret mounting an unknown item, are reported as warnings.
 */
export const parseAssetCatalog = (
  input: unknown,
  options: AssetCatalogParseOptions = {},
): AssetCatalogValidationResult => {
  const result = assetCatalogSchema.safeParse(input);
  if (!result.success) {
    throw new ContentSchemaError(
      'Asset catalog validation failed.',
      result.error.issues,
    );
  }

  const catalog: NormalizedAssetCatalog = Object.freeze({
    metadata: Object.freeze(result.data.metadata),
    vehicles: result.data.vehicles,
    items: result.data.items,
  });

  const warnings = collectTurretReferenceWarnings(catalog);
  for (const warning of warnings) {
    options.warningSink?.(warning);
  }

  return { catalog, warnings };
};
