export {
  assetCatalogSchema,
  itemCollectionSchema,
  parseAssetCatalog,
  vehicleCollectionSchema,
  type AssetCatalogParseOptions,
  type AssetCatalogValidationResult,
  type NormalizedAssetCatalog,
  type NormalizedCatalogMetadata,
  type NormalizedItem,
  type NormalizedVehicle,
} from './catalog.js';

export {
  ContentSchemaError,
  type ContentSchemaWarning,
  type ContentSchemaWarningSeverity,
} from './errors.js';

export * from './base/ids.js';
export * from './base/numbers.js';

export * from './modules/metadata.js';
export * from './modules/items.js';
export * from './modules/vehicles.js';
export * from './modules/vehicle-save.js';
