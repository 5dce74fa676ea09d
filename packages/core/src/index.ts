export {
  captureVehicleSnapshot,
  type CaptureVehicleSnapshotOptions,
} from './state-sync/capture.js';
export {
  applyTireLiveness,
  applyTurretStates,
  restoreVehicleSnapshot,
  type RestoredVehicle,
  type RestoreVehicleSnapshotOptions,
  type TurretStateSource,
  type VehicleRestoreReconciliation,
} from './state-sync/restore.js';
export {
  computeVehicleSnapshotChecksum,
  fnv1a32,
  stringifyDeterministic,
} from './state-sync/checksum.js';
export {
  compareVehicleSnapshots,
  hasSnapshotDiverged,
  type CompareVehicleSnapshotsOptions,
  type SnapshotValueDiff,
  type VehicleSnapshotDiff,
} from './state-sync/compare.js';
export type {
  BarricadeSnapshot,
  CargoEntrySnapshot,
  CargoSnapshot,
  StructureSnapshot,
  VehicleSnapshot,
} from './state-sync/types.js';
export type {
  AttachedEntityPort,
  AttachedRegion,
  ItemPayload,
  LiveAttachedEntity,
  LiveBarricade,
  LiveCargo,
  LiveCargoEntry,
  LiveStructure,
  LiveTire,
  LiveTurret,
  LiveVehicle,
  Ownership,
  PlacementFrame,
  Quaternion,
  Vector3,
  VehicleSpawnRequest,
  VehicleWorld,
} from './world.js';
export {
  decodePaintBytes,
  encodePaintBytes,
  NO_PAINT,
  NO_PAINT_BYTES,
  paintFromLiveColor,
  paintOverrideColor,
  type PaintBytes,
  type PaintOverride,
  type Rgba32,
} from './paint.js';
export {
  captureCargo,
  cloneItemPayload,
  EMPTY_CARGO,
  isCargoEmpty,
  restoreCargo,
} from './cargo.js';
export {
  captureAttachments,
  spawnAttachments,
  type CapturedAttachments,
  type SpawnedAttachments,
} from './attachments.js';
export {
  createAssetCatalog,
  resolveVehicleDefinition,
  type AssetCatalog,
} from './asset-catalog.js';
export {
  DEFAULT_VEHICLE_SAVE_MIGRATIONS,
  encodeVehicleSave,
  loadVehicleSave,
  type EncodeVehicleSaveOptions,
  type LoadVehicleSaveOptions,
  type SchemaMigration,
} from './vehicle-save.js';
export {
  DefinitionNotFoundError,
  VehicleSaveFormatError,
  type DefinitionKind,
  type VehicleSaveErrorCode,
} from './errors.js';
export {
  DEFAULT_SNAPSHOT_ENGINE_CONFIG,
  resolveSnapshotEngineConfig,
  type SnapshotEngineConfig,
  type SnapshotEngineConfigOverrides,
} from './config.js';
export {
  createConsoleTelemetry,
  recordSnapshotCounters,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  SNAPSHOT_COUNTER_GROUP,
  telemetry,
  type SnapshotCounter,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';
export {
  createPrometheusTelemetry,
  type PrometheusTelemetryOptions,
  type PrometheusTelemetryFacade,
} from './telemetry-prometheus.js';
