import type { NormalizedVehicle } from '@rigsnap/content-schema';

import { resolveVehicleDefinition, type AssetCatalog } from '../asset-catalog.js';
import { spawnAttachments } from '../attachments.js';
import { restoreCargo } from '../cargo.js';
import {
  DEFAULT_SNAPSHOT_ENGINE_CONFIG,
  type SnapshotEngineConfig,
} from '../config.js';
import { paintOverrideColor } from '../paint.js';
import { recordSnapshotCounters, telemetry } from '../telemetry.js';
import type {
  LiveBarricade,
  LiveStructure,
  LiveTire,
  LiveTurret,
  LiveVehicle,
  Ownership,
  VehicleWorld,
} from '../world.js';
import type { VehicleSnapshot } from './types.js';

export interface RestoreVehicleSnapshotOptions {
  /** Snapshot to restore from. Never mutated. */
  readonly snapshot: VehicleSnapshot;

  /** World the vehicle is spawned into. */
  readonly world: VehicleWorld;

  /** Catalog used to resolve the vehicle and fallback turret items. */
  readonly catalog: AssetCatalog;

  /**
   * Identity claiming the vehicle. Replaces the snapshot's owner and group on
   * the restored vehicle.
   */
  readonly caller?: Ownership;

  /**
   * Spawn attachments with the restored vehicle's owner and group instead of
   * their own (default: `true` when `caller` is given).
   */
  readonly rebindAttachedOwnership?: boolean;

  readonly config?: SnapshotEngineConfig;
}

export type TurretStateSource = 'snapshot' | 'catalog-default';

export interface VehicleRestoreReconciliation {
  /** Tire slots written from the snapshot. */
  readonly tiresApplied: number;
  /** Snapshot tire flags with no matching slot on the restored vehicle. */
  readonly tiresIgnored: number;
  readonly turretSource: TurretStateSource;
  readonly cargoItemsInserted: number;
  /** Placeholder attachments (definition id `0`) that were not spawned. */
  readonly attachmentsSkipped: number;
}

export interface RestoredVehicle {
  readonly vehicle: LiveVehicle;
  readonly barricades: readonly LiveBarricade[];
  readonly structures: readonly LiveStructure[];
  readonly reconciliation: VehicleRestoreReconciliation;
}

/**
 * Writes stored tire flags onto the first `min(stored, live)` slots. Slots
 * beyond the stored sequence keep their spawn default.
 */
export function applyTireLiveness(
  tires: readonly LiveTire[],
  stored: readonly boolean[],
): number {
  const count = Math.min(stored.length, tires.length);
  for (let index = 0; index < count; index += 1) {
    tires[index].isAlive = stored[index];
  }
  return count;
}

/**
 * Assigns turret state blobs. Stored blobs are applied only when the stored
 * sequence matches the live mount count exactly; otherwise every live mount
 * is reset to the default state of the item the current definition mounts
 * at that index, since a blob is only meaningful for the item it came from.
 */
export function applyTurretStates(
  turrets: readonly (LiveTurret | undefined)[],
  stored: readonly Uint8Array[],
  definition: NormalizedVehicle,
  catalog: AssetCatalog,
): TurretStateSource {
  if (stored.length === turrets.length) {
    turrets.forEach((turret, index) => {
      const state = stored[index];
      if (turret && state) {
        turret.state = state.slice();
      }
    });
    return 'snapshot';
  }

  telemetry.recordWarning('TurretStateFallback', {
    definitionId: definition.id,
    storedMounts: stored.length,
    liveMounts: turrets.length,
  });

  turrets.forEach((turret, index) => {
    if (!turret) {
      return;
    }
    const mount = definition.turrets[index];
    const item = mount ? catalog.findItem(mount.itemId) : undefined;
    if (!item) {
      telemetry.recordWarning('TurretItemDefinitionMissing', {
        definitionId: definition.id,
        mountIndex: index,
        itemId: mount?.itemId,
      });
      return;
    }
    turret.state = catalog.defaultStateFor(item);
  });
  return 'catalog-default';
}

const rollback = (
  world: VehicleWorld,
  vehicle: LiveVehicle,
  teardown: readonly (() => void)[],
  cause: unknown,
): void => {
  const steps = [...teardown].reverse();
  steps.push(() => world.destroyVehicle(vehicle));

  for (const step of steps) {
    try {
      step();
    } catch (error) {
      telemetry.recordError('VehicleRestoreRollbackFailed', {
        instanceId: vehicle.instanceId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  telemetry.recordWarning('VehicleRestoreRolledBack', {
    instanceId: vehicle.instanceId,
    reason: cause instanceof Error ? cause.message : String(cause),
  });
  recordSnapshotCounters({ rollbacks: 1 });
};

/**
 * Spawn a new vehicle from a snapshot and reconcile it with the stored state.
 *
 * Steps run in a fixed order: resolve the definition, spawn (with the paint
 * override when one was stored), tires, trunk, attachments, turrets. Slot
 * counts of the new vehicle come from the current catalog and may differ
 * from the snapshot; tires are truncated to the shorter side and turrets fall
 * back to catalog defaults on any count mismatch.
 *
 * Definition lookup failures throw `DefinitionNotFoundError` before anything
 * is spawned. World errors propagate unchanged; when they happen after the
 * spawn, the partial vehicle is torn down first unless
 * `config.restore.rollbackOnFailure` is off.
 *
 * @example
 * ```typescript
 * const { vehicle } = restoreVehicleSnapshot({
 *   snapshot,
 *   world,
 *   catalog,
 *   caller: { owner: playerId, group: playerGroupId },
 * });
 * ```
 */
export function restoreVehicleSnapshot(
  options: RestoreVehicleSnapshotOptions,
): RestoredVehicle {
  const {
    snapshot,
    world,
    catalog,
    caller,
    config = DEFAULT_SNAPSHOT_ENGINE_CONFIG,
  } = options;
  const rebindAttachedOwnership =
    options.rebindAttachedOwnership ?? caller !== undefined;

  const definition = resolveVehicleDefinition(
    catalog,
    snapshot.definitionGuid,
    snapshot.definitionId,
  );

  const owner = caller?.owner ?? snapshot.owner;
  const group = caller?.group ?? snapshot.group;
  const paintColor = paintOverrideColor(snapshot.paint);

  const vehicle = world.spawnVehicle({
    definition,
    skinId: snapshot.skinId,
    mythicId: snapshot.mythicId,
    roadPosition: snapshot.roadPosition,
    frame: { position: snapshot.position, rotation: snapshot.rotation },
    fuel: snapshot.fuel,
    health: snapshot.health,
    batteryCharge: snapshot.batteryCharge,
    owner,
    group,
    locked: owner !== 0n,
    ...(paintColor ? { paintColor } : {}),
  });

  const teardown: (() => void)[] = [];

  try {
    const liveTires = vehicle.tires ?? [];
    const tiresApplied = applyTireLiveness(liveTires, snapshot.tires);
    vehicle.sendTireAliveMaskUpdate();

    const cargoItemsInserted = restoreCargo(vehicle.cargo, snapshot.cargo);

    const attachments = spawnAttachments(
      world,
      vehicle,
      snapshot,
      rebindAttachedOwnership ? { owner, group } : undefined,
      teardown,
    );

    const turretSource = applyTurretStates(
      vehicle.turrets ?? [],
      snapshot.turrets,
      definition,
      catalog,
    );

    const reconciliation: VehicleRestoreReconciliation = {
      tiresApplied,
      tiresIgnored: snapshot.tires.length - tiresApplied,
      turretSource,
      cargoItemsInserted,
      attachmentsSkipped: attachments.skipped,
    };

    telemetry.recordProgress('VehicleRestored', {
      definitionId: definition.id,
      instanceId: vehicle.instanceId,
      ...reconciliation,
    });
    recordSnapshotCounters({
      restored: 1,
      turretFallbacks: turretSource === 'catalog-default' ? 1 : 0,
      attachedSpawned:
        attachments.barricades.length + attachments.structures.length,
    });

    return {
      vehicle,
      barricades: attachments.barricades,
      structures: attachments.structures,
      reconciliation,
    };
  } catch (error) {
    if (config.restore.rollbackOnFailure) {
      rollback(world, vehicle, teardown, error);
    }
    throw error;
  }
}
