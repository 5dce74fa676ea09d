import type { BarricadeSnapshot, StructureSnapshot } from './state-sync/types.js';
import type {
  AttachedEntityPort,
  LiveAttachedEntity,
  LiveBarricade,
  LiveStructure,
  LiveVehicle,
  Ownership,
  VehicleWorld,
} from './world.js';

export interface CapturedAttachments {
  readonly barricades: readonly BarricadeSnapshot[];
  readonly structures: readonly StructureSnapshot[];
}

export interface SpawnedAttachments {
  readonly barricades: readonly LiveBarricade[];
  readonly structures: readonly LiveStructure[];
  /** Placeholder entries (definition id `0`) that were not spawned. */
  readonly skipped: number;
}

type AttachmentWorld = Pick<
  VehicleWorld,
  'findAttachedRegion' | 'barricades' | 'structures'
>;

const NO_ATTACHMENTS: CapturedAttachments = Object.freeze({
  barricades: Object.freeze([]),
  structures: Object.freeze([]),
});

const captureLive = <TSnapshot, TLive extends LiveAttachedEntity>(
  port: AttachedEntityPort<TSnapshot, TLive>,
  entities: readonly TLive[],
): readonly TSnapshot[] =>
  Object.freeze(
    entities
      .filter((entity) => !entity.isDestroyed)
      .map((entity) => Object.freeze(port.capture(entity))),
  );

/**
 * Captures every live barricade and structure planted on the vehicle. A
 * vehicle without an attached region simply has no attachments.
 */
export function captureAttachments(
  world: AttachmentWorld,
  vehicle: LiveVehicle,
): CapturedAttachments {
  const region = world.findAttachedRegion(vehicle);
  if (!region) {
    return NO_ATTACHMENTS;
  }

  return Object.freeze({
    barricades: captureLive(world.barricades, region.barricades),
    structures: captureLive(world.structures, region.structures),
  });
}

/**
 * Spawns attachments onto `anchor` in stored order. A destroy callback is
 * pushed onto `teardown` as each entity comes up so a caller can remove a
 * partial result.
 */
export function spawnAttachments(
  world: AttachmentWorld,
  anchor: LiveVehicle,
  attachments: CapturedAttachments,
  ownership: Ownership | undefined,
  teardown: (() => void)[] = [],
): SpawnedAttachments {
  let skipped = 0;

  const spawnAll = <TSnapshot extends { readonly definitionId: number }, TLive extends LiveAttachedEntity>(
    port: AttachedEntityPort<TSnapshot, TLive>,
    snapshots: readonly TSnapshot[],
  ): TLive[] => {
    const result: TLive[] = [];
    for (const snapshot of snapshots) {
      if (snapshot.definitionId === 0) {
        skipped += 1;
        continue;
      }
      const entity = port.spawn(snapshot, anchor, ownership);
      teardown.push(() => port.destroy(entity));
      result.push(entity);
    }
    return result;
  };

  const barricades = spawnAll(world.barricades, attachments.barricades);
  const structures = spawnAll(world.structures, attachments.structures);

  return { barricades, structures, skipped };
}
