import { captureAttachments } from '../attachments.js';
import { captureCargo } from '../cargo.js';
import { paintFromLiveColor } from '../paint.js';
import { recordSnapshotCounters, telemetry } from '../telemetry.js';
import type {
  LiveTurret,
  LiveVehicle,
  Quaternion,
  Vector3,
  VehicleWorld,
} from '../world.js';
import type { VehicleSnapshot } from './types.js';

export interface CaptureVehicleSnapshotOptions {
  /** Vehicle to capture. */
  readonly vehicle: LiveVehicle;
  /** World used to discover entities planted on the vehicle. */
  readonly world: Pick<VehicleWorld, 'findAttachedRegion' | 'barricades' | 'structures'>;
  /** Optional timestamp override (wall clock, diagnostic only). */
  readonly capturedAt?: number;
}

const EMPTY_BLOB = new Uint8Array(0);

const captureTurretState = (turret: LiveTurret | undefined): Uint8Array =>
  turret ? turret.state.slice() : EMPTY_BLOB.slice();

const copyVector3 = ({ x, y, z }: Vector3): Vector3 => Object.freeze({ x, y, z });

const copyQuaternion = ({ x, y, z, w }: Quaternion): Quaternion =>
  Object.freeze({ x, y, z, w });

/**
 * Capture a vehicle, its trunk and every entity planted on its frame.
 *
 * The result shares no mutable state with the live vehicle: turret blobs and
 * item states are copied, and the snapshot structure is frozen. Reading the
 * vehicle has no side effects.
 *
 * @example
 * ```typescript
 * const snapshot = captureVehicleSnapshot({ vehicle, world, capturedAt: 0 });
 * ```
 */
export function captureVehicleSnapshot(
  options: CaptureVehicleSnapshotOptions,
): VehicleSnapshot {
  const { vehicle, world, capturedAt } = options;

  // One blob per mount slot, including holes in a sparse mount list, so the
  // indices stay aligned with the mount list.
  const turrets = Object.freeze(
    Array.from(vehicle.turrets ?? [], captureTurretState),
  );
  const tires = Object.freeze((vehicle.tires ?? []).map((tire) => tire.isAlive));
  const attachments = captureAttachments(world, vehicle);

  const snapshot: VehicleSnapshot = Object.freeze({
    definitionId: vehicle.definitionId,
    definitionGuid: vehicle.definitionGuid,
    instanceId: vehicle.instanceId,
    capturedAt: capturedAt ?? Date.now(),
    skinId: vehicle.skinId,
    mythicId: vehicle.mythicId,
    roadPosition: vehicle.roadPosition,
    health: vehicle.health,
    fuel: vehicle.fuel,
    batteryCharge: vehicle.batteryCharge,
    owner: vehicle.owner,
    group: vehicle.group,
    tires,
    turrets,
    cargo: captureCargo(vehicle.cargo),
    barricades: attachments.barricades,
    structures: attachments.structures,
    position: copyVector3(vehicle.frame.position),
    rotation: copyQuaternion(vehicle.frame.rotation),
    paint: paintFromLiveColor(vehicle.paintColor),
  });

  const attachedCount = snapshot.barricades.length + snapshot.structures.length;
  telemetry.recordProgress('VehicleCaptured', {
    definitionId: snapshot.definitionId,
    instanceId: snapshot.instanceId,
    attached: attachedCount,
  });
  recordSnapshotCounters({ captured: 1, attachedCaptured: attachedCount });

  return snapshot;
}
