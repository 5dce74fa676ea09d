import type { VehicleSnapshot } from './types.js';

import { computeVehicleSnapshotChecksum } from './checksum.js';

export interface SnapshotValueDiff {
  /** Dotted path with index brackets, e.g. `barricades[1].owner`. */
  readonly path: string;
  /** `undefined` when the value only exists on the remote side. */
  readonly local: unknown;
  /** `undefined` when the value only exists on the local side. */
  readonly remote: unknown;
}

export interface VehicleSnapshotDiff {
  /** Whether snapshots are identical */
  readonly identical: boolean;
  readonly differences: readonly SnapshotValueDiff[];
}

export interface CompareVehicleSnapshotsOptions {
  /**
   * Also report a differing `instanceId`. Off by default because a restore
   * always produces a new instance.
   */
  readonly includeInstanceId?: boolean;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Uint8Array);

const bytesEqual = (left: Uint8Array, right: Uint8Array): boolean => {
  if (left.byteLength !== right.byteLength) {
    return false;
  }
  for (let index = 0; index < left.byteLength; index += 1) {
    if (left[index] !== right[index]) {
      return false;
    }
  }
  return true;
};

const joinPath = (parent: string, key: string): string =>
  parent.length === 0 ? key : `${parent}.${key}`;

const collectKeys = (
  local: Record<string, unknown>,
  remote: Record<string, unknown>,
): readonly string[] => {
  const keys = new Set<string>(Object.keys(local));
  for (const key of Object.keys(remote)) {
    keys.add(key);
  }
  return Array.from(keys);
};

const diffValues = (
  local: unknown,
  remote: unknown,
  path: string,
  differences: SnapshotValueDiff[],
): void => {
  if (local instanceof Uint8Array && remote instanceof Uint8Array) {
    if (!bytesEqual(local, remote)) {
      differences.push({ path, local, remote });
    }
    return;
  }

  if (Array.isArray(local) && Array.isArray(remote)) {
    const length = Math.max(local.length, remote.length);
    for (let index = 0; index < length; index += 1) {
      diffValues(local[index], remote[index], `${path}[${index}]`, differences);
    }
    return;
  }

  if (isRecord(local) && isRecord(remote)) {
    for (const key of collectKeys(local, remote)) {
      diffValues(local[key], remote[key], joinPath(path, key), differences);
    }
    return;
  }

  if (!Object.is(local, remote)) {
    differences.push({ path, local, remote });
  }
};

/**
 * Compare two vehicle snapshots field by field.
 *
 * `capturedAt` is never compared. Sequences are compared per index, so a
 * tire or turret present on one side only is reported with `undefined` on
 * the other.
 *
 * @example
 * ```typescript
 * const diff = compareVehicleSnapshots(before, after);
 * for (const { path, local, remote } of diff.differences) {
 *   console.warn(`${path}: ${String(local)} -> ${String(remote)}`);
 * }
 * ```
 */
export function compareVehicleSnapshots(
  local: VehicleSnapshot,
  remote: VehicleSnapshot,
  options: CompareVehicleSnapshotsOptions = {},
): VehicleSnapshotDiff {
  const {
    capturedAt: _localCapturedAt,
    instanceId: localInstanceId,
    ...localRest
  } = local;
  const {
    capturedAt: _remoteCapturedAt,
    instanceId: remoteInstanceId,
    ...remoteRest
  } = remote;

  const differences: SnapshotValueDiff[] = [];
  if (options.includeInstanceId === true && localInstanceId !== remoteInstanceId) {
    differences.push({
      path: 'instanceId',
      local: localInstanceId,
      remote: remoteInstanceId,
    });
  }
  diffValues(localRest, remoteRest, '', differences);

  return { identical: differences.length === 0, differences };
}

/**
 * Quick divergence check using checksums only.
 * Use this for periodic checks; fall back to compareVehicleSnapshots() for
 * debugging.
 */
export function hasSnapshotDiverged(
  local: VehicleSnapshot,
  remote: VehicleSnapshot,
): boolean {
  return (
    computeVehicleSnapshotChecksum(local) !==
    computeVehicleSnapshotChecksum(remote)
  );
}
