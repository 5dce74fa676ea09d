import { encodeVehicleSave } from '../vehicle-save.js';
import type { VehicleSnapshot } from './types.js';

const FNV_OFFSET_BASIS_32 = 0x811c9dc5;
const FNV_PRIME_32 = 0x01000193;
const utf8Encoder = new TextEncoder();

function normalizeForDeterministicJson(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((entry) => normalizeForDeterministicJson(entry));
  }

  const result: Record<string, unknown> = {};
  const entries = Object.entries(value).sort(([left], [right]) =>
    left < right ? -1 : left > right ? 1 : 0,
  );
  for (const [key, entry] of entries) {
    result[key] = normalizeForDeterministicJson(entry);
  }
  return result;
}

export function stringifyDeterministic(value: unknown): string {
  return JSON.stringify(normalizeForDeterministicJson(value));
}

/**
 * Compute FNV-1a hash of a Uint8Array.
 * Returns a 32-bit hash as an 8-character hex string.
 */
export function fnv1a32(data: Uint8Array): string {
  let hash = FNV_OFFSET_BASIS_32;
  for (let i = 0; i < data.length; i += 1) {
    hash ^= data[i];
    hash = Math.imul(hash, FNV_PRIME_32) >>> 0;
  }
  return hash.toString(16).padStart(8, '0');
}

/**
 * Compute a deterministic checksum for a vehicle snapshot.
 *
 * The checksum covers the save encoding of the snapshot and excludes
 * `instanceId` and `capturedAt`, so the same vehicle state captured from two
 * instances hashes identically.
 *
 * @example
 * ```typescript
 * if (computeVehicleSnapshotChecksum(snapshot) !== expected) {
 *   console.warn('Vehicle snapshot mismatch detected.');
 * }
 * ```
 */
export function computeVehicleSnapshotChecksum(snapshot: VehicleSnapshot): string {
  const {
    instanceId: _instanceId,
    savedAt: _savedAt,
    ...checksumSave
  } = encodeVehicleSave(snapshot);
  const json = stringifyDeterministic(checksumSave);
  return fnv1a32(utf8Encoder.encode(json));
}
