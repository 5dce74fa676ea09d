import { describe, expect, it } from 'vitest';

import {
  DEFAULT_SNAPSHOT_ENGINE_CONFIG,
  resolveSnapshotEngineConfig,
} from './config.js';

describe('resolveSnapshotEngineConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveSnapshotEngineConfig()).toEqual(DEFAULT_SNAPSHOT_ENGINE_CONFIG);
    expect(DEFAULT_SNAPSHOT_ENGINE_CONFIG.restore.rollbackOnFailure).toBe(true);
    expect(DEFAULT_SNAPSHOT_ENGINE_CONFIG.limits).toEqual({
      maxTurretStateBytes: 1024,
      maxCargoItems: 512,
      maxAttachedEntities: 1024,
      maxTireSlots: 64,
    });
  });

  it('applies valid overrides and floors fractional limits', () => {
    const config = resolveSnapshotEngineConfig({
      restore: { rollbackOnFailure: false },
      limits: { maxCargoItems: 8.7, maxTireSlots: 6 },
    });

    expect(config.restore.rollbackOnFailure).toBe(false);
    expect(config.limits.maxCargoItems).toBe(8);
    expect(config.limits.maxTireSlots).toBe(6);
    expect(config.limits.maxTurretStateBytes).toBe(1024);
  });

  it('falls back to defaults for invalid limit overrides', () => {
    const config = resolveSnapshotEngineConfig({
      limits: {
        maxTurretStateBytes: -1,
        maxCargoItems: Number.NaN,
        maxAttachedEntities: Number.POSITIVE_INFINITY,
        maxTireSlots: 0,
      },
    });

    expect(config.limits).toEqual(DEFAULT_SNAPSHOT_ENGINE_CONFIG.limits);
  });

  it('returns a frozen config', () => {
    const config = resolveSnapshotEngineConfig({ limits: { maxCargoItems: 3 } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.limits)).toBe(true);
    expect(Object.isFrozen(config.restore)).toBe(true);
  });
});
