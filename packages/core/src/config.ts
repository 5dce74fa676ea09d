export interface SnapshotEngineConfig {
  readonly restore: {
    /**
     * Destroy the attachments already spawned and then the vehicle itself
     * when a restore step after the spawn throws. When disabled the
     * half-built vehicle stays in the world.
     *
     * @defaultValue `true`
     */
    readonly rollbackOnFailure: boolean;
  };
  readonly limits: {
    /**
     * Largest turret state blob accepted when loading a save.
     *
     * @defaultValue `1024`
     */
    readonly maxTurretStateBytes: number;
    /**
     * Most trunk entries accepted when loading a save.
     *
     * @defaultValue `512`
     */
    readonly maxCargoItems: number;
    /**
     * Most barricades plus structures accepted when loading a save.
     *
     * @defaultValue `1024`
     */
    readonly maxAttachedEntities: number;
    /**
     * Most tire flags accepted when loading a save.
     *
     * @defaultValue `64`
     */
    readonly maxTireSlots: number;
  };
}

export type SnapshotEngineConfigOverrides = Readonly<{
  readonly restore?: Partial<SnapshotEngineConfig['restore']>;
  readonly limits?: Partial<SnapshotEngineConfig['limits']>;
}>;

export const DEFAULT_SNAPSHOT_ENGINE_CONFIG: SnapshotEngineConfig = Object.freeze({
  restore: Object.freeze({
    rollbackOnFailure: true,
  }),
  limits: Object.freeze({
    maxTurretStateBytes: 1024,
    maxCargoItems: 512,
    maxAttachedEntities: 1024,
    maxTireSlots: 64,
  }),
});

function toPositiveInt(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(value));
}

function toBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function resolveRestoreConfig(
  overrides: SnapshotEngineConfigOverrides['restore'] | undefined,
): SnapshotEngineConfig['restore'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_SNAPSHOT_ENGINE_CONFIG.restore;

  return {
    rollbackOnFailure:
      toBoolean(source.rollbackOnFailure) ?? defaults.rollbackOnFailure,
  };
}

function resolveLimitsConfig(
  overrides: SnapshotEngineConfigOverrides['limits'] | undefined,
): SnapshotEngineConfig['limits'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_SNAPSHOT_ENGINE_CONFIG.limits;

  return {
    maxTurretStateBytes:
      toPositiveInt(source.maxTurretStateBytes) ?? defaults.maxTurretStateBytes,
    maxCargoItems: toPositiveInt(source.maxCargoItems) ?? defaults.maxCargoItems,
    maxAttachedEntities:
      toPositiveInt(source.maxAttachedEntities) ?? defaults.maxAttachedEntities,
    maxTireSlots: toPositiveInt(source.maxTireSlots) ?? defaults.maxTireSlots,
  };
}

export function resolveSnapshotEngineConfig(
  overrides?: SnapshotEngineConfigOverrides,
): SnapshotEngineConfig {
  const config: SnapshotEngineConfig = {
    restore: resolveRestoreConfig(overrides?.restore),
    limits: resolveLimitsConfig(overrides?.limits),
  };
  return Object.freeze({
    restore: Object.freeze(config.restore),
    limits: Object.freeze(config.limits),
  });
}
