/* eslint-disable no-console */

import { Counter, Registry, collectDefaultMetrics } from 'prom-client';

import type { SnapshotCounter, TelemetryEventData, TelemetryFacade } from './telemetry.js';
import { SNAPSHOT_COUNTER_GROUP } from './telemetry.js';

export interface PrometheusTelemetryOptions {
  readonly registry?: Registry;
  readonly prefix?: string;
  readonly collectDefaultMetrics?: boolean;
}

type SnapshotCounters = Readonly<Record<SnapshotCounter, Counter<string>>>;

const DEFAULT_PREFIX = 'rigsnap_';

export interface PrometheusTelemetryFacade extends TelemetryFacade {
  readonly registry: Registry;
}

export function createPrometheusTelemetry(
  options: PrometheusTelemetryOptions = {},
): PrometheusTelemetryFacade {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? DEFAULT_PREFIX;

  if (options.collectDefaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const errors = new Counter({
    name: `${prefix}telemetry_errors_total`,
    help: 'Total number of telemetry errors emitted by the snapshot engine.',
    registers: [registry],
    labelNames: ['event'],
  });

  const warnings = new Counter({
    name: `${prefix}telemetry_warnings_total`,
    help: 'Total number of telemetry warnings emitted by the snapshot engine.',
    registers: [registry],
    labelNames: ['event'],
  });

  const snapshotCounters: SnapshotCounters = {
    captured: new Counter({
      name: `${prefix}vehicle_captures_total`,
      help: 'Total number of vehicles captured into snapshots.',
      registers: [registry],
    }),
    restored: new Counter({
      name: `${prefix}vehicle_restores_total`,
      help: 'Total number of vehicles restored from snapshots.',
      registers: [registry],
    }),
    turretFallbacks: new Counter({
      name: `${prefix}turret_fallbacks_total`,
      help: 'Total number of restores that reset turrets to catalog defaults.',
      registers: [registry],
    }),
    attachedCaptured: new Counter({
      name: `${prefix}attached_entities_captured_total`,
      help: 'Total number of attached barricades and structures captured.',
      registers: [registry],
    }),
    attachedSpawned: new Counter({
      name: `${prefix}attached_entities_spawned_total`,
      help: 'Total number of attached barricades and structures spawned on restore.',
      registers: [registry],
    }),
    rollbacks: new Counter({
      name: `${prefix}vehicle_restore_rollbacks_total`,
      help: 'Total number of restores rolled back after a failed step.',
      registers: [registry],
    }),
  };

  const logError = createConsoleLogger('error');
  const logWarning = createConsoleLogger('warn');
  const logInfo = createConsoleLogger('info');

  const facade: PrometheusTelemetryFacade = {
    recordError(event: string, data?: TelemetryEventData) {
      errors.inc({ event });
      logError(`[telemetry:error] ${event}`, data);
    },
    recordWarning(event: string, data?: TelemetryEventData) {
      warnings.inc({ event });
      logWarning(`[telemetry:warning] ${event}`, data);
    },
    recordProgress(event: string, data?: TelemetryEventData) {
      logInfo(`[telemetry:progress] ${event}`, data);
    },
    recordCounters(group: string, counters: Readonly<Record<string, number>>) {
      if (group === SNAPSHOT_COUNTER_GROUP) {
        updateSnapshotCounters(snapshotCounters, counters);
      }
    },
    registry,
  };

  return facade;
}

function isSnapshotCounter(
  counters: SnapshotCounters,
  key: string,
): key is SnapshotCounter {
  return Object.prototype.hasOwnProperty.call(counters, key);
}

function updateSnapshotCounters(
  counters: SnapshotCounters,
  values: Readonly<Record<string, number>>,
): void {
  // Values are per-operation increments, never running totals.
  for (const [key, value] of Object.entries(values)) {
    if (
      !isSnapshotCounter(counters, key) ||
      typeof value !== 'number' ||
      !Number.isFinite(value) ||
      value <= 0
    ) {
      continue;
    }
    counters[key].inc(value);
  }
}

type ConsoleMethod = (message?: unknown, ...optionalParams: unknown[]) => void;

function createConsoleLogger<
  TMethod extends 'error' | 'warn' | 'info',
>(method: TMethod): ConsoleMethod {
  if (typeof console?.[method] === 'function') {
    return console[method].bind(console);
  }
  return () => {};
}
