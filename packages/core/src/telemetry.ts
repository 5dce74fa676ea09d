/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
}

const consoleTelemetry: TelemetryFacade = {
  recordError(event, data) {
    console.error(`[telemetry:error] ${event}`, data);
  },
  recordWarning(event, data) {
    console.warn(`[telemetry:warning] ${event}`, data);
  },
  recordProgress(event, data) {
    console.info(`[telemetry:progress] ${event}`, data);
  },
  recordCounters(group, counters) {
    console.info(`[telemetry:counters] ${group}`, counters);
  },
};

/**
 * A no-op telemetry implementation that silently discards all events.
 * This is the default telemetry facade.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
};

/**
 * Creates a telemetry facade that logs all events to the console.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@rigsnap/core';
 * setTelemetry(createConsoleTelemetry());
 */
export function createConsoleTelemetry(): TelemetryFacade {
  return consoleTelemetry;
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(activeTelemetry, 'recordError', event, data);
  },
  recordWarning(event, data) {
    invokeSafely(activeTelemetry, 'recordWarning', event, data);
  },
  recordProgress(event, data) {
    invokeSafely(activeTelemetry, 'recordProgress', event, data);
  },
  recordCounters(group, counters) {
    invokeSafely(activeTelemetry, 'recordCounters', group, counters);
  },
};

export const SNAPSHOT_COUNTER_GROUP = 'vehicle_snapshots';

export type SnapshotCounter =
  | 'captured'
  | 'restored'
  | 'turretFallbacks'
  | 'attachedCaptured'
  | 'attachedSpawned'
  | 'rollbacks';

/**
 * Reports per-operation increments for the snapshot engine. Zero entries are
 * dropped so sinks only see counters that moved.
 */
export function recordSnapshotCounters(
  counters: Readonly<Partial<Record<SnapshotCounter, number>>>,
): void {
  const increments: Record<string, number> = {};
  let hasIncrement = false;
  for (const [name, value] of Object.entries(counters)) {
    if (typeof value === 'number' && value > 0) {
      increments[name] = value;
      hasIncrement = true;
    }
  }
  if (hasIncrement) {
    telemetry.recordCounters(SNAPSHOT_COUNTER_GROUP, increments);
  }
}

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

function invokeSafely<TMethod extends keyof TelemetryFacade>(
  facade: TelemetryFacade,
  method: TMethod,
  ...args: Parameters<TelemetryFacade[TMethod]>
): void {
  try {
    (
      facade[method] as (
        ...fnArgs: Parameters<TelemetryFacade[TMethod]>
      ) => ReturnType<TelemetryFacade[TMethod]>
    ).call(facade, ...args);
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}
