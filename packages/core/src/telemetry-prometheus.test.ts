import { describe, expect, it, vi } from 'vitest';
import { Registry } from 'prom-client';

import { createPrometheusTelemetry } from './telemetry-prometheus.js';
import { SNAPSHOT_COUNTER_GROUP } from './telemetry.js';

const silenceConsole = () => [
  vi.spyOn(console, 'error').mockImplementation(() => {}),
  vi.spyOn(console, 'warn').mockImplementation(() => {}),
  vi.spyOn(console, 'info').mockImplementation(() => {}),
];

describe('createPrometheusTelemetry', () => {
  it('maps snapshot counter increments onto Prometheus counters', async () => {
    const spies = silenceConsole();
    const registry = new Registry();
    const facade = createPrometheusTelemetry({
      registry,
      collectDefaultMetrics: false,
      prefix: 'test_',
    });

    try {
      facade.recordCounters(SNAPSHOT_COUNTER_GROUP, { captured: 1, attachedCaptured: 3 });
      facade.recordCounters(SNAPSHOT_COUNTER_GROUP, { captured: 1 });
      facade.recordCounters(SNAPSHOT_COUNTER_GROUP, {
        restored: 1,
        turretFallbacks: 1,
        attachedSpawned: 2,
        rollbacks: 1,
        unknown: 5,
        captured: -4,
      });
      facade.recordCounters('other_group', { captured: 10 });

      const read = async (name: string) =>
        (await registry.getSingleMetric(name)?.get())?.values[0]?.value;

      expect(await read('test_vehicle_captures_total')).toBe(2);
      expect(await read('test_attached_entities_captured_total')).toBe(3);
      expect(await read('test_vehicle_restores_total')).toBe(1);
      expect(await read('test_turret_fallbacks_total')).toBe(1);
      expect(await read('test_attached_entities_spawned_total')).toBe(2);
      expect(await read('test_vehicle_restore_rollbacks_total')).toBe(1);
    } finally {
      spies.forEach((spy) => spy.mockRestore());
    }
  });

  it('counts errors and warnings by event', async () => {
    const spies = silenceConsole();
    const registry = new Registry();
    const facade = createPrometheusTelemetry({
      registry,
      collectDefaultMetrics: false,
      prefix: 'test_',
    });

    try {
      facade.recordError('VehicleDefinitionMissing', { legacyId: 4 });
      facade.recordWarning('TurretStateFallback');
      facade.recordWarning('TurretStateFallback');
      facade.recordProgress('VehicleRestored');

      const errors = await registry.getSingleMetric('test_telemetry_errors_total')?.get();
      const warnings = await registry
        .getSingleMetric('test_telemetry_warnings_total')
        ?.get();

      expect(errors?.values).toEqual([
        expect.objectContaining({
          value: 1,
          labels: { event: 'VehicleDefinitionMissing' },
        }),
      ]);
      expect(warnings?.values).toEqual([
        expect.objectContaining({
          value: 2,
          labels: { event: 'TurretStateFallback' },
        }),
      ]);
    } finally {
      spies.forEach((spy) => spy.mockRestore());
    }
  });

  it('creates its own registry when none is given', () => {
    const facade = createPrometheusTelemetry({ collectDefaultMetrics: false });

    expect(facade.registry.getSingleMetric('rigsnap_vehicle_captures_total')).toBeDefined();
  });
});
