import { describe, expect, it } from 'vitest';

import { createBarricadeSnapshot, createVehicleSnapshot } from '../test-world.js';
import { compareVehicleSnapshots, hasSnapshotDiverged } from './compare.js';

describe('compareVehicleSnapshots', () => {
  it('treats snapshots differing only in instance and capture time as identical', () => {
    const diff = compareVehicleSnapshots(
      createVehicleSnapshot({ instanceId: 1, capturedAt: 1 }),
      createVehicleSnapshot({ instanceId: 2, capturedAt: 2 }),
    );

    expect(diff).toEqual({ identical: true, differences: [] });
  });

  it('reports the instance id on request', () => {
    const diff = compareVehicleSnapshots(
      createVehicleSnapshot({ instanceId: 500 }),
      createVehicleSnapshot({ instanceId: 501 }),
      { includeInstanceId: true },
    );

    expect(diff.differences).toEqual([{ path: 'instanceId', local: 500, remote: 501 }]);
  });

  it('reports tire differences per index', () => {
    const diff = compareVehicleSnapshots(
      createVehicleSnapshot(),
      createVehicleSnapshot({ tires: [true, true, false, true] }),
    );

    expect(diff.identical).toBe(false);
    expect(diff.differences).toEqual([{ path: 'tires[2]', local: true, remote: false }]);
  });

  it('reports entries present on one side only', () => {
    const diff = compareVehicleSnapshots(
      createVehicleSnapshot({ tires: [true] }),
      createVehicleSnapshot({ tires: [true, false] }),
    );

    expect(diff.differences).toEqual([
      { path: 'tires[1]', local: undefined, remote: false },
    ]);
  });

  it('compares turret blobs by content', () => {
    const same = compareVehicleSnapshots(
      createVehicleSnapshot({ turrets: [Uint8Array.of(1)] }),
      createVehicleSnapshot({ turrets: [Uint8Array.of(1)] }),
    );
    const different = compareVehicleSnapshots(
      createVehicleSnapshot({ turrets: [Uint8Array.of(1)] }),
      createVehicleSnapshot({ turrets: [Uint8Array.of(2)] }),
    );

    expect(same.identical).toBe(true);
    expect(different.differences).toEqual([
      { path: 'turrets[0]', local: Uint8Array.of(1), remote: Uint8Array.of(2) },
    ]);
  });

  it('reports nested attachment fields', () => {
    const diff = compareVehicleSnapshots(
      createVehicleSnapshot({ barricades: [createBarricadeSnapshot({ owner: 5n })] }),
      createVehicleSnapshot({ barricades: [createBarricadeSnapshot({ owner: 6n })] }),
    );

    expect(diff.differences).toEqual([
      { path: 'barricades[0].owner', local: 5n, remote: 6n },
    ]);
  });

  it('reports paint kind changes', () => {
    const diff = compareVehicleSnapshots(
      createVehicleSnapshot(),
      createVehicleSnapshot({ paint: { kind: 'rgba', color: { r: 1, g: 2, b: 3, a: 4 } } }),
    );

    expect(diff.differences).toEqual([
      { path: 'paint.kind', local: 'none', remote: 'rgba' },
      { path: 'paint.color', local: undefined, remote: { r: 1, g: 2, b: 3, a: 4 } },
    ]);
  });
});

describe('hasSnapshotDiverged', () => {
  it('detects divergence through checksums', () => {
    expect(hasSnapshotDiverged(createVehicleSnapshot(), createVehicleSnapshot())).toBe(false);
    expect(
      hasSnapshotDiverged(createVehicleSnapshot(), createVehicleSnapshot({ fuel: 12 })),
    ).toBe(true);
  });
});
