import { describeStatus, parseSnapshot, type StatusView } from '@printlink/core';

export function viewOf(payload: Record<string, unknown> | null, overrides: Partial<StatusView> = {}): StatusView {
  const snapshot = payload ? parseSnapshot(payload) : null;
  return {
    snapshot,
    connection: 'polling',
    pausing: false,
    resuming: false,
    canceling: false,
    label: describeStatus(snapshot, { pausing: false, resuming: false, canceling: false }),
    progress: snapshot?.progress ?? 0,
    job: snapshot?.job ?? null,
    awaitingSession: false,
    sessionReady: true,
    thumbnail: null,
    thumbnailState: 'unresolved',
    prevLayerSeconds: null,
    loading: false,
    error: null,
    consecutiveErrors: 0,
    hasEverConnected: true,
    ...overrides,
  };
}

export const printingCube = {
  status: 'Printing',
  layer: 25,
  print_data: {
    layer_count: 100,
    print_time: 3725,
    used_material: 2.5,
    file_data: { path: '/models/cube.ctb', location_category: 'Usb' },
  },
  physical_state: { z: 1.25 },
  resin_temperature: '24.5 °C',
};
