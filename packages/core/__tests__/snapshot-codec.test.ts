import { describe, expect, test } from 'vitest';
import { describeStatus, jobKey, parseSnapshot, parseTemperature } from '../src/codec';
import { ParseError } from '../src/errors';

const NO_INTENT = { pausing: false, resuming: false, canceling: false };

describe('parseSnapshot', () => {
  test('should decode a printing payload', () => {
    const snapshot = parseSnapshot({
      status: 'Printing',
      layer: 25,
      print_data: {
        layer_count: 100,
        print_time: 90,
        used_material: 2.5,
        file_data: { path: '/models/benchy.ctb', location_category: 'Usb' },
      },
      physical_state: { z: 1.25 },
    });

    expect(snapshot.status).toBe('printing');
    expect(snapshot.isPrinting).toBe(true);
    expect(snapshot.isPaused).toBe(false);
    expect(snapshot.isCanceled).toBe(false);
    expect(snapshot.isIdle).toBe(false);
    expect(snapshot.progress).toBe(0.25);
    expect(snapshot.layerIndex).toBe(25);
    expect(snapshot.layerCount).toBe(100);
    expect(snapshot.elapsedSeconds).toBe(90);
    expect(snapshot.usedMaterialMl).toBe(2.5);
    expect(snapshot.physicalPosition.z).toBe(1.25);
    expect(snapshot.job).toEqual({ name: 'benchy.ctb', path: '/models/benchy.ctb', locationCategory: 'Usb' });
    expect(snapshot.deviceMessage).toBe('Printing');
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  test('should default missing fields', () => {
    const snapshot = parseSnapshot({ status: 'Idle' });
    expect(snapshot.isIdle).toBe(true);
    expect(snapshot.progress).toBe(0);
    expect(snapshot.layerIndex).toBeNull();
    expect(snapshot.layerCount).toBeNull();
    expect(snapshot.elapsedSeconds).toBe(0);
    expect(snapshot.job).toBeNull();
    expect(snapshot.resinTemperature).toBeNull();
  });

  test('should clamp progress to [0, 1]', () => {
    expect(parseSnapshot({ status: 'Printing', progress: 1.7 }).progress).toBe(1);
    expect(parseSnapshot({ status: 'Printing', progress: -0.2 }).progress).toBe(0);
    const overrun = parseSnapshot({ status: 'Printing', layer: 120, print_data: { layer_count: 100 } });
    expect(overrun.progress).toBe(1);
  });

  test('should prefer explicit progress over layers', () => {
    const snapshot = parseSnapshot({ status: 'Printing', progress: 0.4, layer: 10, print_data: { layer_count: 100 } });
    expect(snapshot.progress).toBe(0.4);
  });

  test('should treat a paused flag on a printing status as paused', () => {
    const snapshot = parseSnapshot({ status: 'Printing', paused: true });
    expect(snapshot.status).toBe('paused');
    expect(snapshot.isPaused).toBe(true);
    expect(snapshot.isPrinting).toBe(false);
  });

  test('should map transitional device states to latches', () => {
    const pausing = parseSnapshot({ status: 'Pausing' });
    expect(pausing.status).toBe('printing');
    expect(pausing.pauseLatched).toBe(true);

    const canceling = parseSnapshot({ status: 'Cancelling' });
    expect(canceling.status).toBe('printing');
    expect(canceling.cancelLatched).toBe(true);
  });

  test('should match statuses case-insensitively', () => {
    expect(parseSnapshot({ status: 'CANCELLED' }).status).toBe('canceled');
    expect(parseSnapshot({ status: ' paused ' }).status).toBe('paused');
  });

  test('should default the job location and name', () => {
    const snapshot = parseSnapshot({ status: 'Printing', print_data: { file_data: { path: 'rook.ctb' } } });
    expect(snapshot.job).toEqual({ name: 'rook.ctb', path: 'rook.ctb', locationCategory: 'Local' });
  });

  test('should read device extras', () => {
    const snapshot = parseSnapshot({
      status: 'Idle',
      layer: 100,
      finished: true,
      device_status_message: 'Print finished',
      resin_temperature: '24.5 °C',
      cpu_temp: 41.2,
      physical_state: { curing: true },
    });
    expect(snapshot.finished).toBe(true);
    expect(snapshot.deviceMessage).toBe('Print finished');
    expect(snapshot.resinTemperature).toBe(24.5);
    expect(snapshot.cpuTemperature).toBe(41.2);
    expect(snapshot.curing).toBe(true);
  });

  test('should reject payloads without a usable status', () => {
    expect(() => parseSnapshot('Printing')).toThrow(ParseError);
    expect(() => parseSnapshot({ layer: 3 })).toThrow('Status payload is missing the status field');
    expect(() => parseSnapshot({ status: 'Exploded' })).toThrow('Unknown printer status: Exploded');
  });

  test('should report the failing field', () => {
    try {
      parseSnapshot({ status: '' });
      expect.unreachable();
    } catch (error) {
      expect(error instanceof ParseError ? error.field : undefined).toBe('status');
    }
  });
});

describe('parseTemperature', () => {
  test('should accept numbers and decorated strings', () => {
    expect(parseTemperature(30)).toBe(30);
    expect(parseTemperature('31.5°C')).toBe(31.5);
    expect(parseTemperature('n/a')).toBeNull();
    expect(parseTemperature(undefined)).toBeNull();
  });
});

describe('jobKey', () => {
  test('should combine location and path', () => {
    expect(jobKey({ locationCategory: 'Usb', path: '/a.ctb' })).toBe('Usb:/a.ctb');
  });
});

describe('describeStatus', () => {
  const printing = parseSnapshot({ status: 'Printing', layer: 3 });
  const paused = parseSnapshot({ status: 'Paused', layer: 3 });
  const canceled = parseSnapshot({ status: 'Canceled', layer: 3 });

  test('should describe plain states', () => {
    expect(describeStatus(null, NO_INTENT)).toBe('Unknown');
    expect(describeStatus(printing, NO_INTENT)).toBe('Printing');
    expect(describeStatus(paused, NO_INTENT)).toBe('Paused');
    expect(describeStatus(canceled, NO_INTENT)).toBe('Canceled');
    expect(describeStatus(parseSnapshot({ status: 'Idle' }), NO_INTENT)).toBe('Idle');
    expect(describeStatus(parseSnapshot({ status: 'Idle', layer: 100 }), NO_INTENT)).toBe('Finished');
    expect(describeStatus(parseSnapshot({ status: 'Printing', physical_state: { curing: true } }), NO_INTENT)).toBe(
      'Curing'
    );
  });

  test('should let transitional intents take precedence', () => {
    expect(describeStatus(printing, { ...NO_INTENT, pausing: true })).toBe('Pausing');
    expect(describeStatus(paused, { ...NO_INTENT, resuming: true })).toBe('Resuming');
    expect(describeStatus(printing, { ...NO_INTENT, canceling: true })).toBe('Canceling');
    expect(describeStatus(null, { ...NO_INTENT, canceling: true })).toBe('Canceling');
  });

  test('should show the observed state once the device got there', () => {
    expect(describeStatus(paused, { ...NO_INTENT, pausing: true })).toBe('Paused');
    expect(describeStatus(canceled, { ...NO_INTENT, canceling: true })).toBe('Canceled');
  });
});
