import { describe, expect, test } from 'vitest';
import { homedir } from 'os';
import { join } from 'path';
import {
  clamp,
  expandPath,
  formatClock,
  formatDuration,
  isRecord,
  isValidUrl,
  jitteredDelay,
  normalizeUrl,
} from '../src/utils';

describe('jitteredDelay', () => {
  test('should stay within base and base + jitter', () => {
    expect(jitteredDelay(3000, 2000, () => 0)).toBe(3000);
    expect(jitteredDelay(3000, 2000, () => 0.5)).toBe(4000);
    expect(jitteredDelay(3000, 2000, () => 1)).toBe(5000);
  });

  test('should clamp out-of-range random values', () => {
    expect(jitteredDelay(3000, 2000, () => -1)).toBe(3000);
    expect(jitteredDelay(3000, 2000, () => 7)).toBe(5000);
  });
});

describe('clamp', () => {
  test('should clamp values to the range', () => {
    expect(clamp(-0.5, 0, 1)).toBe(0);
    expect(clamp(0.4, 0, 1)).toBe(0.4);
    expect(clamp(3, 0, 1)).toBe(1);
  });
});

describe('formatDuration', () => {
  test('should format durations correctly', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1000)).toBe('1.00s');
    expect(formatDuration(90000)).toBe('1.50m');
  });
});

describe('expandPath', () => {
  test('should expand a leading tilde only', () => {
    expect(expandPath('~/printers')).toBe(join(homedir(), 'printers'));
    expect(expandPath('/etc/printlink')).toBe('/etc/printlink');
  });
});

describe('formatClock', () => {
  test('should format seconds as HH:MM:SS', () => {
    expect(formatClock(0)).toBe('00:00:00');
    expect(formatClock(3725)).toBe('01:02:05');
    expect(formatClock(59.9)).toBe('00:00:59');
    expect(formatClock(-4)).toBe('00:00:00');
  });
});

describe('isValidUrl', () => {
  test('should validate URLs correctly', () => {
    expect(isValidUrl('http://printer.local:12357')).toBe(true);
    expect(isValidUrl('https://example.com/api')).toBe(true);
    expect(isValidUrl('not a url')).toBe(false);
    expect(isValidUrl('')).toBe(false);
  });
});

describe('normalizeUrl', () => {
  test('should add protocol if missing', () => {
    expect(normalizeUrl('printer.local:12357')).toBe('http://printer.local:12357');
  });

  test('should strip trailing slashes', () => {
    expect(normalizeUrl('https://printer.local/api//')).toBe('https://printer.local/api');
  });

  test('should keep existing protocol', () => {
    expect(normalizeUrl(' http://10.0.0.5 ')).toBe('http://10.0.0.5');
  });
});

describe('isRecord', () => {
  test('should accept plain objects only', () => {
    expect(isRecord({ status: 'Idle' })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('Idle')).toBe(false);
  });
});
