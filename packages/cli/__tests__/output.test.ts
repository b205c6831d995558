import { beforeAll, describe, expect, test } from 'vitest';
import chalk from 'chalk';
import {
  formatConnectionState,
  formatProgressBar,
  formatStatusLine,
  formatStatusView,
  toPlainView,
} from '../src/formatters/output';
import { printingCube, viewOf } from './helpers';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatProgressBar', () => {
  test('should fill proportionally', () => {
    expect(formatProgressBar(0.25)).toBe('█████░░░░░░░░░░░░░░░ 25.0%');
    expect(formatProgressBar(0, 4)).toBe('░░░░ 0.0%');
  });

  test('should clamp out-of-range progress', () => {
    expect(formatProgressBar(1.5, 10)).toBe('██████████ 100.0%');
  });
});

describe('formatConnectionState', () => {
  test('should label every channel', () => {
    expect(formatConnectionState('streaming')).toBe('● Streaming');
    expect(formatConnectionState('polling')).toBe('◐ Polling');
    expect(formatConnectionState('disconnected')).toBe('○ Disconnected');
  });
});

describe('formatStatusLine', () => {
  test('should summarise a running print', () => {
    expect(formatStatusLine(viewOf(printingCube))).toBe('Printing | 25.0%  layer 25/100 | cube.ctb');
  });

  test('should mention a pending session and the last error', () => {
    const view = viewOf({ status: 'Idle' }, { awaitingSession: true, error: 'offline' });
    expect(formatStatusLine(view)).toBe('Idle | waiting for new job | error: offline');
  });
});

describe('formatStatusView', () => {
  test('should render every known field', () => {
    const view = viewOf(printingCube, {
      connection: 'streaming',
      prevLayerSeconds: 3.5,
      thumbnail: new Uint8Array([1, 2, 3]),
      thumbnailState: 'ready',
    });

    expect(formatStatusView(view).split('\n')).toEqual([
      'Status:     Printing',
      'Connection: ● Streaming',
      'Job:        cube.ctb (Usb)',
      'Progress:   █████░░░░░░░░░░░░░░░ 25.0%  layer 25/100',
      'Elapsed:    01:02:05',
      'Z:          1.25 mm',
      'Material:   2.5 ml',
      'Resin:      24.5 °C',
      'Layer time: 3.5s',
      'Preview:    ready (3 bytes)',
    ]);
  });

  test('should render an empty view', () => {
    const view = viewOf(null, { loading: true, error: 'offline', consecutiveErrors: 2 });
    expect(formatStatusView(view).split('\n')).toEqual([
      'Status:     Unknown',
      'Connection: ◐ Polling',
      'Job:        (none)',
      'Progress:   ░░░░░░░░░░░░░░░░░░░░ 0.0%',
      'Preview:    -',
      'Last error: offline (2 in a row)',
    ]);
  });
});

describe('toPlainView', () => {
  test('should replace thumbnail bytes with their length', () => {
    const plain = toPlainView(viewOf(printingCube, { thumbnail: new Uint8Array([1, 2, 3, 4]) }));
    expect(plain.thumbnailBytes).toBe(4);
    expect('thumbnail' in plain).toBe(false);
    expect(plain.label).toBe('Printing');
  });
});
