import { EventEmitter } from 'eventemitter3';
import { PrintLinkError } from '@printlink/core';

export type SimulatedStatus = 'Idle' | 'Printing' | 'Pausing' | 'Paused' | 'Canceling' | 'Canceled';

export interface SimulatedJob {
  name: string;
  path: string;
  location: string;
  layerCount: number;
  hasThumbnail: boolean;
}

export interface StartJobOptions {
  location?: string;
  layerCount?: number;
  hasThumbnail?: boolean;
}

export interface PrinterSimulatorOptions {
  defaultLayerCount?: number;
  layerHeightMm?: number;
  materialPerLayerMl?: number;
  /** Pause and cancel pass through Pausing/Canceling until the next tick. */
  latchedTransitions?: boolean;
}

export interface SimulatorPayload {
  status: SimulatedStatus;
  paused: boolean;
  layer: number | null;
  finished: boolean;
  device_status_message: string;
  resin_temperature: string;
  cpu_temp: number;
  physical_state: { z: number; curing: boolean };
  print_data?: {
    layer_count: number;
    print_time: number;
    used_material: number;
    file_data: { name: string; path: string; location_category: string };
  };
}

export interface PrinterSimulatorEvents {
  change: (payload: SimulatorPayload) => void;
  disconnect: () => void;
}

export class SimulatorStateError extends PrintLinkError {
  constructor(message: string) {
    super(message, 'INVALID_STATE');
    this.name = 'SimulatorStateError';
  }
}

const ACTIVE: readonly SimulatedStatus[] = ['Printing', 'Pausing', 'Paused', 'Canceling'];

/**
 * Resin printer model driven by explicit `tick()` calls. Every state change
 * emits `change` with the payload `/status` would return.
 */
export class PrinterSimulator extends EventEmitter<PrinterSimulatorEvents> {
  private status: SimulatedStatus = 'Idle';
  private job: SimulatedJob | null = null;
  private layer: number | null = null;
  private printTime = 0;
  private finished = false;
  private online = true;

  private readonly defaultLayerCount: number;
  private readonly layerHeightMm: number;
  private readonly materialPerLayerMl: number;
  private readonly latchedTransitions: boolean;

  constructor(options: PrinterSimulatorOptions = {}) {
    super();
    this.defaultLayerCount = options.defaultLayerCount ?? 100;
    this.layerHeightMm = options.layerHeightMm ?? 0.05;
    this.materialPerLayerMl = options.materialPerLayerMl ?? 0.1;
    this.latchedTransitions = options.latchedTransitions ?? false;
  }

  getStatus(): SimulatedStatus {
    return this.status;
  }

  getJob(): SimulatedJob | null {
    return this.job ? { ...this.job } : null;
  }

  isOnline(): boolean {
    return this.online;
  }

  /** While offline every device route answers 503. */
  setOnline(online: boolean): void {
    this.online = online;
    if (!online) this.dropStreams();
  }

  /** Ends every open status stream from the device side. */
  dropStreams(): void {
    this.emit('disconnect');
  }

  start(path: string, options: StartJobOptions = {}): void {
    if (ACTIVE.includes(this.status)) {
      throw new SimulatorStateError(`Cannot start while ${this.status.toLowerCase()}`);
    }
    if (!path) {
      throw new SimulatorStateError('A file path is required');
    }

    this.job = {
      name: path.split('/').pop() ?? path,
      path,
      location: options.location ?? 'Local',
      layerCount: options.layerCount ?? this.defaultLayerCount,
      hasThumbnail: options.hasThumbnail ?? true,
    };
    this.status = 'Printing';
    this.layer = 0;
    this.printTime = 0;
    this.finished = false;
    this.notify();
  }

  pause(): void {
    if (this.status !== 'Printing') {
      throw new SimulatorStateError(`Cannot pause while ${this.status.toLowerCase()}`);
    }
    this.status = this.latchedTransitions ? 'Pausing' : 'Paused';
    this.notify();
  }

  resume(): void {
    if (this.status !== 'Paused') {
      throw new SimulatorStateError(`Cannot resume while ${this.status.toLowerCase()}`);
    }
    this.status = 'Printing';
    this.notify();
  }

  cancel(): void {
    if (!ACTIVE.includes(this.status) || this.status === 'Canceling') {
      throw new SimulatorStateError(`Cannot cancel while ${this.status.toLowerCase()}`);
    }
    this.status = this.latchedTransitions ? 'Canceling' : 'Canceled';
    this.notify();
  }

  /** Advances the model by one layer exposure. */
  tick(seconds = 1): void {
    switch (this.status) {
      case 'Pausing':
        this.status = 'Paused';
        break;
      case 'Canceling':
        this.status = 'Canceled';
        break;
      case 'Printing':
        this.advanceLayer(seconds);
        break;
      default:
        return;
    }
    this.notify();
  }

  thumbnail(location: string, path: string, size: string): Uint8Array | null {
    const job = this.job;
    if (!job || !job.hasThumbnail || job.location !== location || job.path !== path) {
      return null;
    }
    return new TextEncoder().encode(`thumbnail:${size}:${location}:${path}`);
  }

  toPayload(): SimulatorPayload {
    const layer = this.layer ?? 0;
    const payload: SimulatorPayload = {
      status: this.status,
      paused: this.status === 'Paused',
      layer: this.layer,
      finished: this.finished,
      device_status_message: this.finished ? 'Print finished' : this.status,
      resin_temperature: '24.5 °C',
      cpu_temp: 41.2,
      physical_state: {
        z: Math.round(layer * this.layerHeightMm * 1000) / 1000,
        curing: false,
      },
    };

    if (this.job) {
      payload.print_data = {
        layer_count: this.job.layerCount,
        print_time: this.printTime,
        used_material: Math.round(layer * this.materialPerLayerMl * 1000) / 1000,
        file_data: { name: this.job.name, path: this.job.path, location_category: this.job.location },
      };
    }
    return payload;
  }

  private advanceLayer(seconds: number): void {
    if (!this.job || this.layer === null) return;
    this.printTime += seconds;
    this.layer = Math.min(this.layer + 1, this.job.layerCount);
    if (this.layer >= this.job.layerCount) {
      this.status = 'Idle';
      this.finished = true;
    }
  }

  private notify(): void {
    this.emit('change', this.toPayload());
  }
}
