export { PrinterSimulator, SimulatorStateError } from './simulator';
export type {
  PrinterSimulatorOptions,
  PrinterSimulatorEvents,
  SimulatedJob,
  SimulatedStatus,
  SimulatorPayload,
  StartJobOptions,
} from './simulator';
export { createSimulatorApp } from './app';
export type { SimulatorAppOptions } from './app';
