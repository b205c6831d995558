export { parseSnapshot, parseTemperature, describeStatus, jobKey } from './snapshot';
export type { LabelIntent } from './snapshot';
