export type * from './snapshot';
export type * from './status';
export type * from './config';
export type * from './events';
