export { HttpDeviceClient } from './http-client';
export type { FetchLike, HttpDeviceClientOptions } from './http-client';
export { SseDecoder } from './sse';
export type { SseMessage } from './sse';
export type { DeviceClient, StatusStream, StatusStreamHandlers } from './types';
