import type { ConnectionState, StatusView } from './status';
import type { DeviceSnapshot } from './snapshot';

export interface ChannelManagerEvents {
  'state:change': (state: ConnectionState) => void;
  'reconnect:scheduled': (delayMs: number) => void;
}

export interface StreamSubscriberEvents {
  snapshot: (snapshot: DeviceSnapshot) => void;
  lost: (error: Error) => void;
}

export interface StatusStoreEvents {
  update: (view: StatusView) => void;
}
