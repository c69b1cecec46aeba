export type BusListenerState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting'
  | 'terminated';

export interface BusListenerStats {
  readonly state: BusListenerState;
  readonly framesReceived: number;
  readonly samplesDecoded: number;
  readonly samplesDropped: number;
}
