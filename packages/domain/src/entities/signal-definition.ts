export type ByteOrder = 'big' | 'little';

/** One scalar signal carried in a bus frame's payload. */
export interface SignalDefinition {
  readonly frameId: number;
  readonly name: string;
  readonly startByte: number;
  readonly lengthBytes: number;
  readonly scale: number;
  readonly offset: number;
  readonly isSigned: boolean;
  readonly byteOrder: ByteOrder;
}
