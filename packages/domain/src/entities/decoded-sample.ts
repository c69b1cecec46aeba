export interface DecodedSample {
  readonly timestamp: number;
  readonly name: string;
  readonly value: number;
}
