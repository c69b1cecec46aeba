import type { DecodedSample, RawFrame, SignalDefinition } from '@telemetry-relay/domain';
import { createLogger, roundTo } from '@telemetry-relay/adapters';
import type { SignalCatalog } from './signal-catalog.js';
import { formatFrameId } from './signal-catalog.js';

const log = createLogger('frame-decoder');

/** Integer in the signal's byte range, two's complement when signed. */
export function extractRawValue(payload: Uint8Array, def: SignalDefinition): bigint {
  const bytes = payload.subarray(def.startByte, def.startByte + def.lengthBytes);
  const ordered = def.byteOrder === 'little' ? [...bytes].reverse() : [...bytes];

  let raw = 0n;
  for (const byte of ordered) raw = (raw << 8n) | BigInt(byte);

  const bits = BigInt(def.lengthBytes * 8);
  if (def.isSigned && raw >= 1n << (bits - 1n)) raw -= 1n << bits;
  return raw;
}

/** Physical value `raw * scale + offset`, rounded to 4 decimals. */
export function decodeSignal(payload: Uint8Array, def: SignalDefinition): number {
  const raw = Number(extractRawValue(payload, def));
  return roundTo(raw * def.scale + def.offset, 4);
}

/**
 * Decodes every catalogued signal carried by `frame`, in catalog order.
 * Signals whose byte range runs past the payload are skipped.
 */
export function decodeFrame(frame: RawFrame, catalog: SignalCatalog): DecodedSample[] {
  const samples: DecodedSample[] = [];
  for (const def of catalog.lookup(frame.arbitrationId)) {
    const needed = def.startByte + def.lengthBytes;
    if (needed > frame.payload.length) {
      log.warn(
        `'${def.name}' on ${formatFrameId(frame.arbitrationId)}: payload too short, need ${needed} bytes, got ${frame.payload.length}`,
      );
      continue;
    }
    const value = decodeSignal(frame.payload, def);
    samples.push({ timestamp: frame.timestamp, name: def.name, value });
  }
  return samples;
}
