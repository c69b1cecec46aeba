import { z } from 'zod';
import type { SignalDefinition } from '@telemetry-relay/domain';
import { createLogger } from '@telemetry-relay/adapters';

const log = createLogger('signal-catalog');

/** Largest 29-bit extended frame identifier */
const MAX_FRAME_ID = 0x1fffffff;

const HEX_ID = /^(0x)?[0-9a-f]+$/i;

const definitionRecordSchema = z.object({
  id: z.string({ required_error: "missing 'id'", invalid_type_error: "'id' must be a hex string" }),
  name: z
    .string({ required_error: "missing 'name'", invalid_type_error: "'name' must be a string" })
    .trim()
    .min(1, "'name' is empty"),
  parser: z.record(z.unknown(), {
    required_error: "missing 'parser'",
    invalid_type_error: "'parser' must be an object",
  }),
});

const SUPPORTED_PARSER_TYPES = ['scalar', 'simple_scalar'] as const;

const scalarParserSchema = z
  .object({
    start_byte: z.number().int().min(0).max(7),
    length_bytes: z.number().int().min(1).max(8),
    scale: z.number().finite(),
    offset: z.number().finite(),
    is_signed: z.boolean(),
    byte_order: z.enum(['big', 'little']),
  })
  .refine((p) => p.start_byte + p.length_bytes <= 8, {
    message: 'start_byte + length_bytes exceeds 8 bytes',
  });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseFrameId(raw: string): number | null {
  const text = raw.trim();
  if (!HEX_ID.test(text)) return null;
  const id = parseInt(text.replace(/^0x/i, ''), 16);
  return Number.isSafeInteger(id) && id <= MAX_FRAME_ID ? id : null;
}

export function formatFrameId(id: number): string {
  return `0x${id.toString(16).toUpperCase()}`;
}

type ParseResult = { ok: true; definition: SignalDefinition } | { ok: false; reason: string };

function parseDefinition(record: unknown): ParseResult {
  const base = definitionRecordSchema.safeParse(record);
  if (!base.success) return { ok: false, reason: formatIssues(base.error) };

  const frameId = parseFrameId(base.data.id);
  if (frameId === null) return { ok: false, reason: `invalid frame id '${base.data.id}'` };

  const parserType = base.data.parser['type'];
  if (!SUPPORTED_PARSER_TYPES.some((t) => t === parserType)) {
    return { ok: false, reason: `parser type '${String(parserType)}' is not supported` };
  }

  const parser = scalarParserSchema.safeParse(base.data.parser);
  if (!parser.success) return { ok: false, reason: `parser ${formatIssues(parser.error)}` };

  const p = parser.data;
  return {
    ok: true,
    definition: Object.freeze({
      frameId,
      name: base.data.name,
      startByte: p.start_byte,
      lengthBytes: p.length_bytes,
      scale: p.scale,
      offset: p.offset,
      isSigned: p.is_signed,
      byteOrder: p.byte_order,
    }),
  };
}

/**
 * Frame id → signal definitions, built once from untrusted configuration.
 * Bad records are dropped with a warning; the rest of the catalog still loads.
 */
export class SignalCatalog {
  private constructor(private readonly byFrameId: ReadonlyMap<number, readonly SignalDefinition[]>) {}

  static empty(): SignalCatalog {
    return new SignalCatalog(new Map());
  }

  static build(rawDefinitions: unknown): SignalCatalog {
    if (!Array.isArray(rawDefinitions)) {
      log.error('message definitions are not a list, no signals will be decoded');
      return SignalCatalog.empty();
    }

    const byFrameId = new Map<number, SignalDefinition[]>();
    rawDefinitions.forEach((record: unknown, index) => {
      const result = parseDefinition(record);
      if (!result.ok) {
        log.warn(`skipping definition at index ${index}: ${result.reason}`);
        return;
      }
      const { definition } = result;
      const list = byFrameId.get(definition.frameId);
      if (list) list.push(definition);
      else byFrameId.set(definition.frameId, [definition]);
      log.debug(`loaded '${definition.name}' on ${formatFrameId(definition.frameId)}`);
    });

    const frozen = new Map<number, readonly SignalDefinition[]>();
    for (const [id, list] of byFrameId) frozen.set(id, Object.freeze(list));

    const catalog = new SignalCatalog(frozen);
    if (catalog.size > 0) {
      log.info(`loaded ${catalog.size} signal definition(s) for ${frozen.size} frame id(s)`);
    } else {
      log.warn('no valid signal definitions loaded');
    }
    return catalog;
  }

  lookup(frameId: number): readonly SignalDefinition[] {
    return this.byFrameId.get(frameId) ?? [];
  }

  get size(): number {
    let total = 0;
    for (const list of this.byFrameId.values()) total += list.length;
    return total;
  }

  frameIds(): number[] {
    return [...this.byFrameId.keys()];
  }

  definitions(): SignalDefinition[] {
    return [...this.byFrameId.values()].flat();
  }
}
