import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { createLogger, describeError, parseLogLevel } from '@telemetry-relay/adapters';

const log = createLogger('config');

export const DEFAULT_CONFIG_PATH = 'telemetry-relay.json';

// ─── Section schemas ──────────────────────────────────────────────────────────

const logLevelSchema = z.string().transform((raw, ctx) => {
  const level = parseLogLevel(raw);
  if (!level) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level '${raw}'` });
    return z.NEVER;
  }
  return level;
});

const portSchema = z.number().int().min(1).max(65_535);

/** Longest delay a Node timer can hold (2^31 - 1 ms) */
export const MAX_TIMER_SECONDS = 2_147_483;

const timerSecondsSchema = z.number().positive().max(MAX_TIMER_SECONDS);

const generalSchema = z.object({
  logLevel: logLevelSchema,
  dataIntervalSeconds: timerSecondsSchema,
  deviceId: z.string().trim().min(1).optional(),
  /** `mesh_node_id` takes the id from the mesh radio */
  deviceIdSource: z.enum(['custom', 'mesh_node_id']),
  queueSize: z.number().int().positive(),
});

const canSchema = z
  .object({
    enabled: z.boolean(),
    interface: z.enum(['virtual', 'candump']),
    channel: z.string().min(1),
    logFile: z.string().min(1).optional(),
    replaySpeed: z.number().positive(),
    loop: z.boolean(),
    // validated record by record when the signal catalog is built
    messageDefinitions: z.array(z.unknown()),
    connectionRetries: z.number().int().min(0),
    retryDelaySeconds: z.number().min(0).max(MAX_TIMER_SECONDS),
    receiveTimeoutSeconds: timerSecondsSchema,
  })
  .refine((c) => c.interface !== 'candump' || c.logFile !== undefined, {
    message: "the candump interface needs 'logFile'",
    path: ['logFile'],
  });

const gpsSchema = z.object({
  enabled: z.boolean(),
  host: z.string().min(1),
  port: portSchema,
  maxFixAgeSeconds: z.number().positive(),
  reconnectDelaySeconds: timerSecondsSchema,
});

const obdSchema = z.object({
  enabled: z.boolean(),
  /** ELM327 adapter reachable over TCP (Wi-Fi dongles listen on 35000) */
  host: z.string().min(1),
  port: portSchema,
  commands: z.array(z.string().min(1)),
  includeDtcCodes: z.boolean(),
  connectionRetries: z.number().int().min(0),
  retryDelaySeconds: z.number().min(0).max(MAX_TIMER_SECONDS),
  commandTimeoutSeconds: timerSecondsSchema,
});

const meshSchema = z.object({
  enabled: z.boolean(),
  /** Node id such as `!a1b2c3d4`, or `^all` to broadcast */
  destination: z.string().min(1),
  portNum: z.number().int().min(0).max(255),
  channelIndex: z.number().int().min(0).max(7),
  maxPayloadBytes: z.number().int().positive(),
  sendRetries: z.number().int().min(0),
  sendRetryDelaySeconds: z.number().min(0).max(MAX_TIMER_SECONDS),
});

const mqttSchema = z.object({
  enabled: z.boolean(),
  url: z.string().url(),
  username: z.string().optional(),
  password: z.string().optional(),
  topicPrefix: z.string().min(1),
  qos: z.union([z.literal(0), z.literal(1), z.literal(2)]),
  retain: z.boolean(),
  statusTopicSuffix: z.string().min(1),
  onlinePayload: z.string(),
  offlinePayload: z.string(),
  connectTimeoutSeconds: timerSecondsSchema,
  keepaliveSeconds: z.number().int().positive(),
  tls: z
    .object({
      caFile: z.string().optional(),
      certFile: z.string().optional(),
      keyFile: z.string().optional(),
    })
    .optional(),
});

const traccarSchema = z.object({
  enabled: z.boolean(),
  host: z.string().min(1),
  port: portSchema,
  httpPath: z.string(),
  /** Defaults to the agent's device id */
  deviceId: z.string().min(1).optional(),
  reportIntervalSeconds: z.number().positive(),
  requestTimeoutSeconds: timerSecondsSchema,
  convertSpeedToKnots: z.boolean(),
});

const statusSchema = z.object({
  enabled: z.boolean(),
  host: z.string().min(1),
  port: portSchema,
});

export type GeneralConfig = z.infer<typeof generalSchema>;
export type CanConfig = z.infer<typeof canSchema>;
export type GpsConfig = z.infer<typeof gpsSchema>;
export type ObdConfig = z.infer<typeof obdSchema>;
export type MeshConfig = z.infer<typeof meshSchema>;
export type MqttConfig = z.infer<typeof mqttSchema>;
export type TraccarConfig = z.infer<typeof traccarSchema>;
export type StatusConfig = z.infer<typeof statusSchema>;

export interface AgentConfig {
  general: GeneralConfig;
  can: CanConfig;
  gps: GpsConfig;
  obd: ObdConfig;
  mesh: MeshConfig;
  mqtt: MqttConfig;
  traccar: TraccarConfig;
  status: StatusConfig;
}

export const DEFAULT_CONFIG: AgentConfig = {
  general: {
    logLevel: 'info',
    dataIntervalSeconds: 10,
    deviceIdSource: 'custom',
    queueSize: 200,
  },
  can: {
    enabled: false,
    interface: 'virtual',
    channel: 'can0',
    replaySpeed: 1,
    loop: false,
    messageDefinitions: [],
    connectionRetries: 3,
    retryDelaySeconds: 5,
    receiveTimeoutSeconds: 1,
  },
  gps: {
    enabled: false,
    host: '127.0.0.1',
    port: 2947,
    maxFixAgeSeconds: 10,
    reconnectDelaySeconds: 5,
  },
  obd: {
    enabled: false,
    host: '192.168.0.10',
    port: 35_000,
    commands: ['RPM', 'SPEED', 'COOLANT_TEMP'],
    includeDtcCodes: true,
    connectionRetries: 3,
    retryDelaySeconds: 5,
    commandTimeoutSeconds: 5,
  },
  mesh: {
    enabled: false,
    destination: '^all',
    portNum: 250,
    channelIndex: 0,
    maxPayloadBytes: 237,
    sendRetries: 2,
    sendRetryDelaySeconds: 3,
  },
  mqtt: {
    enabled: false,
    url: 'mqtt://localhost:1883',
    topicPrefix: 'vehicle/telemetry',
    qos: 0,
    retain: false,
    statusTopicSuffix: 'status',
    onlinePayload: 'online',
    offlinePayload: 'offline',
    connectTimeoutSeconds: 10,
    keepaliveSeconds: 60,
  },
  traccar: {
    enabled: false,
    host: 'localhost',
    port: 5055,
    httpPath: '/',
    reportIntervalSeconds: 30,
    requestTimeoutSeconds: 10,
    convertSpeedToKnots: true,
  },
  status: {
    enabled: false,
    host: '0.0.0.0',
    port: 8080,
  },
};

// ─── Loading ──────────────────────────────────────────────────────────────────

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns a copy of `base` with `override` merged in; nested objects merge, everything else replaces. */
export function deepMerge(base: PlainObject, override: unknown): PlainObject {
  const merged: PlainObject = { ...base };
  if (!isPlainObject(override)) return merged;
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function readConfigFile(path: string): PlainObject {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    log.warn(`config file '${path}' not readable (${describeError(err)}), using defaults`);
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (isPlainObject(parsed)) {
      log.info(`loaded configuration from '${path}'`);
      return parsed;
    }
    log.error(`config file '${path}' is not a JSON object, using defaults`);
  } catch (err) {
    log.error(`config file '${path}' is not valid JSON (${describeError(err)}), using defaults`);
  }
  return {};
}

function numberFromEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/** Environment variables win over the file. */
function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const pick = (entries: Record<string, unknown>): PlainObject =>
    Object.fromEntries(Object.entries(entries).filter(([, v]) => v !== undefined));

  return {
    general: pick({
      logLevel: env['LOG_LEVEL'],
      deviceId: env['DEVICE_ID'],
      dataIntervalSeconds: numberFromEnv(env['DATA_INTERVAL_SECONDS']),
    }),
    mqtt: pick({
      url: env['MQTT_URL'],
      username: env['MQTT_USERNAME'],
      password: env['MQTT_PASSWORD'],
    }),
    traccar: pick({ host: env['TRACCAR_HOST'] }),
    status: pick({ port: numberFromEnv(env['STATUS_PORT']) }),
  };
}

function resolveSection<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  defaults: z.infer<S>,
  raw: unknown,
): z.infer<S> {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  for (const issue of result.error.issues) {
    const where = issue.path.length > 0 ? `${name}.${issue.path.join('.')}` : name;
    log.warn(`invalid '${where}': ${issue.message}`);
  }
  log.warn(`section '${name}' is invalid, falling back to its defaults`);
  return defaults;
}

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Defaults ← JSON file ← environment, then each section is validated on its own.
 * An invalid section falls back to its defaults (outputs default to disabled);
 * the other sections are unaffected.
 */
export function loadConfig(options: LoadConfigOptions = {}): AgentConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? env['TELEMETRY_CONFIG'] ?? DEFAULT_CONFIG_PATH;

  const fromFile = readConfigFile(path);
  const raw = deepMerge(deepMerge({ ...DEFAULT_CONFIG }, fromFile), envOverrides(env));

  return {
    general: resolveSection('general', generalSchema, DEFAULT_CONFIG.general, raw['general']),
    can: resolveSection('can', canSchema, DEFAULT_CONFIG.can, raw['can']),
    gps: resolveSection('gps', gpsSchema, DEFAULT_CONFIG.gps, raw['gps']),
    obd: resolveSection('obd', obdSchema, DEFAULT_CONFIG.obd, raw['obd']),
    mesh: resolveSection('mesh', meshSchema, DEFAULT_CONFIG.mesh, raw['mesh']),
    mqtt: resolveSection('mqtt', mqttSchema, DEFAULT_CONFIG.mqtt, raw['mqtt']),
    traccar: resolveSection('traccar', traccarSchema, DEFAULT_CONFIG.traccar, raw['traccar']),
    status: resolveSection('status', statusSchema, DEFAULT_CONFIG.status, raw['status']),
  };
}

export interface DeviceIdContext {
  /** Id reported by the connected mesh radio, if any */
  meshNodeId?: string | null;
  nowMs?: number;
}

/**
 * The id named by `general.deviceIdSource`, or `fallback_<epoch seconds>`
 * when that source has none.
 */
export function resolveDeviceId(general: GeneralConfig, context: DeviceIdContext = {}): string {
  if (general.deviceIdSource === 'mesh_node_id') {
    if (context.meshNodeId) return context.meshNodeId;
    log.warn('device id source is the mesh radio, but no node id is available');
  } else if (general.deviceId) {
    return general.deviceId;
  }
  const fallback = `fallback_${Math.floor((context.nowMs ?? Date.now()) / 1_000)}`;
  log.warn(`no device id configured, using '${fallback}'`);
  return fallback;
}
