import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { isUsableFix } from '@telemetry-relay/domain';
import type { Snapshot, TrackingSink } from '@telemetry-relay/domain';
import { cleanSensorName, mpsToKnots, roundTo } from '../util/units.js';
import { createLogger, describeError } from '../logging/logger.js';

const log = createLogger('traccar');

export interface OsmAndClientOptions {
  host: string;
  port: number;
  httpPath: string;
  deviceId: string;
  requestTimeoutSeconds: number;
  convertSpeedToKnots: boolean;
  /** Custom undici dispatcher, e.g. a MockAgent in tests */
  dispatcher?: Dispatcher;
}

/**
 * Reports positions to a Traccar server over the OsmAnd HTTP protocol:
 * a POST whose query string carries the fix and any extra attributes.
 */
export class OsmAndTrackingClient implements TrackingSink {
  readonly baseUrl: string;
  private configured: boolean;

  constructor(private readonly options: OsmAndClientOptions) {
    const path = options.httpPath.trim();
    this.baseUrl = `http://${options.host}:${options.port}${path.startsWith('/') ? path : `/${path}`}`;
    this.configured = options.host.length > 0 && options.deviceId.length > 0;
    if (this.configured) {
      log.info(`reporting to ${this.baseUrl} as device '${options.deviceId}'`);
    } else {
      log.error('host or device id missing, tracking disabled');
    }
  }

  isConfigured(): boolean {
    return this.configured;
  }

  buildParams(snapshot: Snapshot): URLSearchParams {
    const params = new URLSearchParams();
    params.set('id', this.options.deviceId);
    params.set('timestamp', String(Math.floor(snapshot.timestampUtc)));

    const gps = snapshot.gps;
    if (gps) {
      params.set('lat', String(gps.latitude));
      params.set('lon', String(gps.longitude));
      if (gps.altitude !== undefined) params.set('altitude', String(gps.altitude));
      if (gps.speed !== undefined) {
        const speed = this.options.convertSpeedToKnots ? mpsToKnots(gps.speed) : gps.speed;
        params.set('speed', String(roundTo(speed, 2)));
      }
      if (gps.course !== undefined) params.set('bearing', String(gps.course));
      if (gps.hdop !== undefined) params.set('hdop', String(gps.hdop));
    }

    for (const [name, value] of Object.entries(snapshot.sensors)) {
      params.set(cleanSensorName(name), String(value));
    }
    for (const [name, value] of Object.entries(snapshot.busSignals)) {
      params.set(`can_${cleanSensorName(name)}`, String(value));
    }
    if (snapshot.dtcs.length > 0) params.set('dtcs', snapshot.dtcs.join(','));
    return params;
  }

  async send(snapshot: Snapshot): Promise<boolean> {
    if (!this.configured) {
      log.debug('not configured, skipping send');
      return false;
    }
    if (!isUsableFix(snapshot.gps)) {
      log.debug('snapshot has no usable fix, skipping send');
      return false;
    }

    const url = `${this.baseUrl}?${this.buildParams(snapshot).toString()}`;
    try {
      const res = await fetch(url, {
        method: 'POST',
        signal: AbortSignal.timeout(this.options.requestTimeoutSeconds * 1_000),
        ...(this.options.dispatcher ? { dispatcher: this.options.dispatcher } : {}),
      });
      const body = await res.text();
      if (!res.ok) {
        log.error(`server answered ${res.status}: ${body.slice(0, 200)}`);
        return false;
      }
      log.info(`position sent (${res.status})`);
      return true;
    } catch (err) {
      log.warn(`request to ${this.baseUrl} failed: ${describeError(err)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    this.configured = false;
    log.info('tracking client closed');
  }
}
