import { setTimeout as delay } from 'node:timers/promises';
import type { DiagnosticReading, DiagnosticSource, SensorValue } from '@telemetry-relay/domain';
import { roundTo } from '../util/units.js';
import { createLogger, describeError } from '../logging/logger.js';
import { findObdCommand, parseSupportedPids } from './obd-commands.js';
import type { ObdCommand } from './obd-commands.js';

const log = createLogger('obd');

/** Last "supported PIDs" block queried (0x00, 0x20, ... 0xC0) */
const LAST_SUPPORT_BLOCK = 0xc0;

/** Request/response access to a diagnostic adapter. */
export interface ObdTransport {
  readonly description: string;
  open(): Promise<void>;
  /** Data bytes of a mode 01 response, `null` when the vehicle had no answer */
  query(pid: number): Promise<number[] | null>;
  /** Stored trouble codes (mode 03) */
  readDtcs(): Promise<string[]>;
  close(): Promise<void>;
}

export interface ObdSourceOptions {
  /** Command names such as `RPM` or `coolant_temp` */
  commands: readonly string[];
  includeDtcCodes?: boolean;
  connectionRetries?: number;
  retryDelaySeconds?: number;
}

/**
 * Diagnostic source polling a fixed set of OBD-II commands. The set is cut
 * down on connect to what the vehicle reports as supported; a command that
 * fails on a read is left out of that reading only.
 */
export class ObdDiagnosticSource implements DiagnosticSource {
  private readonly includeDtcCodes: boolean;
  private readonly connectionRetries: number;
  private readonly retryDelayMs: number;

  private connected = false;
  private closed = false;
  private active: ObdCommand[] = [];

  constructor(
    private readonly transport: ObdTransport,
    private readonly options: ObdSourceOptions,
  ) {
    this.includeDtcCodes = options.includeDtcCodes ?? true;
    this.connectionRetries = options.connectionRetries ?? 3;
    this.retryDelayMs = (options.retryDelaySeconds ?? 5) * 1_000;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Names of the configured commands the vehicle supports. */
  activeCommands(): string[] {
    return this.active.map((c) => c.name);
  }

  /** Resolves `true` once connected; never rejects. */
  async connect(): Promise<boolean> {
    const attempts = this.connectionRetries + 1;
    for (let attempt = 1; attempt <= attempts && !this.closed; attempt++) {
      log.info(`connecting to ${this.transport.description} (attempt ${attempt}/${attempts})`);
      try {
        await this.transport.open();
        this.active = await this.selectCommands();
        this.connected = true;
        log.info(`connected, polling ${this.active.length > 0 ? this.activeCommands().join(', ') : 'no commands'}`);
        return true;
      } catch (err) {
        log.error(`connection attempt ${attempt} failed: ${describeError(err)}`);
        await this.transport.close().catch((closeErr: unknown) => {
          log.debug(`error releasing adapter: ${describeError(closeErr)}`);
        });
      }
      if (attempt < attempts && !this.closed) {
        log.info(`retrying in ${this.retryDelayMs / 1_000}s`);
        await delay(this.retryDelayMs);
      }
    }
    log.error(`could not connect to ${this.transport.description}, diagnostics unavailable`);
    return false;
  }

  private async supportedPids(): Promise<Set<number>> {
    const supported = new Set<number>();
    for (let base = 0; base <= LAST_SUPPORT_BLOCK; base += 0x20) {
      const mask = await this.transport.query(base);
      if (!mask || mask.length < 4) break;
      for (const pid of parseSupportedPids(base, mask)) supported.add(pid);
      if (!supported.has(base + 0x20)) break;
    }
    return supported;
  }

  private async selectCommands(): Promise<ObdCommand[]> {
    const supported = await this.supportedPids();
    const selected: ObdCommand[] = [];
    for (const name of this.options.commands) {
      const command = findObdCommand(name);
      if (!command) {
        log.warn(`'${name}' is not a known OBD command`);
      } else if (!supported.has(command.pid)) {
        log.warn(`'${command.name}' is not supported by the vehicle`);
      } else if (!selected.includes(command)) {
        selected.push(command);
      }
    }
    if (selected.length === 0) log.warn('none of the configured OBD commands are available');
    return selected;
  }

  async read(): Promise<DiagnosticReading> {
    const sensors: Record<string, SensorValue> = {};
    const dtcs: string[] = [];
    if (!this.connected) {
      log.warn('not connected to OBD adapter, cannot read data');
      return { sensors, dtcs };
    }

    for (const command of this.active) {
      try {
        const data = await this.transport.query(command.pid);
        if (!data || data.length < command.bytes) {
          log.debug(`${command.name}: no data`);
          continue;
        }
        sensors[command.name.toLowerCase()] = roundTo(command.decode(data), 2);
      } catch (err) {
        log.warn(`query ${command.name} failed: ${describeError(err)}`);
      }
    }

    if (this.includeDtcCodes) {
      try {
        dtcs.push(...(await this.transport.readDtcs()));
        if (dtcs.length > 0) log.info(`DTCs retrieved: ${dtcs.join(', ')}`);
      } catch (err) {
        log.warn(`reading DTCs failed: ${describeError(err)}`);
      }
    }
    return { sensors, dtcs };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.connected = false;
    await this.transport.close();
    log.info('OBD adapter closed');
  }
}
