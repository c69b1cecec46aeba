import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { createLogger, describeError } from '../logging/logger.js';
import { decodeDtcs } from './obd-commands.js';
import type { ObdTransport } from './obd-diagnostic-source.js';

const log = createLogger('elm327');

/** reset, echo off, linefeeds off, headers off, automatic protocol */
const INIT_COMMANDS = ['ATZ', 'ATE0', 'ATL0', 'ATH0', 'ATSP0'] as const;

const ADAPTER_FAULT = /ERROR|UNABLE TO CONNECT|STOPPED/;

export class ObdAdapterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ObdAdapterError';
  }
}

export type ElmLinkFactory = (host: string, port: number) => Promise<Duplex>;

/** Opens a TCP connection, resolving once it is established. */
export function connectTcp(host: string, port: number): Promise<Duplex> {
  return new Promise((resolve, reject) => {
    const socket = new Socket();
    const onError = (err: Error) => {
      socket.destroy();
      reject(err);
    };
    socket.once('error', onError);
    socket.connect(port, host, () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

/** Hex bytes of one reply line (`41 0C 1A F8` or `410C1AF8`); `null` for text lines. */
export function parseHexLine(line: string): number[] | null {
  const compact = line.replace(/\s+/g, '');
  if (compact.length === 0 || !/^(?:[0-9A-Fa-f]{2})+$/.test(compact)) return null;
  const bytes: number[] = [];
  for (let i = 0; i < compact.length; i += 2) bytes.push(parseInt(compact.slice(i, i + 2), 16));
  return bytes;
}

function hex(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0');
}

interface PendingCommand {
  readonly command: string;
  resolve(lines: string[]): void;
  reject(err: Error): void;
  readonly timer: ReturnType<typeof setTimeout>;
}

export interface Elm327Options {
  host?: string;
  port?: number;
  commandTimeoutSeconds?: number;
  /** Opens the byte stream to the adapter; TCP by default */
  link?: ElmLinkFactory;
}

/**
 * ELM327-compatible adapter over a byte stream (Wi-Fi dongles expose one on
 * TCP 35000). Commands run one at a time; each reply ends at the `>` prompt.
 */
export class Elm327Transport implements ObdTransport {
  readonly description: string;
  private readonly host: string;
  private readonly port: number;
  private readonly commandTimeoutMs: number;
  private readonly openLink: ElmLinkFactory;

  private link: Duplex | null = null;
  private buffer = '';
  private pending: PendingCommand | null = null;

  constructor(options: Elm327Options = {}) {
    this.host = options.host ?? '192.168.0.10';
    this.port = options.port ?? 35_000;
    this.commandTimeoutMs = (options.commandTimeoutSeconds ?? 5) * 1_000;
    this.openLink = options.link ?? connectTcp;
    this.description = `ELM327 at ${this.host}:${this.port}`;
  }

  async open(): Promise<void> {
    if (this.link) return;
    const link = await this.openLink(this.host, this.port);
    link.setEncoding('latin1');
    link.on('data', (chunk: string) => this.handleChunk(chunk));
    link.on('error', (err: Error) => {
      log.warn(`adapter link error: ${describeError(err)}`);
      this.failPending(new ObdAdapterError('adapter link error', { cause: err }));
    });
    link.on('close', () => {
      if (this.link !== link) return;
      this.link = null;
      this.failPending(new ObdAdapterError('adapter link closed'));
    });
    this.link = link;

    for (const command of INIT_COMMANDS) {
      const lines = await this.command(command);
      if (command !== 'ATZ' && !lines.includes('OK')) {
        throw new ObdAdapterError(`'${command}' rejected: ${lines.join(' ') || 'empty reply'}`);
      }
    }
    log.info(`initialised ${this.description}`);
  }

  async query(pid: number): Promise<number[] | null> {
    const request = `01${hex(pid)}`;
    const lines = this.checked(request, await this.command(request));
    for (const line of lines) {
      const bytes = parseHexLine(line);
      if (bytes && bytes[0] === 0x41 && bytes[1] === pid) return bytes.slice(2);
    }
    return null;
  }

  async readDtcs(): Promise<string[]> {
    const lines = this.checked('03', await this.command('03'));
    const data: number[] = [];
    for (const line of lines) {
      const bytes = parseHexLine(line);
      if (!bytes || bytes[0] !== 0x43) continue;
      const payload = bytes.slice(1);
      // CAN replies put a code count after the mode byte
      data.push(...(payload.length % 2 === 1 ? payload.slice(1) : payload));
    }
    return decodeDtcs(data);
  }

  async close(): Promise<void> {
    const link = this.link;
    this.link = null;
    this.failPending(new ObdAdapterError('adapter closed'));
    if (!link) return;
    link.destroy();
    log.info(`disconnected from ${this.description}`);
  }

  private checked(request: string, lines: string[]): string[] {
    const fault = lines.find((line) => line === '?' || ADAPTER_FAULT.test(line));
    if (fault) throw new ObdAdapterError(`'${request}': ${fault}`);
    return lines;
  }

  private command(command: string): Promise<string[]> {
    const link = this.link;
    if (!link) return Promise.reject(new ObdAdapterError('adapter not connected'));
    if (this.pending) {
      return Promise.reject(new ObdAdapterError(`'${command}' sent while '${this.pending.command}' is in flight`));
    }
    this.buffer = '';
    return new Promise<string[]>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new ObdAdapterError(`no reply to '${command}' within ${this.commandTimeoutMs / 1_000}s`));
      }, this.commandTimeoutMs);
      this.pending = { command, resolve, reject, timer };
      link.write(`${command}\r`);
    });
  }

  private handleChunk(chunk: string): void {
    this.buffer += chunk;
    const prompt = this.buffer.indexOf('>');
    if (prompt < 0) return;
    const reply = this.buffer.slice(0, prompt);
    this.buffer = this.buffer.slice(prompt + 1);

    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve(
      reply
        .split(/[\r\n]+/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && line !== pending.command),
    );
  }

  private failPending(err: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(err);
  }
}
