/** A mode 01 (current data) PID and how to turn its data bytes into a value. */
export interface ObdCommand {
  readonly name: string;
  readonly pid: number;
  /** Data bytes the response carries after the mode and PID echo */
  readonly bytes: number;
  decode(data: readonly number[]): number;
}

const word = (d: readonly number[]): number => (d[0] ?? 0) * 256 + (d[1] ?? 0);
const byte = (d: readonly number[]): number => d[0] ?? 0;
const percent = (d: readonly number[]): number => (byte(d) * 100) / 255;
const celsius = (d: readonly number[]): number => byte(d) - 40;

const COMMANDS: readonly ObdCommand[] = [
  { name: 'ENGINE_LOAD', pid: 0x04, bytes: 1, decode: percent },
  { name: 'COOLANT_TEMP', pid: 0x05, bytes: 1, decode: celsius },
  { name: 'INTAKE_PRESSURE', pid: 0x0b, bytes: 1, decode: byte },
  { name: 'RPM', pid: 0x0c, bytes: 2, decode: (d) => word(d) / 4 },
  { name: 'SPEED', pid: 0x0d, bytes: 1, decode: byte },
  { name: 'TIMING_ADVANCE', pid: 0x0e, bytes: 1, decode: (d) => byte(d) / 2 - 64 },
  { name: 'INTAKE_TEMP', pid: 0x0f, bytes: 1, decode: celsius },
  { name: 'MAF', pid: 0x10, bytes: 2, decode: (d) => word(d) / 100 },
  { name: 'THROTTLE_POS', pid: 0x11, bytes: 1, decode: percent },
  { name: 'RUN_TIME', pid: 0x1f, bytes: 2, decode: word },
  { name: 'FUEL_LEVEL', pid: 0x2f, bytes: 1, decode: percent },
  { name: 'BAROMETRIC_PRESSURE', pid: 0x33, bytes: 1, decode: byte },
  { name: 'CONTROL_MODULE_VOLTAGE', pid: 0x42, bytes: 2, decode: (d) => word(d) / 1000 },
  { name: 'AMBIANT_AIR_TEMP', pid: 0x46, bytes: 1, decode: celsius },
  { name: 'OIL_TEMP', pid: 0x5c, bytes: 1, decode: celsius },
  { name: 'FUEL_RATE', pid: 0x5e, bytes: 2, decode: (d) => word(d) / 20 },
];

const BY_NAME: ReadonlyMap<string, ObdCommand> = new Map(COMMANDS.map((c) => [c.name, c]));

/** Case-insensitive lookup by command name (`rpm`, `COOLANT_TEMP`). */
export function findObdCommand(name: string): ObdCommand | undefined {
  return BY_NAME.get(name.trim().toUpperCase());
}

/**
 * PIDs flagged in a "supported PIDs" bitmask (PID 0x00, 0x20, ...).
 * Bit 7 of the first byte stands for `base + 1`.
 */
export function parseSupportedPids(base: number, mask: readonly number[]): number[] {
  const pids: number[] = [];
  mask.slice(0, 4).forEach((value, index) => {
    for (let bit = 0; bit < 8; bit++) {
      if (value & (0x80 >> bit)) pids.push(base + index * 8 + bit + 1);
    }
  });
  return pids;
}

const DTC_SYSTEMS = ['P', 'C', 'B', 'U'] as const;

/** Two DTC bytes as a code such as `P0133`; `null` for the 0000 filler. */
export function decodeDtc(first: number, second: number): string | null {
  if (first === 0 && second === 0) return null;
  const system = DTC_SYSTEMS[(first >> 6) & 0x03];
  const digits = [(first >> 4) & 0x03, first & 0x0f, second >> 4, second & 0x0f];
  return `${system}${digits.map((d) => d.toString(16).toUpperCase()).join('')}`;
}

/** Every code in a run of DTC byte pairs, fillers dropped. */
export function decodeDtcs(data: readonly number[]): string[] {
  const codes: string[] = [];
  for (let i = 0; i + 1 < data.length; i += 2) {
    const code = decodeDtc(data[i] ?? 0, data[i + 1] ?? 0);
    if (code) codes.push(code);
  }
  return codes;
}
