export interface PositionFix {
  readonly latitude: number;
  readonly longitude: number;
  readonly altitude?: number;
  /** m/s */
  readonly speed?: number;
  /** degrees from true north */
  readonly course?: number;
  readonly satellites?: number;
  readonly hdop?: number;
  /** epoch seconds of the fix */
  readonly fixTime?: number;
}

/** Both coordinates present and not the 0,0 placeholder some receivers report. */
export function isUsableFix(fix: PositionFix | null | undefined): fix is PositionFix {
  if (!fix) return false;
  if (!Number.isFinite(fix.latitude) || !Number.isFinite(fix.longitude)) return false;
  return !(fix.latitude === 0 && fix.longitude === 0);
}
