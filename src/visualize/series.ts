import { BYTES_PER_KIB } from "../config/constants.js";
import type { ResultRecord } from "../store/resultStore.js";

export interface PlotPoint {
  recordSizeKiB: number;
  wallTimeSec: number;
  syscallTimeSec: number;
  syscallCount: number;
}

/**
 * Orders records by record size (ties keep file order) and converts the
 * x value to KiB. Stored rows are in execution order, usually largest first.
 */
export function prepareSeries(records: readonly ResultRecord[]): PlotPoint[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort(
      (a, b) => a.record.recordSize - b.record.recordSize || a.index - b.index,
    )
    .map(({ record }) => ({
      recordSizeKiB: record.recordSize / BYTES_PER_KIB,
      wallTimeSec: record.wallTimeSec,
      syscallTimeSec: record.syscallTimeSec,
      syscallCount: record.syscallCount,
    }));
}
