export type ReportCell = string | number | null;

/** Flat table handed to exporters: key column(s), value column, Portfolio */
export interface ReportTable {
  name: string;              // file suffix, e.g. "sector_exposure"
  columns: string[];
  rows: ReportCell[][];
}
