/**
 * Counters for one source group of a filter run
 */
export interface GroupSummary {
  groupName: string;
  archives: number;
  archivesSkipped: number;
  tables: number;
  rowsRead: number;
  rowsRetained: number;
  rowsRejected: number;
  rowsSkipped: number;
  schemaMismatches: number;
  /** Path of the regional export, or null when the group produced no data */
  exportPath: string | null;
}
