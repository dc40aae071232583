export { ConflictDecorations } from "./conflictDecorations";
export { conflictDecorationRanges, conflictLenses, RESOLVE_AT_COMMAND } from "./conflictView";
export type { ConflictDecorationRanges, ConflictLens } from "./conflictView";
export { formatStatsReport, formatStatsSummary } from "./statsReport";
export type { StatsReportInput } from "./statsReport";
