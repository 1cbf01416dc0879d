// Sync Services - Re-exports
export { createRunContext, buildDateRange, eachDay } from "./context.js";
export { UpsertSink, headerName, toCellValue } from "./upsert.js";
export {
  SyncDriver,
  createSyncJob,
  mergeRowsByKey,
  type SyncJob,
  type SyncRunOptions,
} from "./orchestrator.js";
export { createRow, keyColumnsOf, KEY_SEPARATOR } from "./canonical/rows.js";
