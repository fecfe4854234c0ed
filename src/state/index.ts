export { CheckpointStore, type FailedUnitEntry, type RetryFailedResult } from "./ledger.js";
export { decodeLedger, encodeLedger, LEDGER_VERSION } from "./codec.js";
export { formatReport } from "./report.js";
export {
  fromWireStatus,
  isOpenStatus,
  parseWireStatus,
  Status,
  toWireStatus,
  type StatusType,
  WIRE_STATUSES,
} from "./status.js";
export type {
  CourseRecord,
  ErrorRecord,
  LearningPathRecord,
  Ledger,
  Statistics,
  UnitRecord,
} from "./types.js";
