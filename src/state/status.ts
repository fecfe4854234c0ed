/**
 * Progress status of a learning path, course or unit.
 */
export const Status = {
  PENDING: "pending",
  IN_PROGRESS: "inProgress",
  COMPLETED: "completed",
  FAILED: "failed",
  SKIPPED: "skipped",
} as const;

export type StatusType = (typeof Status)[keyof typeof Status];

/**
 * Status strings as written to the ledger file. Must stay stable across releases.
 */
export const WIRE_STATUSES = ["pending", "in_progress", "completed", "failed", "skipped"] as const;

export type WireStatus = (typeof WIRE_STATUSES)[number];

const TO_WIRE = {
  pending: "pending",
  inProgress: "in_progress",
  completed: "completed",
  failed: "failed",
  skipped: "skipped",
} as const satisfies Record<StatusType, WireStatus>;

const FROM_WIRE = {
  pending: "pending",
  in_progress: "inProgress",
  completed: "completed",
  failed: "failed",
  skipped: "skipped",
} as const satisfies Record<WireStatus, StatusType>;

export function toWireStatus(status: StatusType): WireStatus {
  return TO_WIRE[status];
}

export function fromWireStatus(status: WireStatus): StatusType {
  return FROM_WIRE[status];
}

/**
 * True for statuses that still need work on the next run.
 */
export function isOpenStatus(status: StatusType): boolean {
  return status === Status.PENDING || status === Status.IN_PROGRESS || status === Status.FAILED;
}

/**
 * Parses a status as written in the ledger file, or null for anything else.
 */
export function parseWireStatus(raw: string): StatusType | null {
  const wire = WIRE_STATUSES.find((status) => status === raw);
  return wire ? fromWireStatus(wire) : null;
}
