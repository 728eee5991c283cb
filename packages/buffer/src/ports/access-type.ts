/**
 * Why a page was touched. Reported by the buffer pool on every access.
 *
 * The LRU-K policy treats all kinds alike; the kind is kept so callers can
 * tell point lookups from sequential scans in traces.
 */
export type AccessType = "unknown" | "lookup" | "scan" | "index"

export const accessTypes = ["unknown", "lookup", "scan", "index"] as const satisfies readonly AccessType[]
