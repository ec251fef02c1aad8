export type Milliseconds = number
export type Seconds = number

/** Whole seconds since the Unix epoch, the unit the store's TTL attribute uses. */
export type EpochSeconds = number
