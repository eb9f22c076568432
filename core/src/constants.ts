// Shared defaults. @flatframe/config builds its DEFAULT_CONFIG from these.

/** Delimiter used for every text column when none is supplied */
export const DEFAULT_DELIMITER = ',';

/** Rows per partition when a frame is built from a flat row list */
export const DEFAULT_PARTITION_SIZE = 10_000;

/** Partitions transformed concurrently */
export const DEFAULT_MAX_PARALLELISM = 4;

/** Parallelism above this is accepted but reported as a config warning */
export const MAX_RECOMMENDED_PARALLELISM = 64;
