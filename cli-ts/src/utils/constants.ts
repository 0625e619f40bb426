/**
 * CLI Constants
 *
 * Centralized magic numbers and configuration defaults
 */

/** Seconds of elapsed wait between deletion progress reports */
export const DELETION_PROGRESS_EVERY_SECONDS = 30;

/** Column width of the pod key in the GPU table */
export const GPU_TABLE_POD_COLUMN_WIDTH = 60;

/** Column width of the GPU count in the GPU table */
export const GPU_TABLE_COUNT_COLUMN_WIDTH = 10;
