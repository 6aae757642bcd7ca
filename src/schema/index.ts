/**
 * Record and partition definitions shared by the recorder services.
 */

export * from "./Record.js"
export * from "./Partition.js"
