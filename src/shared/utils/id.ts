import { randomUUID } from "node:crypto";

/**
 * Generate a random run identifier (UUIDv4), used to correlate the log
 * lines of one task execution.
 */
export const generateId = (): string => randomUUID();
