/**
 * Logging
 *
 * Components log through the console API with a `[ClassName]` prefix. Any
 * object with the same four methods can be passed in instead.
 */

export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export const defaultLogger: Logger = console;
