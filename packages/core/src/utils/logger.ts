import debug, { type Debugger } from "debug";

const NAMESPACE_ROOT = "switchboard";

export type LoggerOptions = {
  /**
   * Replaces the `switchboard` root segment.
   */
  prefix?: string;
};

/**
 * Debug logger for one hub or component, printed under `switchboard:<namespace>`.
 * Output is off until `DEBUG=switchboard:*` (or a narrower pattern) enables it.
 */
export const createLogger = (namespace: string, { prefix = NAMESPACE_ROOT }: LoggerOptions = {}): Debugger =>
  debug(`${prefix}:${namespace}`);

export const extendLogger = (logger: Debugger, suffix: string): Debugger => logger.extend(suffix);
