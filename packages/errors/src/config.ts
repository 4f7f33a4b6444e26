/**
 * Configuration errors
 *
 * Concrete:
 *   - ConfigFileUnreadableError (CONFIG_FILE_UNREADABLE)
 */

import { ZoneLockError } from "./base.js";

export class ConfigFileUnreadableError extends ZoneLockError {
  readonly code = "CONFIG_FILE_UNREADABLE" as const;
  readonly path: string;

  constructor(path: string, reason: string, cause?: Error) {
    super(`Cannot read config file ${path}: ${reason}`, { path }, cause ? { cause } : undefined);
    this.path = path;
  }
}
