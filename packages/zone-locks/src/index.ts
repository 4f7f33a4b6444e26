/**
 * @zone-locks/cli: DNS zone lock management over WAPI
 *
 * Public API surface.
 */

// Config
export {
  CONFIG_KEYS,
  CONFIG_SECTION,
  type ConfigKey,
  DEFAULT_CONFIG_FILE,
  type IniSections,
  loadConfig,
  parseIniSections,
  parseConfig,
  stripQuotes,
} from "./config.js";
// Controller
export {
  type ControllerOptions,
  ZoneLockController,
  type ZoneLockResult,
  type ZoneQueryResult,
  type ZoneTarget,
} from "./controller.js";
// CLI
export { type CliArgs, type CliDependencies, EXIT_CODE, main, parseArgs } from "./cli.js";
// Logging
export {
  createLogger,
  type LogEntry,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from "./logger.js";
// Orchestration
export {
  type BatchOptions,
  type BatchSummary,
  type ControlOptions,
  controlZoneLock,
  formatZoneStatus,
  type LockIntent,
  processAllZones,
  type ReportOptions,
  reportLockStatus,
  resolveIntent,
} from "./orchestration.js";
// Reporters
export {
  getReporter,
  isOutputFormat,
  JsonReporter,
  OUTPUT_FORMATS,
  type OutputFormat,
  TextReporter,
  type ZoneReporter,
} from "./reporters/index.js";
export { VERSION } from "./version.js";
