/**
 * plugkit
 *
 * Host-editor plugin utilities.
 */

export { ProfileStack, formatDurationMs, formatProfileLine } from './profiling/ProfileStack.js';
export { buildProfileReport, showProfile, PROFILE_REPORT_HEADING } from './profiling/ProfileReport.js';
export type { ProfileEntry, ClosedProfileEntry, ProfileStackOptions } from './profiling/types.js';

export { Throttle, ThrottleState, makeThrottle } from './scheduling/Throttle.js';
export { hrtimeClock, nodeTimers } from './core/clock.js';
export type { Clock, TimerHost } from './core/clock.js';

export {
  StackUnderflowError,
  InvalidDurationError,
  UnsupportedValueError,
  ConfigurationError
} from './core/errors.js';
export { Logger } from './core/Logger.js';
export type { LoggerOptions } from './core/Logger.js';

export { loadConfig, loadEnvFile, ENV_KEYS } from './config/ConfigLoader.js';
export { DEFAULT_PLUGKIT_CONFIG } from './config/types.js';
export type { PlugkitConfig, LogLevel } from './config/types.js';

export { NotificationService } from './notification/NotificationService.js';
export { ConsoleSink } from './notification/ConsoleSink.js';
export { MemorySink } from './notification/MemorySink.js';
export type { Notification, NotificationLevel, NotificationSink, NotifyOptions } from './notification/types.js';

export { FileSystemService } from './services/FileSystemService.js';
export type { DirEntry, DirEntryType } from './services/FileSystemService.js';
export { GitInfoReader } from './capabilities/git/GitInfoReader.js';
export type { GitInfo } from './capabilities/git/types.js';
export { UriOpener, openCommand, quoteForCmd, spawnRunner } from './platform/UriOpener.js';
export type { CommandRunner, CommandResult, EditorHost } from './platform/types.js';
export { HostLifecycle } from './lifecycle/HostLifecycle.js';
export type { HostLifecycleEvent } from './lifecycle/HostLifecycle.js';
export { dump, quoteString } from './serialization/dump.js';
