export {
  DEFAULT_CHARSET,
  InvalidEventError,
  describeIssues,
  parseUpdaterEvent,
  updaterEventSchema
} from './event';
export type { UpdaterEvent, UpdaterEventInput } from './event';
export {
  formatCommitDate,
  formatLinkDate,
  formatTitleDate,
  pageDirForDate,
  planPageUpdate
} from './page-plan';
export type { PagePlan } from './page-plan';
export { LogLevel, createLogger, parseLogLevel, resetLogHandler, setLogHandler } from './logger';
export type { LogEntry, LogHandler, Logger } from './logger';
