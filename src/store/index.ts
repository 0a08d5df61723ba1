export { createSessionLog, truncateMessage, DEFAULT_LOG_LIMIT, MAX_MESSAGE_LENGTH } from './sessionLog';
export type { LogEntry, SessionLogStore } from './sessionLog';
