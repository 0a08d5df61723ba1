import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';

export const DEFAULT_LOG_LIMIT = 8;
export const MAX_MESSAGE_LENGTH = 120;

export interface LogEntry {
  seq: number;
  message: string;
  timestamp: number;
}

interface SessionLogState {
  entries: LogEntry[];
  limit: number;
  /** Total messages appended this session, including dropped ones */
  total: number;
}

interface SessionLogActions {
  append: (message: string) => void;
  clear: () => void;
}

export type SessionLogStore = StoreApi<SessionLogState & SessionLogActions>;

export function truncateMessage(message: string, maxLength = MAX_MESSAGE_LENGTH): string {
  return message.length > maxLength ? `${message.slice(0, maxLength)}...` : message;
}

/**
 * Ring buffer of human-readable simulation messages for the log panel.
 * Oldest entries drop off once `limit` is reached.
 */
export function createSessionLog(limit = DEFAULT_LOG_LIMIT): SessionLogStore {
  return createStore<SessionLogState & SessionLogActions>()((set) => ({
    entries: [],
    limit: Math.max(1, limit),
    total: 0,

    append: (message) =>
      set((state) => {
        const entry: LogEntry = {
          seq: state.total + 1,
          message: truncateMessage(message),
          timestamp: Date.now(),
        };
        return {
          entries: [...state.entries, entry].slice(-state.limit),
          total: state.total + 1,
        };
      }),

    clear: () => set({ entries: [], total: 0 }),
  }));
}
