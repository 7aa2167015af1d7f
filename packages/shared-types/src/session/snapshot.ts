/**
 * Session Snapshot
 *
 * Read-only projection handed to the persistence layer. It holds everything
 * needed to rebuild a session without replaying the protocol. The bridge
 * process is not part of it; a restored session relaunches on first send.
 */

import type { Message, UsageInfo } from './messages.js';
import type { SessionSettings } from './settings.js';
import type { TaskTable } from './tasks.js';

export const SESSION_SNAPSHOT_VERSION = 1;

export interface SessionSnapshot {
  version: typeof SESSION_SNAPSHOT_VERSION;
  id: string;
  name: string;
  /** Unix timestamp (ms) */
  createdAt: number;
  settings: SessionSettings;
  messages: Message[];
  /**
   * Continuation token. Useless without the backend credentials the bridge
   * is launched with.
   */
  sessionId?: string;
  totalCost: number;
  lastUsage?: UsageInfo;
  tasks: TaskTable;
}
