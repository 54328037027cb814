/**
 * Issue dismissal types
 */

import { SourceSeverity } from './common.js';
import { IssueKey } from './reports.js';

/**
 * What the hub remembers about one issue.
 *
 * A record exists from the first time the issue is seen (or dismissed). It only
 * suppresses the issue while the reported severity stays at or below
 * `dismissedSeverity`; `dismissCount` is 0 exactly when `dismissedAt` is absent.
 */
export interface DismissalRecord {
  issueKey: IssueKey;
  firstSeenAt: Date;
  dismissedSeverity?: SourceSeverity;
  dismissedAt?: Date;
  dismissCount: number;
}

/**
 * Persisted form of a record, exchanged with the storage collaborator
 */
export interface PersistedIssueRecord {
  key: string;
  firstSeenAt: Date;
  dismissedAt?: Date;
  dismissCount: number;
  dismissedSeverity?: SourceSeverity;
}
