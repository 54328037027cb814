/**
 * Source report types for the Safety Status Hub
 */

import { IconActionType, IssueCategory, SourceSeverity } from './common.js';

/**
 * Addresses all per-source state: one source, one user
 */
export interface SourceKey {
  sourceId: string;
  userId: number;
}

/**
 * Identity of an issue across reports
 */
export interface IssueKey {
  sourceId: string;
  issueId: string;
  userId: number;
}

/**
 * Identity of an action of an issue
 */
export interface IssueActionKey {
  issueKey: IssueKey;
  actionId: string;
}

/**
 * An executable remediation tied to one issue
 */
export interface IssueAction {
  id: string;
  label: string;
  /** The issue is expected to go away once the action succeeds */
  resolving: boolean;
  successMessage?: string;
  pendingAction?: string;
}

/**
 * An issue reported by a source
 */
export interface SourceIssue {
  id: string;
  typeId: string;
  severity: SourceSeverity;
  category: IssueCategory;
  title: string;
  summary: string;
  subtitle?: string;
  actions: IssueAction[];
}

export interface IconAction {
  type: IconActionType;
  pendingAction: string;
}

/**
 * Status reported by a source for its entry
 */
export interface SourceStatus {
  title: string;
  summary: string;
  severity: SourceSeverity;
  enabled: boolean;
  pendingAction?: string;
  iconAction?: IconAction;
}

/**
 * Latest report of a source for a user. Overwritten wholesale on each set.
 */
export interface SourceReport {
  status?: SourceStatus;
  issues: SourceIssue[];
}

export function sourceKey(sourceId: string, userId: number): SourceKey {
  return { sourceId, userId };
}

export function issueKey(sourceId: string, issueId: string, userId: number): IssueKey {
  return { sourceId, issueId, userId };
}

export function toSourceKey(key: IssueKey): SourceKey {
  return { sourceId: key.sourceId, userId: key.userId };
}

export function sameSourceKey(left: SourceKey, right: SourceKey): boolean {
  return left.sourceId === right.sourceId && left.userId === right.userId;
}
