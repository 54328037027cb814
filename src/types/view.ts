/**
 * Aggregated view types. A view is derived fresh on every read.
 */

import {
  EntrySeverity,
  IconActionType,
  IssueCategory,
  IssueSeverity,
  OverallSeverity,
  RefreshStatus,
  SeverityUnspecifiedIconType
} from './common.js';
import { IssueKey, SourceKey } from './reports.js';

export interface ViewIssueAction {
  id: string;
  label: string;
  resolving: boolean;
  inFlight: boolean;
  successMessage?: string;
  pendingAction?: string;
}

export interface ViewIssue {
  id: string;
  key: IssueKey;
  typeId: string;
  severity: IssueSeverity;
  category: IssueCategory;
  title: string;
  summary: string;
  subtitle?: string;
  shouldConfirmDismissal: boolean;
  actions: ViewIssueAction[];
}

export interface ViewIconAction {
  type: IconActionType;
  pendingAction: string;
}

export interface Entry {
  kind: 'entry';
  id: string;
  sourceKey: SourceKey;
  title: string;
  summary?: string;
  severity: EntrySeverity;
  enabled: boolean;
  pendingAction?: string;
  severityUnspecifiedIconType: SeverityUnspecifiedIconType;
  iconAction?: ViewIconAction;
}

export interface EntryGroup {
  kind: 'group';
  id: string;
  title: string;
  summary?: string;
  severity: EntrySeverity;
  severityUnspecifiedIconType: SeverityUnspecifiedIconType;
  entries: Entry[];
}

export type EntryOrGroup = Entry | EntryGroup;

export interface StaticEntry {
  title: string;
  summary?: string;
  pendingAction: string;
}

export interface StaticEntryGroup {
  title: string;
  entries: StaticEntry[];
}

export interface AggregatedView {
  overallSeverity: OverallSeverity;
  refreshStatus: RefreshStatus;
  title: string;
  summary: string;
  hasSettingsToReview: boolean;
  /** Ordered by severity, most severe first */
  issues: ViewIssue[];
  entries: EntryOrGroup[];
  staticEntryGroups: StaticEntryGroup[];
}
