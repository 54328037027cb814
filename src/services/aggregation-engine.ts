/**
 * Aggregation Engine
 *
 * Derives the aggregated view from the configuration, the stored reports and
 * the dismissal cache. The view is computed fresh on every call and nothing
 * here mutates state.
 */

import { ActionResolver, IIssueDismissalCache } from '../interfaces/services.js';
import { ISourceReportStore } from '../repository/source-report-store.js';
import {
  AggregatedView,
  Entry,
  EntryGroup,
  EntryOrGroup,
  EntrySeverity,
  IssueCategory,
  IssueKey,
  OverallSeverity,
  RefreshStatus,
  SeverityUnspecifiedIconType,
  SourceDescriptor,
  SourceKey,
  SourcesGroup,
  StaticEntry,
  StaticEntryGroup,
  UserProfileGroup,
  ViewIssue,
  getManagedRunningProfileUserIds,
  isDefaultEntryDisabled,
  isDefaultEntryHidden
} from '../types/index.js';
import { encodeGroupId, encodeIssueKey, encodeSourceKey } from '../utils/ids.js';
import { createLogger } from '../utils/logger.js';
import {
  entryToOverallSeverity,
  issueSeverityRank,
  issueToOverallSeverity,
  mergeEntrySeverity,
  mergeOverallSeverity,
  overallSeverityExceeds,
  sourceToEntrySeverity,
  sourceToIssueSeverity
} from '../utils/severity.js';
import { ConfiguredActionResolver } from './action-resolver.js';
import { SourceRegistry } from './source-registry.js';
import {
  HUB_STRINGS,
  alertsSummary,
  criticalTitle,
  recommendationTitle,
  refreshErrorSummary
} from './status-strings.js';

const logger = createLogger('AggregationEngine');

// ==================== Overall State ====================

/**
 * Accumulates the severities seen while building a view
 */
class OverallState {
  private issuesSeverity: OverallSeverity = 'ok';
  private entriesSeverity: OverallSeverity = 'ok';

  addIssue(severity: OverallSeverity): void {
    if (severity === 'unknown') {
      return;
    }
    this.issuesSeverity = mergeOverallSeverity(this.issuesSeverity, severity);
  }

  addEntry(severity: OverallSeverity): void {
    this.entriesSeverity = mergeOverallSeverity(this.entriesSeverity, severity);
  }

  /**
   * Unknown entries only make the whole view unknown when no issue is above ok
   */
  overallSeverity(): OverallSeverity {
    if (this.entriesSeverity === 'unknown' && !overallSeverityExceeds(this.issuesSeverity, 'ok')) {
      return 'unknown';
    }
    return this.issuesSeverity;
  }

  hasSettingsToReview(): boolean {
    return this.entriesSeverity === 'unknown' || overallSeverityExceeds(this.entriesSeverity, this.issuesSeverity);
  }
}

interface UserSlot {
  userId: number;
  isManaged: boolean;
  isRunning: boolean;
}

/**
 * Every user an entry is shown for: the parent, then each managed profile
 * whether running or not
 */
function entryUsers(source: SourceDescriptor, group: UserProfileGroup): UserSlot[] {
  const slots: UserSlot[] = [{ userId: group.profileParentUserId, isManaged: false, isRunning: true }];
  if (source.supportsManagedProfiles) {
    for (const profile of group.managedProfiles) {
      slots.push({ userId: profile.userId, isManaged: true, isRunning: profile.running });
    }
  }
  return slots;
}

function configuredTitle(source: SourceDescriptor, isManaged: boolean): string {
  switch (source.type) {
    case 'dynamic':
    case 'static': {
      const title = isManaged ? source.titleForWork ?? source.title : source.title;
      if (title === undefined) {
        logger.warn('Source has no title', { sourceId: source.id });
        return '';
      }
      return title;
    }
    case 'issue_only':
      return '';
  }
}

function configuredSummary(source: SourceDescriptor): string | undefined {
  switch (source.type) {
    case 'dynamic':
    case 'static':
      return source.summary;
    case 'issue_only':
      return undefined;
  }
}

function groupIconType(group: SourcesGroup): SeverityUnspecifiedIconType {
  switch (group.statelessIconType) {
    case 'privacy':
      return 'privacy';
    case 'none':
      return 'no_icon';
  }
}

/**
 * View returned while the hub is disabled
 */
export function createDefaultView(): AggregatedView {
  return {
    overallSeverity: 'unknown',
    refreshStatus: 'none',
    title: '',
    summary: '',
    hasSettingsToReview: false,
    issues: [],
    entries: [],
    staticEntryGroups: []
  };
}

// ==================== Engine ====================

export class AggregationEngine {
  constructor(private actionResolver: ActionResolver = new ConfiguredActionResolver()) {}

  computeView(
    registry: SourceRegistry,
    reportStore: ISourceReportStore,
    dismissalCache: IIssueDismissalCache,
    refreshStatus: RefreshStatus,
    userProfileGroup: UserProfileGroup
  ): AggregatedView {
    const state = new OverallState();
    const issues = this.collectIssues(registry, reportStore, dismissalCache, userProfileGroup, state);

    const entries: EntryOrGroup[] = [];
    const staticEntryGroups: StaticEntryGroup[] = [];
    for (const group of registry.groups()) {
      switch (group.type) {
        case 'collapsible':
          this.addEntryGroup(state, entries, group, reportStore, userProfileGroup);
          break;
        case 'rigid':
          this.addStaticEntryGroup(state, staticEntryGroups, group, reportStore, userProfileGroup);
          break;
        case 'hidden':
          break;
      }
    }

    const overallSeverity = state.overallSeverity();
    const hasSettingsToReview = state.hasSettingsToReview();
    return {
      overallSeverity,
      refreshStatus,
      title: this.statusTitle(overallSeverity, issues, refreshStatus, hasSettingsToReview),
      summary: this.statusSummary(overallSeverity, refreshStatus, issues.length, hasSettingsToReview),
      hasSettingsToReview,
      issues,
      entries,
      staticEntryGroups
    };
  }

  // ==================== Issues ====================

  private collectIssues(
    registry: SourceRegistry,
    reportStore: ISourceReportStore,
    dismissalCache: IIssueDismissalCache,
    userProfileGroup: UserProfileGroup,
    state: OverallState
  ): ViewIssue[] {
    const issues: ViewIssue[] = [];
    const runningManaged = getManagedRunningProfileUserIds(userProfileGroup);

    for (const source of registry.externalSources()) {
      const userIds = [userProfileGroup.profileParentUserId];
      if (source.supportsManagedProfiles) {
        userIds.push(...runningManaged);
      }

      for (const userId of userIds) {
        const report = reportStore.get({ sourceId: source.id, userId });
        if (report === undefined) {
          continue;
        }
        for (const issue of report.issues) {
          const key: IssueKey = { sourceId: source.id, issueId: issue.id, userId };
          if (dismissalCache.isDismissed(key, issue.severity)) {
            continue;
          }
          const severity = sourceToIssueSeverity(issue.severity);
          state.addIssue(issueToOverallSeverity(severity));
          issues.push({
            id: encodeIssueKey(key),
            key,
            typeId: issue.typeId,
            severity,
            category: issue.category,
            title: issue.title,
            summary: issue.summary,
            subtitle: issue.subtitle,
            shouldConfirmDismissal: severity !== 'ok',
            actions: issue.actions.map(action => ({
              id: action.id,
              label: action.label,
              resolving: action.resolving,
              inFlight: reportStore.isActionInFlight({ issueKey: key, actionId: action.id }),
              successMessage: action.successMessage,
              pendingAction: action.pendingAction
            }))
          });
        }
      }
    }

    // Array.prototype.sort is stable, so ties keep source order
    return issues.sort((left, right) => issueSeverityRank(right.severity) - issueSeverityRank(left.severity));
  }

  // ==================== Collapsible Groups ====================

  private addEntryGroup(
    state: OverallState,
    entriesOrGroups: EntryOrGroup[],
    group: SourcesGroup,
    reportStore: ISourceReportStore,
    userProfileGroup: UserProfileGroup
  ): void {
    let groupSeverity: EntrySeverity = 'unspecified';
    const entries: Entry[] = [];

    for (const source of group.sources) {
      for (const slot of entryUsers(source, userProfileGroup)) {
        const entry = this.toEntry(source, reportStore, slot);
        if (entry === undefined) {
          continue;
        }
        state.addEntry(entryToOverallSeverity(entry.severity));
        entries.push(entry);
        groupSeverity = mergeEntrySeverity(groupSeverity, entry.severity);
      }
    }

    if (entries.length === 0) {
      return;
    }
    if (entries.length === 1) {
      entriesOrGroups.push(entries[0]);
      return;
    }

    const entryGroup: EntryGroup = {
      kind: 'group',
      id: encodeGroupId(group.id),
      title: group.title ?? '',
      summary: this.groupSummary(group, groupSeverity, entries, reportStore),
      severity: groupSeverity,
      severityUnspecifiedIconType: groupIconType(group),
      entries
    };
    entriesOrGroups.push(entryGroup);
  }

  private toEntry(source: SourceDescriptor, reportStore: ISourceReportStore, slot: UserSlot): Entry | undefined {
    switch (source.type) {
      case 'issue_only':
        return undefined;
      case 'dynamic': {
        const key: SourceKey = { sourceId: source.id, userId: slot.userId };
        const status = reportStore.get(key)?.status;
        const quietMode = slot.isManaged && !slot.isRunning;
        if (status === undefined || quietMode) {
          return this.toDefaultEntry(source, reportStore, 'unknown', 'no_recommendation', slot);
        }

        let pendingAction = status.pendingAction;
        let enabled = status.enabled;
        if (pendingAction === undefined) {
          pendingAction = this.actionResolver.resolve(source, slot.userId, false);
          enabled = enabled && pendingAction !== undefined;
        }

        return {
          kind: 'entry',
          id: encodeSourceKey(key),
          sourceKey: key,
          title: status.title,
          summary: status.summary,
          severity: enabled ? sourceToEntrySeverity(status.severity) : 'unspecified',
          enabled,
          pendingAction,
          severityUnspecifiedIconType: 'no_recommendation',
          iconAction: status.iconAction === undefined
            ? undefined
            : { type: status.iconAction.type, pendingAction: status.iconAction.pendingAction }
        };
      }
      case 'static':
        return this.toDefaultEntry(source, reportStore, 'unspecified', 'no_icon', slot);
    }
  }

  /**
   * Entry built from the configuration alone
   */
  private toDefaultEntry(
    source: SourceDescriptor,
    reportStore: ISourceReportStore,
    severity: EntrySeverity,
    iconType: SeverityUnspecifiedIconType,
    slot: UserSlot
  ): Entry | undefined {
    if (isDefaultEntryHidden(source)) {
      return undefined;
    }

    const key: SourceKey = { sourceId: source.id, userId: slot.userId };
    const quietMode = slot.isManaged && !slot.isRunning;
    const pendingAction = this.actionResolver.resolve(source, slot.userId, quietMode);
    let enabled = pendingAction !== undefined && !isDefaultEntryDisabled(source);
    let summary = reportStore.hasError(key) ? refreshErrorSummary(1) : configuredSummary(source);
    if (quietMode) {
      enabled = false;
      summary = HUB_STRINGS.workProfilePaused;
    }

    return {
      kind: 'entry',
      id: encodeSourceKey(key),
      sourceKey: key,
      title: configuredTitle(source, slot.isManaged),
      summary,
      severity,
      enabled,
      pendingAction,
      severityUnspecifiedIconType: iconType
    };
  }

  private groupSummary(
    group: SourcesGroup,
    groupSeverity: EntrySeverity,
    entries: Entry[],
    reportStore: ISourceReportStore
  ): string | undefined {
    switch (groupSeverity) {
      case 'critical_warning':
      case 'recommendation':
      case 'ok':
        for (const entry of entries) {
          if (entry.severity !== groupSeverity || entry.summary === undefined) {
            continue;
          }
          if (groupSeverity !== 'ok') {
            return entry.summary;
          }
          const report = reportStore.get(entry.sourceKey);
          if (report !== undefined && report.issues.length > 0) {
            return entry.summary;
          }
        }
        return group.summary;
      case 'unspecified':
        return group.summary;
      case 'unknown': {
        const errorEntries = entries.filter(entry => reportStore.hasError(entry.sourceKey)).length;
        if (errorEntries > 0) {
          return refreshErrorSummary(errorEntries);
        }
        return HUB_STRINGS.groupUnknownSummary;
      }
    }
  }

  // ==================== Rigid Groups ====================

  private addStaticEntryGroup(
    state: OverallState,
    staticEntryGroups: StaticEntryGroup[],
    group: SourcesGroup,
    reportStore: ISourceReportStore,
    userProfileGroup: UserProfileGroup
  ): void {
    const entries: StaticEntry[] = [];

    for (const source of group.sources) {
      for (const slot of entryUsers(source, userProfileGroup)) {
        const entry = this.toStaticEntry(source, reportStore, slot);
        if (entry === undefined) {
          continue;
        }
        const quietMode = slot.isManaged && !slot.isRunning;
        if (quietMode || reportStore.hasError({ sourceId: source.id, userId: slot.userId })) {
          state.addEntry('unknown');
        }
        entries.push(entry);
      }
    }

    staticEntryGroups.push({ title: group.title ?? '', entries });
  }

  private toStaticEntry(source: SourceDescriptor, reportStore: ISourceReportStore, slot: UserSlot): StaticEntry | undefined {
    switch (source.type) {
      case 'issue_only':
        return undefined;
      case 'dynamic': {
        const status = reportStore.get({ sourceId: source.id, userId: slot.userId })?.status;
        const quietMode = slot.isManaged && !slot.isRunning;
        if (status !== undefined && !quietMode) {
          if (status.pendingAction === undefined) {
            logger.debug('Dropping static entry without an action', { sourceId: source.id, userId: slot.userId });
            return undefined;
          }
          return { title: status.title, summary: status.summary, pendingAction: status.pendingAction };
        }
        return this.toDefaultStaticEntry(source, reportStore, slot);
      }
      case 'static':
        return this.toDefaultStaticEntry(source, reportStore, slot);
    }
  }

  private toDefaultStaticEntry(
    source: SourceDescriptor,
    reportStore: ISourceReportStore,
    slot: UserSlot
  ): StaticEntry | undefined {
    if (isDefaultEntryHidden(source)) {
      return undefined;
    }
    const quietMode = slot.isManaged && !slot.isRunning;
    const pendingAction = this.actionResolver.resolve(source, slot.userId, quietMode);
    if (pendingAction === undefined) {
      logger.debug('Dropping static entry without an action', { sourceId: source.id, userId: slot.userId });
      return undefined;
    }

    const key: SourceKey = { sourceId: source.id, userId: slot.userId };
    let summary = reportStore.hasError(key) ? refreshErrorSummary(1) : configuredSummary(source);
    if (quietMode) {
      summary = HUB_STRINGS.workProfilePaused;
    }
    return { title: configuredTitle(source, slot.isManaged), summary, pendingAction };
  }

  // ==================== Status Text ====================

  private statusTitle(
    overallSeverity: OverallSeverity,
    issues: ViewIssue[],
    refreshStatus: RefreshStatus,
    hasSettingsToReview: boolean
  ): string {
    if (refreshStatus !== 'none') {
      return HUB_STRINGS.scanningTitle;
    }
    switch (overallSeverity) {
      case 'unknown':
      case 'ok':
        return hasSettingsToReview ? HUB_STRINGS.okReviewTitle : HUB_STRINGS.okTitle;
      case 'recommendation':
        return recommendationTitle(this.topIssueCategory(issues));
      case 'critical_warning':
        return criticalTitle(this.topIssueCategory(issues));
    }
  }

  private topIssueCategory(issues: ViewIssue[]): IssueCategory {
    if (issues.length === 0) {
      logger.warn('No issues found for a status above ok');
      return 'general';
    }
    return issues[0].category;
  }

  private statusSummary(
    overallSeverity: OverallSeverity,
    refreshStatus: RefreshStatus,
    issueCount: number,
    hasSettingsToReview: boolean
  ): string {
    if (refreshStatus !== 'none') {
      return HUB_STRINGS.loadingSummary;
    }
    switch (overallSeverity) {
      case 'unknown':
      case 'ok':
        if (issueCount === 0) {
          return hasSettingsToReview ? HUB_STRINGS.okReviewSummary : HUB_STRINGS.okSummary;
        }
        return alertsSummary(issueCount);
      case 'recommendation':
      case 'critical_warning':
        return alertsSummary(issueCount);
    }
  }
}
