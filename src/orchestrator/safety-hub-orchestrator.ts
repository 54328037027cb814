/**
 * Safety Hub Orchestrator for the Safety Status Hub
 * Owns the report store, the dismissal cache and the refresh coordinator, and
 * serializes every change to them through one critical section
 */

import {
  ActionResolver,
  IIssueDismissalCache,
  IRefreshCoordinator,
  ISafetyHubOrchestrator,
  RefreshRequest,
  RefreshTransport,
  SafetyStateSnapshot,
  TelemetrySink,
  TimeoutScheduler,
  TransportMessage,
  ViewListener
} from '../interfaces/index.js';
import { ISourceReportStore, InMemorySourceReportStore } from '../repository/index.js';
import {
  AggregationEngine,
  ConsoleTelemetrySink,
  CriticalSection,
  HubSettings,
  IssueDismissalCache,
  RefreshCoordinator,
  SerialInbox,
  SourceRegistry,
  TelemetryLogger,
  createDefaultView,
  resolveHubSettings,
  validateSourceData
} from '../services/index.js';
import {
  AggregatedView,
  Clock,
  FeatureDisabledError,
  IssueAction,
  IssueKey,
  IssueNotFoundError,
  PersistedIssueRecord,
  RefreshReason,
  RefreshStatus,
  SourceDataValidationError,
  SourceDescriptor,
  SourceIssue,
  SourceKey,
  SourceSeverity,
  SourceStateCollectedEvent,
  UserProfileGroup,
  getManagedRunningProfileUserIds,
  logError,
  systemClock,
  toRefreshRequestType,
  toSourceKey
} from '../types/index.js';
import { encodeIssueKey } from '../utils/ids.js';
import { createLogger, setVerboseLogging } from '../utils/logger.js';
import { maxSourceSeverity } from '../utils/severity.js';

const logger = createLogger('SafetyHubOrchestrator');

/**
 * Collaborators of the orchestrator. Only the registry, the critical section,
 * the transport and the scheduler are required.
 */
export interface SafetyHubDependencies {
  registry: SourceRegistry;
  criticalSection: CriticalSection;
  transport: RefreshTransport;
  scheduler: TimeoutScheduler;
  telemetrySink?: TelemetrySink;
  reportStore?: ISourceReportStore;
  dismissalCache?: IIssueDismissalCache;
  actionResolver?: ActionResolver;
  clock?: Clock;
  settings?: Partial<HubSettings>;
  /** Called with errors thrown while handling a transport message */
  onError?: (error: unknown, message: TransportMessage) => void;
}

interface Subscription {
  userProfileGroup: UserProfileGroup;
  listener: ViewListener;
}

interface PendingTimeout {
  sessionId: string;
  cancel: () => void;
}

/**
 * Safety Hub Orchestrator implementation
 */
export class SafetyHubOrchestrator implements ISafetyHubOrchestrator {
  private readonly registry: SourceRegistry;
  private readonly criticalSection: CriticalSection;
  private readonly transport: RefreshTransport;
  private readonly scheduler: TimeoutScheduler;
  private readonly reportStore: ISourceReportStore;
  private readonly dismissalCache: IIssueDismissalCache;
  private readonly coordinator: IRefreshCoordinator;
  private readonly telemetry: TelemetryLogger;
  private readonly engine: AggregationEngine;
  private readonly settings: HubSettings;
  private readonly inbox: SerialInbox<TransportMessage>;

  private subscriptions: Set<Subscription> = new Set();
  private knownGroups: Map<number, UserProfileGroup> = new Map();
  private pendingTimeout: PendingTimeout | undefined;

  constructor(dependencies: SafetyHubDependencies) {
    const clock = dependencies.clock ?? systemClock;
    this.settings = resolveHubSettings(dependencies.settings);
    if (this.settings.verboseLogging) {
      setVerboseLogging(true);
    }

    this.registry = dependencies.registry;
    this.criticalSection = dependencies.criticalSection;
    this.transport = dependencies.transport;
    this.scheduler = dependencies.scheduler;
    this.reportStore = dependencies.reportStore ?? new InMemorySourceReportStore();
    this.dismissalCache = dependencies.dismissalCache ?? new IssueDismissalCache(clock);
    this.telemetry = new TelemetryLogger(
      dependencies.telemetrySink ?? new ConsoleTelemetrySink(),
      this.settings.telemetryEnabled
    );
    this.coordinator = new RefreshCoordinator(this.telemetry, this.settings.untrackedSourceIds, clock);
    this.engine = new AggregationEngine(dependencies.actionResolver);
    this.inbox = new SerialInbox<TransportMessage>(
      this.criticalSection,
      message => this.handleMessage(message),
      dependencies.onError
    );
  }

  isEnabled(): boolean {
    return this.settings.enabled;
  }

  getRefreshStatus(): RefreshStatus {
    return this.criticalSection.run(() => this.coordinator.status());
  }

  // ==================== Refresh ====================

  /**
   * Opens a refresh session, asks the selected sources to report and
   * schedules the session timeout
   */
  refreshSources(reason: RefreshReason, userProfileGroup: UserProfileGroup): string {
    this.assertEnabled('refreshSources');

    const { sessionId, requests, awaiting } = this.criticalSection.run(() => {
      this.rememberGroup(userProfileGroup);
      this.cancelPendingTimeout();

      const id = this.coordinator.startSession(reason, userProfileGroup);
      const requestType = toRefreshRequestType(reason);
      const sourceKeys: SourceKey[] = [];
      const refreshRequests: RefreshRequest[] = [];
      const runningManaged = getManagedRunningProfileUserIds(userProfileGroup);

      for (const source of this.registry.externalSources()) {
        const userIds = [userProfileGroup.profileParentUserId];
        if (source.supportsManagedProfiles) {
          userIds.push(...runningManaged);
        }
        for (const userId of userIds) {
          const key: SourceKey = { sourceId: source.id, userId };
          if (reason === 'page_open' && !source.refreshOnPageOpenAllowed && this.reportStore.get(key) !== undefined) {
            continue;
          }
          sourceKeys.push(key);
          refreshRequests.push({
            sessionId: id,
            reason,
            requestType,
            sourceId: source.id,
            packageName: source.packageName,
            userId
          });
        }
      }

      this.coordinator.markInFlight(id, sourceKeys);
      const waiting = this.coordinator.inFlightKeys().length > 0;
      if (!waiting) {
        this.coordinator.clear(id);
      }
      logger.info('Refresh requested', { sessionId: id, reason, sources: refreshRequests.length });
      return { sessionId: id, requests: refreshRequests, awaiting: waiting };
    });

    if (awaiting) {
      const cancel = this.scheduler.schedule(this.settings.refreshTimeoutsMs[reason], () =>
        this.receive({ type: 'refresh_timeout', sessionId })
      );
      this.pendingTimeout = { sessionId, cancel };
    }
    for (const request of requests) {
      this.transport.sendRefreshRequest(request);
    }
    this.notifyListeners();
    return sessionId;
  }

  /**
   * Posts a transport message to the inbox
   */
  receive(message: TransportMessage): void {
    this.inbox.post(message);
  }

  private handleMessage(message: TransportMessage): (() => void) | void {
    let changed = false;
    switch (message.type) {
      case 'source_data':
        this.assertEnabled('setSourceData');
        changed = this.applySourceData(message.sourceKey, message.payload, message.sessionId);
        break;
      case 'source_error':
        this.assertEnabled('reportSourceError');
        changed = this.applySourceError(message.sourceKey, message.sessionId);
        break;
      case 'refresh_timeout':
        changed = this.applyTimeout(message.sessionId);
        break;
      case 'user_removed':
        changed = this.applyClearForUser(message.userId);
        break;
    }
    if (changed) {
      return () => this.notifyListeners();
    }
  }

  // ==================== Source Data ====================

  setSourceData(sourceKey: SourceKey, payload: unknown, sessionId?: string): boolean {
    this.assertEnabled('setSourceData');
    const changed = this.criticalSection.run(() => this.applySourceData(sourceKey, payload, sessionId));
    if (changed) {
      this.notifyListeners();
    }
    return changed;
  }

  reportSourceError(sourceKey: SourceKey, sessionId?: string): void {
    this.assertEnabled('reportSourceError');
    const changed = this.criticalSection.run(() => this.applySourceError(sourceKey, sessionId));
    if (changed) {
      this.notifyListeners();
    }
  }

  private applySourceData(sourceKey: SourceKey, payload: unknown, sessionId?: string): boolean {
    const source = this.registry.requireSource(sourceKey.sourceId);
    this.assertUserSupported(source, sourceKey.userId);
    const report = validateSourceData(source, payload);

    const reportChanged = this.reportStore.set(sourceKey, report);
    this.dismissalCache.syncActiveIssues(sourceKey, report.issues.map(issue => issue.id));
    const actionsCleared = this.reportStore.clearActionsInFlight(sourceKey);
    const completed = this.completeSource(sourceKey, true, sessionId);
    logger.debug('Source data set', { sourceId: sourceKey.sourceId, userId: sourceKey.userId, reportChanged });
    return reportChanged || actionsCleared || completed;
  }

  private applySourceError(sourceKey: SourceKey, sessionId?: string): boolean {
    this.registry.requireSource(sourceKey.sourceId);
    const errorChanged = this.reportStore.markError(sourceKey);
    const actionsCleared = this.reportStore.clearActionsInFlight(sourceKey);
    const completed = this.completeSource(sourceKey, false, sessionId);
    logger.warn('Source reported an error', { sourceId: sourceKey.sourceId, userId: sourceKey.userId });
    return errorChanged || actionsCleared || completed;
  }

  private completeSource(sourceKey: SourceKey, success: boolean, sessionId?: string): boolean {
    if (sessionId === undefined) {
      return false;
    }
    const completed = this.coordinator.reportComplete(sessionId, sourceKey, success);
    if (completed && this.pendingTimeout?.sessionId === sessionId) {
      this.cancelPendingTimeout();
    }
    return completed;
  }

  /**
   * Sources that do not report for managed profiles may not set data for one
   */
  private assertUserSupported(source: SourceDescriptor, userId: number): void {
    if (source.supportsManagedProfiles) {
      return;
    }
    for (const group of this.knownGroups.values()) {
      if (group.managedProfiles.some(profile => profile.userId === userId)) {
        throw new SourceDataValidationError(
          source.id,
          `Source ${source.id} does not support managed profile ${userId}`
        );
      }
    }
  }

  private applyTimeout(sessionId: string): boolean {
    if (this.pendingTimeout?.sessionId === sessionId) {
      this.pendingTimeout = undefined;
    }
    const timedOut = this.coordinator.timeout(sessionId);
    for (const key of timedOut) {
      if (this.reportStore.get(key) === undefined) {
        this.reportStore.markError(key);
      }
    }
    return timedOut.length > 0;
  }

  // ==================== Issues ====================

  /**
   * Dismisses an issue at its currently reported severity
   */
  dismissIssue(issueKey: IssueKey): void {
    this.assertEnabled('dismissIssue');
    this.criticalSection.run(() => {
      const issue = this.requireIssue(issueKey);
      this.dismissalCache.dismiss(issueKey, issue.severity);
    });
    this.notifyListeners();
  }

  /**
   * Marks an issue action as in flight and returns it so the caller can launch
   * it. Returns undefined when the action is already in flight.
   */
  executeIssueAction(issueKey: IssueKey, actionId: string): IssueAction | undefined {
    this.assertEnabled('executeIssueAction');
    const action = this.criticalSection.run(() => {
      const issue = this.requireIssue(issueKey);
      const found = issue.actions.find(candidate => candidate.id === actionId);
      if (found === undefined) {
        throw new IssueNotFoundError(`No action ${actionId} on issue ${encodeIssueKey(issueKey)}`);
      }
      const actionKey = { issueKey, actionId };
      if (this.reportStore.isActionInFlight(actionKey)) {
        logger.debug('Issue action already in flight', { issue: encodeIssueKey(issueKey), actionId });
        return undefined;
      }
      this.reportStore.markActionInFlight(actionKey);
      return found;
    });
    if (action !== undefined) {
      this.notifyListeners();
    }
    return action;
  }

  private requireIssue(issueKey: IssueKey): SourceIssue {
    const report = this.reportStore.get(toSourceKey(issueKey));
    const issue = report?.issues.find(candidate => candidate.id === issueKey.issueId);
    if (issue === undefined) {
      throw new IssueNotFoundError(`Issue ${encodeIssueKey(issueKey)} is not currently reported`);
    }
    return issue;
  }

  // ==================== Clearing ====================

  /**
   * Drops every report, dismissal record and the open refresh session
   */
  clearAllData(): void {
    this.criticalSection.run(() => {
      this.reportStore.clearAll();
      this.dismissalCache.clear();
      this.coordinator.clear();
      this.cancelPendingTimeout();
    });
    logger.info('Cleared all data');
    this.notifyListeners();
  }

  clearForUser(userId: number): void {
    const changed = this.criticalSection.run(() => this.applyClearForUser(userId));
    if (changed) {
      this.notifyListeners();
    }
  }

  private applyClearForUser(userId: number): boolean {
    this.reportStore.clearForUser(userId);
    this.dismissalCache.clearForUser(userId);
    if (this.coordinator.clearForUser(userId)) {
      this.cancelPendingTimeout();
    }

    this.knownGroups.delete(userId);
    for (const [parentId, group] of this.knownGroups) {
      this.knownGroups.set(parentId, {
        ...group,
        managedProfiles: group.managedProfiles.filter(profile => profile.userId !== userId)
      });
    }
    logger.info('Cleared data for user', { userId });
    return true;
  }

  // ==================== Persistence ====================

  exportIssueRecords(): PersistedIssueRecord[] {
    return this.criticalSection.run(() => {
      const records = this.dismissalCache.toPersistedRecords();
      this.dismissalCache.markPersisted();
      return records;
    });
  }

  importIssueRecords(records: PersistedIssueRecord[]): void {
    this.criticalSection.run(() => this.dismissalCache.loadPersistedRecords(records));
    this.notifyListeners();
  }

  // ==================== Reads ====================

  getView(userProfileGroup: UserProfileGroup): AggregatedView {
    if (!this.settings.enabled) {
      return createDefaultView();
    }
    return this.criticalSection.run(() => this.computeView(userProfileGroup));
  }

  private computeView(userProfileGroup: UserProfileGroup): AggregatedView {
    return this.engine.computeView(
      this.registry,
      this.reportStore,
      this.dismissalCache,
      this.coordinator.status(),
      userProfileGroup
    );
  }

  /**
   * Builds the telemetry snapshot of each group and emits it
   */
  pullSafetyState(userProfileGroups: UserProfileGroup[]): SafetyStateSnapshot[] {
    if (!this.settings.enabled) {
      return [];
    }
    return this.criticalSection.run(() =>
      userProfileGroups.map(userProfileGroup => {
        const view = this.computeView(userProfileGroup);
        const openIssueCount = view.issues.length;
        const dismissedIssueCount = Math.max(0, this.dismissalCache.countActive(userProfileGroup) - openIssueCount);
        const state = this.telemetry.safetyState(view.overallSeverity, openIssueCount, dismissedIssueCount);
        return { state, sources: this.collectSourceStates(userProfileGroup) };
      })
    );
  }

  private collectSourceStates(userProfileGroup: UserProfileGroup): SourceStateCollectedEvent[] {
    const events: SourceStateCollectedEvent[] = [];
    const runningManaged = getManagedRunningProfileUserIds(userProfileGroup);

    for (const source of this.registry.externalSources()) {
      if (!this.registry.isLoggingAllowed(source.id)) {
        continue;
      }
      const userIds = [userProfileGroup.profileParentUserId];
      if (source.supportsManagedProfiles) {
        userIds.push(...runningManaged);
      }
      for (const userId of userIds) {
        const report = this.reportStore.get({ sourceId: source.id, userId });
        let maxSeverity: SourceSeverity | undefined = report?.status?.severity;
        let openIssueCount = 0;
        let dismissedIssueCount = 0;
        for (const issue of report?.issues ?? []) {
          if (this.dismissalCache.isDismissed({ sourceId: source.id, issueId: issue.id, userId }, issue.severity)) {
            dismissedIssueCount++;
            continue;
          }
          openIssueCount++;
          maxSeverity = maxSeverity === undefined ? issue.severity : maxSourceSeverity(maxSeverity, issue.severity);
        }
        events.push(
          this.telemetry.sourceStateCollected(
            source.id,
            userId !== userProfileGroup.profileParentUserId,
            maxSeverity,
            openIssueCount,
            dismissedIssueCount
          )
        );
      }
    }
    return events;
  }

  /**
   * Registers a listener that receives a fresh view after every change.
   * Returns a function that removes it.
   */
  subscribe(userProfileGroup: UserProfileGroup, listener: ViewListener): () => void {
    const subscription: Subscription = { userProfileGroup, listener };
    this.criticalSection.run(() => this.rememberGroup(userProfileGroup));
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  private notifyListeners(): void {
    for (const subscription of Array.from(this.subscriptions)) {
      try {
        subscription.listener(this.getView(subscription.userProfileGroup));
      } catch (error) {
        logError(error, { component: 'SafetyHubOrchestrator', operation: 'notifyListeners' });
      }
    }
  }

  // ==================== Helpers ====================

  private assertEnabled(operation: string): void {
    if (!this.settings.enabled) {
      throw new FeatureDisabledError(operation);
    }
  }

  private rememberGroup(userProfileGroup: UserProfileGroup): void {
    this.knownGroups.set(userProfileGroup.profileParentUserId, userProfileGroup);
  }

  private cancelPendingTimeout(): void {
    if (this.pendingTimeout !== undefined) {
      this.pendingTimeout.cancel();
      this.pendingTimeout = undefined;
    }
  }
}
