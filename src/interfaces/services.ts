/**
 * Service interfaces for the Safety Status Hub
 */

import {
  DismissalRecord,
  IssueKey,
  PersistedIssueRecord,
  RefreshReason,
  RefreshRequestType,
  RefreshStatus,
  SourceDescriptor,
  SourceKey,
  SourceSeverity,
  TelemetryEvent,
  UserProfileGroup
} from '../types/index.js';

/**
 * Refresh Coordinator interface
 * Tracks which sources still owe a response to the current refresh
 */
export interface IRefreshCoordinator {
  startSession(reason: RefreshReason, userProfileGroup: UserProfileGroup): string;
  markInFlight(sessionId: string, sourceKeys: SourceKey[]): void;
  reportComplete(sessionId: string, sourceKey: SourceKey, success: boolean): boolean;
  status(): RefreshStatus;
  timeout(sessionId: string): SourceKey[];
  clearForUser(userId: number): boolean;
  clear(sessionId?: string): void;
  currentSessionId(): string | undefined;
  inFlightKeys(): SourceKey[];
}

/**
 * Issue Dismissal Cache interface
 * Remembers issues that were seen and dismissed, per user
 */
export interface IIssueDismissalCache {
  dismiss(issueKey: IssueKey, currentSeverity: SourceSeverity): void;
  isDismissed(issueKey: IssueKey, currentSeverity: SourceSeverity): boolean;
  getRecord(issueKey: IssueKey): DismissalRecord | undefined;
  countActive(userProfileGroup: UserProfileGroup): number;
  syncActiveIssues(sourceKey: SourceKey, issueIds: string[]): void;
  clearForUser(userId: number): void;
  clear(): void;
  toPersistedRecords(): PersistedIssueRecord[];
  loadPersistedRecords(records: PersistedIssueRecord[]): void;
  isDirty(): boolean;
  markPersisted(): void;
}

/**
 * Receives every telemetry event the hub emits
 */
export interface TelemetrySink {
  emit(event: TelemetryEvent): void;
}

/**
 * A request asking one source to report for one user
 */
export interface RefreshRequest {
  sessionId: string;
  reason: RefreshReason;
  requestType: RefreshRequestType;
  sourceId: string;
  packageName: string;
  userId: number;
}

/**
 * Delivers refresh requests to sources. Responses come back through
 * `SafetyHubOrchestrator.receive`.
 */
export interface RefreshTransport {
  sendRefreshRequest(request: RefreshRequest): void;
}

/**
 * Schedules a callback; returns a function that cancels it
 */
export interface TimeoutScheduler {
  schedule(delayMs: number, callback: () => void): () => void;
}

/**
 * Resolves the configured intent action of a source into an action that can
 * be launched for a user, or `undefined` when nothing can handle it.
 */
export interface ActionResolver {
  resolve(source: SourceDescriptor, userId: number, quietMode: boolean): string | undefined;
}
