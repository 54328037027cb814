/**
 * Safety Hub Orchestrator interface for the Safety Status Hub
 */

import {
  AggregatedView,
  IssueAction,
  IssueKey,
  RefreshReason,
  SafetyStateEvent,
  SourceKey,
  SourceStateCollectedEvent,
  UserProfileGroup
} from '../types/index.js';

/**
 * Messages delivered by the transport. They are posted to the orchestrator's
 * inbox and handled one at a time.
 */
export type TransportMessage =
  | { type: 'source_data'; sourceKey: SourceKey; payload: unknown; sessionId?: string }
  | { type: 'source_error'; sourceKey: SourceKey; sessionId?: string }
  | { type: 'refresh_timeout'; sessionId: string }
  | { type: 'user_removed'; userId: number };

export type ViewListener = (view: AggregatedView) => void;

/**
 * Snapshot pulled for one user profile group
 */
export interface SafetyStateSnapshot {
  state: SafetyStateEvent;
  sources: SourceStateCollectedEvent[];
}

/**
 * Safety Hub Orchestrator interface
 * Owns all hub state and serializes every change to it
 */
export interface ISafetyHubOrchestrator {
  // Refresh
  refreshSources(reason: RefreshReason, userProfileGroup: UserProfileGroup): string;
  receive(message: TransportMessage): void;

  // Source data
  setSourceData(sourceKey: SourceKey, payload: unknown, sessionId?: string): boolean;
  reportSourceError(sourceKey: SourceKey, sessionId?: string): void;

  // Issues
  dismissIssue(issueKey: IssueKey): void;
  executeIssueAction(issueKey: IssueKey, actionId: string): IssueAction | undefined;

  // Clearing
  clearAllData(): void;
  clearForUser(userId: number): void;

  // Reads
  getView(userProfileGroup: UserProfileGroup): AggregatedView;
  pullSafetyState(userProfileGroups: UserProfileGroup[]): SafetyStateSnapshot[];
  subscribe(userProfileGroup: UserProfileGroup, listener: ViewListener): () => void;
}
