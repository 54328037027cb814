/**
 * Telemetry event types emitted to an external sink
 */

import {
  OverallSeverity,
  RefreshRequestType,
  SourceSeverity,
  SystemEventResult
} from './common.js';

export interface SourceRefreshEvent {
  kind: 'source_refresh';
  requestType: RefreshRequestType;
  sourceId: string;
  userId: number;
  durationMs: number;
  result: SystemEventResult;
}

export interface WholeRefreshEvent {
  kind: 'whole_refresh';
  requestType: RefreshRequestType;
  durationMs: number;
  result: SystemEventResult;
}

/**
 * Emitted when a new refresh replaces one that had not completed
 */
export interface RefreshSupersededEvent {
  kind: 'refresh_superseded';
  requestType: RefreshRequestType;
  durationMs: number;
  abandonedSourceCount: number;
}

/**
 * Pulled snapshot of the aggregated state of one user profile group
 */
export interface SafetyStateEvent {
  kind: 'safety_state';
  overallSeverity: OverallSeverity;
  openIssueCount: number;
  dismissedIssueCount: number;
}

/**
 * Collected alongside the snapshot, once per logging-allowed source and user
 */
export interface SourceStateCollectedEvent {
  kind: 'source_state_collected';
  sourceId: string;
  isUserManaged: boolean;
  maxSeverity?: SourceSeverity;
  openIssueCount: number;
  dismissedIssueCount: number;
}

export type TelemetryEvent =
  | SourceRefreshEvent
  | WholeRefreshEvent
  | RefreshSupersededEvent
  | SafetyStateEvent
  | SourceStateCollectedEvent;
