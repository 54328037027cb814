/**
 * Common types and enums used across the Safety Status Hub
 */

// Source configuration
export type SourceType = 'dynamic' | 'static' | 'issue_only';
export type ProfileScope = 'none' | 'primary' | 'all';
export type InitialDisplayState = 'enabled' | 'disabled' | 'hidden';
export type GroupType = 'collapsible' | 'rigid' | 'hidden';
export type StatelessIconType = 'none' | 'privacy';

// Severity level reported by a source, for its status or its issues
export type SourceSeverity = 'unspecified' | 'information' | 'recommendation' | 'critical_warning';

// Severity level of an entry shown for one source and one user
export type EntrySeverity = 'unknown' | 'unspecified' | 'ok' | 'recommendation' | 'critical_warning';

// Severity level of the whole view
export type OverallSeverity = 'unknown' | 'ok' | 'recommendation' | 'critical_warning';

// Severity level of an issue once it is part of the view
export type IssueSeverity = 'ok' | 'recommendation' | 'critical_warning';

// Issue categories select the phrasing of the overall title
export type IssueCategory = 'device' | 'account' | 'general';

// Icon shown on an entry whose severity is unspecified
export type SeverityUnspecifiedIconType = 'no_icon' | 'no_recommendation' | 'privacy';

// Icon action attached to a source status
export type IconActionType = 'gear' | 'info';

// Refresh reasons
export type RefreshReason =
  | 'page_open'
  | 'rescan_button'
  | 'device_reboot'
  | 'locale_change'
  | 'feature_enabled'
  | 'other';

// Refresh status of the view
export type RefreshStatus = 'none' | 'data_fetch_in_progress' | 'full_rescan_in_progress';

// Telemetry bucket for a refresh
export type RefreshRequestType = 'get_data' | 'fetch_fresh_data';

// Telemetry result of a refresh
export type SystemEventResult = 'success' | 'error' | 'timeout';

export const REFRESH_REASONS: readonly RefreshReason[] = [
  'page_open',
  'rescan_button',
  'device_reboot',
  'locale_change',
  'feature_enabled',
  'other'
];

/**
 * Maps a refresh reason to the request type sources receive and telemetry buckets by.
 * Opening the page only asks for cached data; every other reason asks for a fresh scan.
 */
export function toRefreshRequestType(reason: RefreshReason): RefreshRequestType {
  switch (reason) {
    case 'page_open':
      return 'get_data';
    case 'rescan_button':
    case 'device_reboot':
    case 'locale_change':
    case 'feature_enabled':
    case 'other':
      return 'fetch_fresh_data';
  }
}

/**
 * Time source in milliseconds, injected so that durations can be tested
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
