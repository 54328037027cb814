/**
 * Source configuration types for the Safety Status Hub
 */

import {
  GroupType,
  InitialDisplayState,
  ProfileScope,
  SourceSeverity,
  StatelessIconType
} from './common.js';

interface BaseSource {
  id: string;
  profile: ProfileScope;
  /** Derived from the profile: true when the source also reports for managed profiles */
  supportsManagedProfiles: boolean;
}

/**
 * A source that reports status and issues at runtime
 */
export interface DynamicSource extends BaseSource {
  type: 'dynamic';
  packageName: string;
  title?: string;
  titleForWork?: string;
  summary?: string;
  intentAction?: string;
  initialDisplayState: InitialDisplayState;
  maxSeverity: SourceSeverity;
  loggingAllowed: boolean;
  refreshOnPageOpenAllowed: boolean;
}

/**
 * A source that is only ever shown with its configured title and summary
 */
export interface StaticSource extends BaseSource {
  type: 'static';
  title: string;
  titleForWork?: string;
  summary?: string;
  intentAction: string;
}

/**
 * A source that only contributes issues and never has an entry
 */
export interface IssueOnlySource extends BaseSource {
  type: 'issue_only';
  packageName: string;
  maxSeverity: SourceSeverity;
  loggingAllowed: boolean;
  refreshOnPageOpenAllowed: boolean;
}

export type SourceDescriptor = DynamicSource | StaticSource | IssueOnlySource;

/**
 * Sources that receive refresh requests and may set data at runtime
 */
export type ExternalSource = DynamicSource | IssueOnlySource;

/**
 * A configured group of sources
 */
export interface SourcesGroup {
  id: string;
  type: GroupType;
  title?: string;
  summary?: string;
  statelessIconType: StatelessIconType;
  sources: SourceDescriptor[];
}

/**
 * The whole source configuration
 */
export interface SafetyConfig {
  groups: SourcesGroup[];
}

export function isExternalSource(source: SourceDescriptor): source is ExternalSource {
  return source.type !== 'static';
}

/**
 * Whether the default entry of a source should not be shown at all
 */
export function isDefaultEntryHidden(source: SourceDescriptor): boolean {
  switch (source.type) {
    case 'dynamic':
      return source.initialDisplayState === 'hidden';
    case 'static':
    case 'issue_only':
      return false;
  }
}

/**
 * Whether the default entry of a source should be shown disabled
 */
export function isDefaultEntryDisabled(source: SourceDescriptor): boolean {
  switch (source.type) {
    case 'dynamic':
      return source.initialDisplayState === 'disabled';
    case 'static':
    case 'issue_only':
      return false;
  }
}
