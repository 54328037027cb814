/**
 * Shared builders and in-process stand-ins for hub tests
 */

import { RefreshRequest, RefreshTransport, TimeoutScheduler } from '../interfaces/index.js';
import { SourceRegistry } from '../services/source-registry.js';
import {
  Clock,
  DynamicSource,
  IssueOnlySource,
  SourceDescriptor,
  SourceIssue,
  SourceSeverity,
  SourceStatus,
  SourcesGroup,
  StaticSource
} from '../types/index.js';

// ==================== Time ====================

export class ManualClock {
  constructor(public now: number = 1_000) {}

  readonly read: Clock = () => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

interface ScheduledTask {
  delayMs: number;
  callback: () => void;
  cancelled: boolean;
}

export class ManualScheduler implements TimeoutScheduler {
  readonly tasks: ScheduledTask[] = [];

  schedule(delayMs: number, callback: () => void): () => void {
    const task: ScheduledTask = { delayMs, callback, cancelled: false };
    this.tasks.push(task);
    return () => {
      task.cancelled = true;
    };
  }

  pending(): ScheduledTask[] {
    return this.tasks.filter(task => !task.cancelled);
  }

  /**
   * Fires every task that has not been cancelled
   */
  fireAll(): void {
    for (const task of this.pending()) {
      task.cancelled = true;
      task.callback();
    }
  }
}

export class RecordingTransport implements RefreshTransport {
  readonly requests: RefreshRequest[] = [];

  sendRefreshRequest(request: RefreshRequest): void {
    this.requests.push(request);
  }
}

// ==================== Configuration ====================

export function dynamicSource(id: string, overrides: Partial<DynamicSource> = {}): DynamicSource {
  return {
    type: 'dynamic',
    id,
    packageName: `pkg.${id}`,
    title: `${id} title`,
    summary: `${id} summary`,
    intentAction: `action.${id}`,
    profile: 'primary',
    supportsManagedProfiles: false,
    initialDisplayState: 'enabled',
    maxSeverity: 'critical_warning',
    loggingAllowed: true,
    refreshOnPageOpenAllowed: false,
    ...overrides
  };
}

export function staticSource(id: string, overrides: Partial<StaticSource> = {}): StaticSource {
  return {
    type: 'static',
    id,
    title: `${id} title`,
    summary: `${id} summary`,
    intentAction: `action.${id}`,
    profile: 'primary',
    supportsManagedProfiles: false,
    ...overrides
  };
}

export function issueOnlySource(id: string, overrides: Partial<IssueOnlySource> = {}): IssueOnlySource {
  return {
    type: 'issue_only',
    id,
    packageName: `pkg.${id}`,
    profile: 'primary',
    supportsManagedProfiles: false,
    maxSeverity: 'critical_warning',
    loggingAllowed: true,
    refreshOnPageOpenAllowed: false,
    ...overrides
  };
}

export function group(
  id: string,
  type: SourcesGroup['type'],
  sources: SourceDescriptor[],
  overrides: Partial<SourcesGroup> = {}
): SourcesGroup {
  return {
    id,
    type,
    title: `${id} group`,
    summary: `${id} group summary`,
    statelessIconType: 'none',
    sources,
    ...overrides
  };
}

export function registryOf(...groups: SourcesGroup[]): SourceRegistry {
  return new SourceRegistry({ groups });
}

// ==================== Reports ====================

export function status(severity: SourceSeverity, overrides: Partial<SourceStatus> = {}): SourceStatus {
  return {
    title: 'Status title',
    summary: 'Status summary',
    severity,
    enabled: true,
    ...overrides
  };
}

export function sourceIssue(id: string, severity: SourceSeverity, overrides: Partial<SourceIssue> = {}): SourceIssue {
  return {
    id,
    typeId: `${id}-type`,
    severity,
    category: 'general',
    title: `${id} title`,
    summary: `${id} summary`,
    actions: [],
    ...overrides
  };
}
