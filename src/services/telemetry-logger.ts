/**
 * Telemetry Logger
 *
 * Builds telemetry events and hands them to a sink. Nothing is emitted while
 * telemetry is disabled.
 */

import { TelemetrySink } from '../interfaces/services.js';
import {
  OverallSeverity,
  RefreshReason,
  SafetyStateEvent,
  SourceKey,
  SourceSeverity,
  SourceStateCollectedEvent,
  SystemEventResult,
  TelemetryEvent,
  toRefreshRequestType
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';

// ==================== Sinks ====================

/**
 * Keeps every event in memory
 */
export class InMemoryTelemetrySink implements TelemetrySink {
  readonly events: TelemetryEvent[] = [];

  emit(event: TelemetryEvent): void {
    this.events.push(event);
  }

  ofKind<K extends TelemetryEvent['kind']>(kind: K): Extract<TelemetryEvent, { kind: K }>[] {
    return this.events.filter((event): event is Extract<TelemetryEvent, { kind: K }> => event.kind === kind);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Writes every event as an info line
 */
export class ConsoleTelemetrySink implements TelemetrySink {
  private logger = createLogger('Telemetry');

  emit(event: TelemetryEvent): void {
    const { kind, ...fields } = event;
    this.logger.info(kind, fields);
  }
}

// ==================== Logger ====================

export class TelemetryLogger {
  constructor(
    private sink: TelemetrySink,
    private enabled: boolean = true
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  sourceRefresh(reason: RefreshReason, key: SourceKey, durationMs: number, result: SystemEventResult): void {
    this.emit({
      kind: 'source_refresh',
      requestType: toRefreshRequestType(reason),
      sourceId: key.sourceId,
      userId: key.userId,
      durationMs,
      result
    });
  }

  wholeRefresh(reason: RefreshReason, durationMs: number, result: SystemEventResult): void {
    this.emit({
      kind: 'whole_refresh',
      requestType: toRefreshRequestType(reason),
      durationMs,
      result
    });
  }

  refreshSuperseded(reason: RefreshReason, durationMs: number, abandonedSourceCount: number): void {
    this.emit({
      kind: 'refresh_superseded',
      requestType: toRefreshRequestType(reason),
      durationMs,
      abandonedSourceCount
    });
  }

  safetyState(overallSeverity: OverallSeverity, openIssueCount: number, dismissedIssueCount: number): SafetyStateEvent {
    const event: SafetyStateEvent = { kind: 'safety_state', overallSeverity, openIssueCount, dismissedIssueCount };
    this.emit(event);
    return event;
  }

  sourceStateCollected(
    sourceId: string,
    isUserManaged: boolean,
    maxSeverity: SourceSeverity | undefined,
    openIssueCount: number,
    dismissedIssueCount: number
  ): SourceStateCollectedEvent {
    const event: SourceStateCollectedEvent = {
      kind: 'source_state_collected',
      sourceId,
      isUserManaged,
      maxSeverity,
      openIssueCount,
      dismissedIssueCount
    };
    this.emit(event);
    return event;
  }

  private emit(event: TelemetryEvent): void {
    if (this.enabled) {
      this.sink.emit(event);
    }
  }
}
