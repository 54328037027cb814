/**
 * Source Report Store for the Safety Status Hub
 * Holds the latest report per source and user, the source error flags and the
 * issue actions currently in flight
 */

import {
  IssueActionKey,
  SourceKey,
  SourceReport
} from '../types/index.js';
import { encodeIssueActionKey, encodeSourceKey } from '../utils/ids.js';

/**
 * Interface for the Source Report Store
 */
export interface ISourceReportStore {
  // Reports
  get(key: SourceKey): SourceReport | undefined;
  set(key: SourceKey, report: SourceReport): boolean;
  clear(key: SourceKey): boolean;
  clearForUser(userId: number): void;
  clearAll(): void;
  keys(): SourceKey[];

  // Errors
  markError(key: SourceKey): boolean;
  hasError(key: SourceKey): boolean;

  // Issue actions in flight
  markActionInFlight(actionKey: IssueActionKey): void;
  isActionInFlight(actionKey: IssueActionKey): boolean;
  clearActionsInFlight(key: SourceKey): boolean;
}

interface StoredReport {
  key: SourceKey;
  report: SourceReport;
}

interface InFlightAction {
  actionKey: IssueActionKey;
}

/**
 * In-memory implementation of the Source Report Store
 */
export class InMemorySourceReportStore implements ISourceReportStore {
  private reports: Map<string, StoredReport> = new Map();
  private errors: Map<string, SourceKey> = new Map();
  private actionsInFlight: Map<string, InFlightAction> = new Map();

  // ==================== Reports ====================

  get(key: SourceKey): SourceReport | undefined {
    return this.reports.get(encodeSourceKey(key))?.report;
  }

  /**
   * Replaces the report wholesale and clears the error flag.
   * Returns whether anything observable changed.
   */
  set(key: SourceKey, report: SourceReport): boolean {
    const id = encodeSourceKey(key);
    const hadError = this.errors.delete(id);
    const previous = this.reports.get(id);
    this.reports.set(id, { key: { ...key }, report });
    if (hadError || previous === undefined) {
      return true;
    }
    // Reports are plain data parsed from the wire, so their serialized forms compare
    return JSON.stringify(previous.report) !== JSON.stringify(report);
  }

  clear(key: SourceKey): boolean {
    const id = encodeSourceKey(key);
    const hadReport = this.reports.delete(id);
    const hadError = this.errors.delete(id);
    this.clearActionsInFlight(key);
    return hadReport || hadError;
  }

  clearForUser(userId: number): void {
    for (const [id, stored] of this.reports) {
      if (stored.key.userId === userId) {
        this.reports.delete(id);
      }
    }
    for (const [id, key] of this.errors) {
      if (key.userId === userId) {
        this.errors.delete(id);
      }
    }
    for (const [id, action] of this.actionsInFlight) {
      if (action.actionKey.issueKey.userId === userId) {
        this.actionsInFlight.delete(id);
      }
    }
  }

  clearAll(): void {
    this.reports.clear();
    this.errors.clear();
    this.actionsInFlight.clear();
  }

  keys(): SourceKey[] {
    return Array.from(this.reports.values()).map(stored => ({ ...stored.key }));
  }

  // ==================== Errors ====================

  /**
   * Drops the report and flags the source as errored.
   * Returns whether this changed the stored state.
   */
  markError(key: SourceKey): boolean {
    const id = encodeSourceKey(key);
    const hadReport = this.reports.delete(id);
    const wasErrored = this.errors.has(id);
    this.errors.set(id, { ...key });
    return hadReport || !wasErrored;
  }

  hasError(key: SourceKey): boolean {
    return this.errors.has(encodeSourceKey(key));
  }

  // ==================== Issue Actions ====================

  markActionInFlight(actionKey: IssueActionKey): void {
    this.actionsInFlight.set(encodeIssueActionKey(actionKey), { actionKey });
  }

  isActionInFlight(actionKey: IssueActionKey): boolean {
    return this.actionsInFlight.has(encodeIssueActionKey(actionKey));
  }

  /**
   * Returns whether any action was in flight
   */
  clearActionsInFlight(key: SourceKey): boolean {
    let cleared = false;
    for (const [id, action] of this.actionsInFlight) {
      const issueKey = action.actionKey.issueKey;
      if (issueKey.sourceId === key.sourceId && issueKey.userId === key.userId) {
        this.actionsInFlight.delete(id);
        cleared = true;
      }
    }
    return cleared;
  }
}
