/**
 * Issue Dismissal Cache
 *
 * Keeps one record per issue the hub has seen. A dismissed issue stays hidden
 * until it is reported at a higher severity than the one it was dismissed at.
 */

import { IIssueDismissalCache } from '../interfaces/services.js';
import {
  Clock,
  ConfigValidationError,
  DismissalRecord,
  IssueKey,
  PersistedIssueRecord,
  SourceKey,
  SourceSeverity,
  UserProfileGroup,
  getAllUserIds,
  systemClock
} from '../types/index.js';
import { decodeIssueKey, encodeIssueKey } from '../utils/ids.js';
import { createLogger } from '../utils/logger.js';
import { compareSourceSeverity } from '../utils/severity.js';

const logger = createLogger('IssueDismissalCache');

/**
 * Severity recorded for a persisted dismissal that carries none
 */
const FALLBACK_DISMISSED_SEVERITY: SourceSeverity = 'critical_warning';

function copyRecord(record: DismissalRecord): DismissalRecord {
  const copy: DismissalRecord = {
    ...record,
    issueKey: { ...record.issueKey },
    firstSeenAt: new Date(record.firstSeenAt.getTime())
  };
  if (record.dismissedAt !== undefined) {
    copy.dismissedAt = new Date(record.dismissedAt.getTime());
  }
  return copy;
}

export class IssueDismissalCache implements IIssueDismissalCache {
  private records: Map<string, DismissalRecord> = new Map();
  private dirty = false;

  constructor(private clock: Clock = systemClock) {}

  // ==================== Dismissal ====================

  /**
   * Records a dismissal. While the issue is still dismissed the recorded
   * severity is kept; once it has resurfaced the current severity replaces it.
   */
  dismiss(issueKey: IssueKey, currentSeverity: SourceSeverity): void {
    const id = encodeIssueKey(issueKey);
    const now = new Date(this.clock());
    const existing = this.records.get(id);

    if (existing === undefined) {
      this.records.set(id, {
        issueKey: { ...issueKey },
        firstSeenAt: now,
        dismissedSeverity: currentSeverity,
        dismissedAt: now,
        dismissCount: 1
      });
    } else {
      const stillDismissed = this.isDismissed(issueKey, currentSeverity);
      this.records.set(id, {
        ...existing,
        dismissedSeverity: stillDismissed ? existing.dismissedSeverity : currentSeverity,
        dismissedAt: now,
        dismissCount: existing.dismissCount + 1
      });
    }

    this.dirty = true;
    logger.debug('Issue dismissed', { issue: id, severity: currentSeverity });
  }

  isDismissed(issueKey: IssueKey, currentSeverity: SourceSeverity): boolean {
    const record = this.records.get(encodeIssueKey(issueKey));
    if (record === undefined || record.dismissCount === 0 || record.dismissedSeverity === undefined) {
      return false;
    }
    return compareSourceSeverity(record.dismissedSeverity, currentSeverity) >= 0;
  }

  getRecord(issueKey: IssueKey): DismissalRecord | undefined {
    const record = this.records.get(encodeIssueKey(issueKey));
    return record === undefined ? undefined : copyRecord(record);
  }

  /**
   * Number of issue records held for the users of the group, dismissed or not
   */
  countActive(userProfileGroup: UserProfileGroup): number {
    const userIds = new Set(getAllUserIds(userProfileGroup));
    let count = 0;
    for (const record of this.records.values()) {
      if (userIds.has(record.issueKey.userId)) {
        count++;
      }
    }
    return count;
  }

  // ==================== Tracking ====================

  /**
   * Starts tracking newly reported issues of a source and forgets the ones
   * it no longer reports
   */
  syncActiveIssues(sourceKey: SourceKey, issueIds: string[]): void {
    const reported = new Set(issueIds);

    for (const [id, record] of this.records) {
      const key = record.issueKey;
      if (key.sourceId === sourceKey.sourceId && key.userId === sourceKey.userId && !reported.has(key.issueId)) {
        this.records.delete(id);
        this.dirty = true;
      }
    }

    for (const issueId of reported) {
      const key: IssueKey = { sourceId: sourceKey.sourceId, issueId, userId: sourceKey.userId };
      const id = encodeIssueKey(key);
      if (!this.records.has(id)) {
        this.records.set(id, { issueKey: key, firstSeenAt: new Date(this.clock()), dismissCount: 0 });
        this.dirty = true;
      }
    }
  }

  clearForUser(userId: number): void {
    for (const [id, record] of this.records) {
      if (record.issueKey.userId === userId) {
        this.records.delete(id);
        this.dirty = true;
      }
    }
  }

  clear(): void {
    if (this.records.size > 0) {
      this.dirty = true;
    }
    this.records.clear();
  }

  // ==================== Persistence ====================

  toPersistedRecords(): PersistedIssueRecord[] {
    return Array.from(this.records.entries()).map(([key, record]) => ({
      key,
      firstSeenAt: record.firstSeenAt,
      dismissedAt: record.dismissedAt,
      dismissCount: record.dismissCount,
      dismissedSeverity: record.dismissedSeverity
    }));
  }

  /**
   * Replaces every record with the persisted ones. Nothing is loaded when any
   * record is invalid.
   */
  loadPersistedRecords(records: PersistedIssueRecord[]): void {
    const loaded: Map<string, DismissalRecord> = new Map();
    const violations: string[] = [];

    for (const persisted of records) {
      const issueKey = decodeIssueKey(persisted.key);
      if (issueKey === undefined) {
        violations.push(`${persisted.key}: malformed issue key`);
        continue;
      }
      if (!Number.isInteger(persisted.dismissCount) || persisted.dismissCount < 0) {
        violations.push(`${persisted.key}: dismissCount must be a non-negative integer`);
        continue;
      }
      if ((persisted.dismissCount > 0) !== (persisted.dismissedAt !== undefined)) {
        violations.push(`${persisted.key}: dismissedAt must be set exactly when dismissCount is positive`);
        continue;
      }

      let dismissedSeverity = persisted.dismissedSeverity;
      if (persisted.dismissCount > 0 && dismissedSeverity === undefined) {
        logger.warn('Dismissed issue has no recorded severity', { issue: persisted.key });
        dismissedSeverity = FALLBACK_DISMISSED_SEVERITY;
      }

      loaded.set(encodeIssueKey(issueKey), {
        issueKey,
        firstSeenAt: persisted.firstSeenAt,
        dismissedSeverity,
        dismissedAt: persisted.dismissedAt,
        dismissCount: persisted.dismissCount
      });
    }

    if (violations.length > 0) {
      throw new ConfigValidationError('Invalid persisted issue records', violations);
    }

    this.records = loaded;
    this.dirty = false;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  markPersisted(): void {
    this.dirty = false;
  }
}
