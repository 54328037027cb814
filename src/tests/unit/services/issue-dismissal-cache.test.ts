/**
 * Unit tests for the Issue Dismissal Cache
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { IssueDismissalCache } from '../../../services/issue-dismissal-cache.js';
import { ConfigValidationError, createUserProfileGroup } from '../../../types/index.js';
import { ManualClock } from '../../fixtures.js';

describe('IssueDismissalCache', () => {
  let clock: ManualClock;
  let cache: IssueDismissalCache;
  const issueKey = { sourceId: 'screen_lock', issueId: 'no_lock', userId: 0 };

  beforeEach(() => {
    clock = new ManualClock(5_000);
    cache = new IssueDismissalCache(clock.read);
  });

  describe('dismiss', () => {
    it('should create a record on first dismissal', () => {
      cache.dismiss(issueKey, 'recommendation');
      expect(cache.getRecord(issueKey)).toEqual({
        issueKey,
        firstSeenAt: new Date(5_000),
        dismissedSeverity: 'recommendation',
        dismissedAt: new Date(5_000),
        dismissCount: 1
      });
    });

    it('should hand out copies of its records', () => {
      cache.dismiss(issueKey, 'recommendation');
      const record = cache.getRecord(issueKey);
      if (record === undefined) {
        throw new Error('expected a record');
      }
      record.dismissCount = 0;
      record.dismissedAt = undefined;
      record.issueKey.userId = 10;

      expect(cache.getRecord(issueKey)).toEqual({
        issueKey: { sourceId: 'screen_lock', issueId: 'no_lock', userId: 0 },
        firstSeenAt: new Date(5_000),
        dismissedSeverity: 'recommendation',
        dismissedAt: new Date(5_000),
        dismissCount: 1
      });
      expect(cache.isDismissed(issueKey, 'recommendation')).toBe(true);
    });

    it('should suppress the issue at or below the dismissed severity', () => {
      cache.dismiss(issueKey, 'critical_warning');
      expect(cache.isDismissed(issueKey, 'critical_warning')).toBe(true);
      expect(cache.isDismissed(issueKey, 'recommendation')).toBe(true);
    });

    it('should resurface the issue above the dismissed severity', () => {
      cache.dismiss(issueKey, 'recommendation');
      expect(cache.isDismissed(issueKey, 'critical_warning')).toBe(false);
    });

    it('should keep the recorded severity when dismissed again while suppressed', () => {
      cache.dismiss(issueKey, 'critical_warning');
      clock.advance(100);
      cache.dismiss(issueKey, 'recommendation');
      const record = cache.getRecord(issueKey);
      expect(record?.dismissedSeverity).toBe('critical_warning');
      expect(record?.dismissCount).toBe(2);
      expect(record?.dismissedAt).toEqual(new Date(5_100));
    });

    it('should record the new severity when dismissed again after resurfacing', () => {
      cache.dismiss(issueKey, 'recommendation');
      cache.dismiss(issueKey, 'critical_warning');
      expect(cache.getRecord(issueKey)?.dismissedSeverity).toBe('critical_warning');
      expect(cache.isDismissed(issueKey, 'critical_warning')).toBe(true);
    });

    it('should not treat an unknown issue as dismissed', () => {
      expect(cache.isDismissed(issueKey, 'unspecified')).toBe(false);
    });
  });

  describe('syncActiveIssues', () => {
    const key = { sourceId: 'screen_lock', userId: 0 };

    it('should start tracking new issues without dismissing them', () => {
      cache.syncActiveIssues(key, ['no_lock']);
      expect(cache.getRecord(issueKey)).toEqual({ issueKey, firstSeenAt: new Date(5_000), dismissCount: 0 });
      expect(cache.isDismissed(issueKey, 'unspecified')).toBe(false);
    });

    it('should keep the first seen time of known issues', () => {
      cache.syncActiveIssues(key, ['no_lock']);
      clock.advance(1_000);
      cache.syncActiveIssues(key, ['no_lock']);
      expect(cache.getRecord(issueKey)?.firstSeenAt).toEqual(new Date(5_000));
    });

    it('should forget issues the source no longer reports', () => {
      cache.dismiss(issueKey, 'critical_warning');
      cache.syncActiveIssues(key, []);
      expect(cache.getRecord(issueKey)).toBeUndefined();
    });

    it('should leave other users alone', () => {
      const otherUser = { ...issueKey, userId: 10 };
      cache.dismiss(otherUser, 'critical_warning');
      cache.syncActiveIssues(key, []);
      expect(cache.isDismissed(otherUser, 'critical_warning')).toBe(true);
    });
  });

  describe('countActive', () => {
    it('should count records of every user of the group', () => {
      cache.syncActiveIssues({ sourceId: 'a', userId: 0 }, ['one', 'two']);
      cache.syncActiveIssues({ sourceId: 'a', userId: 10 }, ['three']);
      cache.syncActiveIssues({ sourceId: 'a', userId: 11 }, ['four']);
      const userProfileGroup = createUserProfileGroup(0, [{ userId: 10, running: false }]);
      expect(cache.countActive(userProfileGroup)).toBe(3);
    });
  });

  describe('clearing', () => {
    it('should clear records of one user', () => {
      cache.dismiss(issueKey, 'critical_warning');
      cache.dismiss({ ...issueKey, userId: 10 }, 'critical_warning');
      cache.clearForUser(0);
      expect(cache.getRecord(issueKey)).toBeUndefined();
      expect(cache.getRecord({ ...issueKey, userId: 10 })).toBeDefined();
    });

    it('should clear all records', () => {
      cache.dismiss(issueKey, 'critical_warning');
      cache.clear();
      expect(cache.toPersistedRecords()).toEqual([]);
    });
  });

  describe('persistence', () => {
    it('should export records under their encoded keys', () => {
      cache.dismiss(issueKey, 'recommendation');
      expect(cache.toPersistedRecords()).toEqual([
        {
          key: 'screen_lock/no_lock@0',
          firstSeenAt: new Date(5_000),
          dismissedAt: new Date(5_000),
          dismissCount: 1,
          dismissedSeverity: 'recommendation'
        }
      ]);
    });

    it('should load exported records into a fresh cache', () => {
      cache.dismiss(issueKey, 'recommendation');
      const restored = new IssueDismissalCache(clock.read);
      restored.loadPersistedRecords(cache.toPersistedRecords());
      expect(restored.isDismissed(issueKey, 'recommendation')).toBe(true);
      expect(restored.isDismissed(issueKey, 'critical_warning')).toBe(false);
      expect(restored.isDirty()).toBe(false);
    });

    it('should treat a dismissal without severity as dismissed at any severity', () => {
      cache.loadPersistedRecords([
        { key: 'screen_lock/no_lock@0', firstSeenAt: new Date(1), dismissedAt: new Date(2), dismissCount: 1 }
      ]);
      expect(cache.isDismissed(issueKey, 'critical_warning')).toBe(true);
    });

    it('should reject a negative dismiss count', () => {
      expect(() =>
        cache.loadPersistedRecords([{ key: 'screen_lock/no_lock@0', firstSeenAt: new Date(1), dismissCount: -1 }])
      ).toThrow(ConfigValidationError);
    });

    it('should reject a dismissal time without a dismissal', () => {
      expect(() =>
        cache.loadPersistedRecords([
          { key: 'screen_lock/no_lock@0', firstSeenAt: new Date(1), dismissedAt: new Date(2), dismissCount: 0 }
        ])
      ).toThrow(ConfigValidationError);
    });

    it('should reject a dismissal without a dismissal time', () => {
      expect(() =>
        cache.loadPersistedRecords([{ key: 'screen_lock/no_lock@0', firstSeenAt: new Date(1), dismissCount: 2 }])
      ).toThrow(ConfigValidationError);
    });

    it('should keep the current records when loading fails', () => {
      cache.dismiss(issueKey, 'critical_warning');
      expect(() =>
        cache.loadPersistedRecords([{ key: 'malformed', firstSeenAt: new Date(1), dismissCount: 0 }])
      ).toThrow(ConfigValidationError);
      expect(cache.isDismissed(issueKey, 'critical_warning')).toBe(true);
    });

    it('should track whether records changed since the last save', () => {
      expect(cache.isDirty()).toBe(false);
      cache.dismiss(issueKey, 'critical_warning');
      expect(cache.isDirty()).toBe(true);
      cache.markPersisted();
      expect(cache.isDirty()).toBe(false);
    });
  });
});
