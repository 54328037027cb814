/**
 * Unit tests for the Safety Hub Orchestrator
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TransportMessage } from '../../../interfaces/index.js';
import { SafetyHubOrchestrator } from '../../../orchestrator/safety-hub-orchestrator.js';
import { CriticalSection, HubSettings, InMemoryTelemetrySink } from '../../../services/index.js';
import {
  AggregatedView,
  EntryGroup,
  EntryOrGroup,
  FeatureDisabledError,
  IssueNotFoundError,
  SourceDataValidationError,
  UnknownSourceError,
  createUserProfileGroup
} from '../../../types/index.js';
import {
  ManualClock,
  ManualScheduler,
  RecordingTransport,
  dynamicSource,
  group,
  issueOnlySource,
  registryOf
} from '../../fixtures.js';

const registry = registryOf(
  group('device', 'collapsible', [dynamicSource('lock', { refreshOnPageOpenAllowed: true }), dynamicSource('updates')]),
  group('accounts', 'collapsible', [
    dynamicSource('account', { profile: 'all', supportsManagedProfiles: true, titleForWork: 'Work account' })
  ]),
  group('background', 'hidden', [issueOnlySource('leaks', { loggingAllowed: false })])
);

const userGroup = createUserProfileGroup(0, [{ userId: 10, running: true }]);

const okStatus = { status: { title: 'On', summary: 'Fine', severity: 'information' } };

const leakIssue = {
  id: 'l1',
  typeId: 'leak',
  severity: 'recommendation',
  title: 'Leaked password',
  summary: 'Change it',
  actions: [{ id: 'fix', label: 'Fix', resolving: true }]
};

function payloadFor(sourceId: string): unknown {
  return sourceId === 'leaks' ? { issues: [] } : okStatus;
}

function asGroup(value: EntryOrGroup | undefined): EntryGroup {
  if (value === undefined || value.kind !== 'group') {
    throw new Error('expected an entry group');
  }
  return value;
}

describe('SafetyHubOrchestrator', () => {
  let clock: ManualClock;
  let scheduler: ManualScheduler;
  let transport: RecordingTransport;
  let sink: InMemoryTelemetrySink;
  let failures: Array<{ error: unknown; message: TransportMessage }>;
  let hub: SafetyHubOrchestrator;

  function createHub(settings: Partial<HubSettings> = {}): SafetyHubOrchestrator {
    return new SafetyHubOrchestrator({
      registry,
      criticalSection: new CriticalSection(),
      transport,
      scheduler,
      telemetrySink: sink,
      clock: clock.read,
      settings: { enabled: true, telemetryEnabled: true, untrackedSourceIds: [], verboseLogging: false, ...settings },
      onError: (error, message) => failures.push({ error, message })
    });
  }

  beforeEach(() => {
    clock = new ManualClock();
    scheduler = new ManualScheduler();
    transport = new RecordingTransport();
    sink = new InMemoryTelemetrySink();
    failures = [];
    hub = createHub();
  });

  describe('refreshSources', () => {
    it('should ask every external source for every running user', () => {
      const sessionId = hub.refreshSources('rescan_button', userGroup);

      expect(transport.requests.map(request => `${request.sourceId}@${request.userId}`)).toEqual([
        'lock@0',
        'updates@0',
        'account@0',
        'account@10',
        'leaks@0'
      ]);
      expect(transport.requests[0]).toEqual({
        sessionId,
        reason: 'rescan_button',
        requestType: 'fetch_fresh_data',
        sourceId: 'lock',
        packageName: 'pkg.lock',
        userId: 0
      });
      expect(hub.getRefreshStatus()).toBe('full_rescan_in_progress');
      expect(scheduler.pending().map(task => task.delayMs)).toEqual([60_000]);
    });

    it('should only ask sources without data on page open unless they allow it', () => {
      hub.setSourceData({ sourceId: 'lock', userId: 0 }, okStatus);
      hub.setSourceData({ sourceId: 'updates', userId: 0 }, okStatus);

      hub.refreshSources('page_open', userGroup);

      expect(transport.requests.map(request => `${request.sourceId}@${request.userId}`)).toEqual([
        'lock@0',
        'account@0',
        'account@10',
        'leaks@0'
      ]);
      expect(transport.requests[0].requestType).toBe('get_data');
      expect(hub.getRefreshStatus()).toBe('data_fetch_in_progress');
      expect(scheduler.pending().map(task => task.delayMs)).toEqual([15_000]);
    });

    it('should not wait for untracked sources', () => {
      hub = createHub({ untrackedSourceIds: ['lock', 'updates', 'account', 'leaks'] });

      hub.refreshSources('other', userGroup);

      expect(transport.requests).toHaveLength(5);
      expect(hub.getRefreshStatus()).toBe('none');
      expect(scheduler.tasks).toEqual([]);
    });

    it('should end the session once every source has answered', () => {
      const sessionId = hub.refreshSources('device_reboot', userGroup);
      clock.advance(400);

      for (const request of transport.requests) {
        hub.receive({
          type: 'source_data',
          sourceKey: { sourceId: request.sourceId, userId: request.userId },
          payload: payloadFor(request.sourceId),
          sessionId
        });
      }

      expect(hub.getRefreshStatus()).toBe('none');
      expect(scheduler.pending()).toEqual([]);
      expect(sink.ofKind('source_refresh').map(event => event.result)).toEqual([
        'success',
        'success',
        'success',
        'success',
        'success'
      ]);
      expect(sink.ofKind('whole_refresh')).toEqual([
        { kind: 'whole_refresh', requestType: 'fetch_fresh_data', durationMs: 400, result: 'success' }
      ]);
      expect(failures).toEqual([]);
    });

    it('should report the whole refresh as failed when a source errors', () => {
      const sessionId = hub.refreshSources('other', userGroup);

      for (const request of transport.requests) {
        const sourceKey = { sourceId: request.sourceId, userId: request.userId };
        if (request.sourceId === 'updates') {
          hub.receive({ type: 'source_error', sourceKey, sessionId });
        } else {
          hub.receive({ type: 'source_data', sourceKey, payload: payloadFor(request.sourceId), sessionId });
        }
      }

      expect(sink.ofKind('whole_refresh').map(event => event.result)).toEqual(['error']);
      const device = asGroup(hub.getView(userGroup).entries[0]);
      expect(device.entries[1].summary).toBe("Couldn't check setting");
    });

    it('should mark sources without data as failed when the refresh times out', () => {
      const sessionId = hub.refreshSources('rescan_button', userGroup);
      hub.receive({ type: 'source_data', sourceKey: { sourceId: 'lock', userId: 0 }, payload: okStatus, sessionId });
      clock.advance(60_000);

      scheduler.fireAll();

      expect(hub.getRefreshStatus()).toBe('none');
      expect(sink.ofKind('source_refresh').map(event => `${event.sourceId}@${event.userId}:${event.result}`)).toEqual([
        'lock@0:success',
        'updates@0:timeout',
        'account@0:timeout',
        'account@10:timeout',
        'leaks@0:timeout'
      ]);
      expect(sink.ofKind('whole_refresh')).toEqual([
        { kind: 'whole_refresh', requestType: 'fetch_fresh_data', durationMs: 60_000, result: 'timeout' }
      ]);

      const view = hub.getView(userGroup);
      const device = asGroup(view.entries[0]);
      expect(device.severity).toBe('unknown');
      expect(device.summary).toBe("Couldn't check setting");
      expect(asGroup(view.entries[1]).summary).toBe("Couldn't check 2 settings");
      expect(view.overallSeverity).toBe('unknown');
    });

    it('should store late data without closing the session twice', () => {
      const sessionId = hub.refreshSources('rescan_button', userGroup);
      scheduler.fireAll();
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      hub.receive({ type: 'source_data', sourceKey: { sourceId: 'updates', userId: 0 }, payload: okStatus, sessionId });

      expect(sink.ofKind('whole_refresh')).toHaveLength(1);
      expect(asGroup(hub.getView(userGroup).entries[0]).entries[1].severity).toBe('ok');
      warn.mockRestore();
    });

    it('should replace an open session and cancel its timeout', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const first = hub.refreshSources('rescan_button', userGroup);
      const second = hub.refreshSources('other', userGroup);

      expect(second).not.toBe(first);
      expect(scheduler.tasks.map(task => task.cancelled)).toEqual([true, false]);
      expect(sink.ofKind('refresh_superseded')).toEqual([
        { kind: 'refresh_superseded', requestType: 'fetch_fresh_data', durationMs: 0, abandonedSourceCount: 5 }
      ]);
      warn.mockRestore();
    });
  });

  describe('source data', () => {
    it('should reject data from an unknown source', () => {
      expect(() => hub.setSourceData({ sourceId: 'missing', userId: 0 }, okStatus)).toThrow(UnknownSourceError);
    });

    it('should reject data for a managed profile the source does not support', () => {
      hub.subscribe(userGroup, () => undefined);

      expect(() => hub.setSourceData({ sourceId: 'lock', userId: 10 }, okStatus)).toThrow(SourceDataValidationError);
      expect(hub.setSourceData({ sourceId: 'account', userId: 10 }, okStatus)).toBe(true);
    });

    it('should report invalid data posted to the inbox and keep the previous report', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      hub.setSourceData({ sourceId: 'leaks', userId: 0 }, { issues: [leakIssue] });

      hub.receive({ type: 'source_data', sourceKey: { sourceId: 'leaks', userId: 0 }, payload: okStatus });

      expect(failures).toHaveLength(1);
      expect(failures[0].error).toBeInstanceOf(SourceDataValidationError);
      expect(hub.getView(userGroup).issues.map(issue => issue.id)).toEqual(['leaks/l1@0']);
      errorSpy.mockRestore();
    });

    it('should only notify listeners when something changed', () => {
      const views: AggregatedView[] = [];
      const unsubscribe = hub.subscribe(userGroup, view => views.push(view));

      expect(hub.setSourceData({ sourceId: 'lock', userId: 0 }, okStatus)).toBe(true);
      expect(hub.setSourceData({ sourceId: 'lock', userId: 0 }, okStatus)).toBe(false);
      expect(views).toHaveLength(1);

      unsubscribe();
      hub.setSourceData({ sourceId: 'updates', userId: 0 }, okStatus);
      expect(views).toHaveLength(1);
    });

    it('should keep notifying other listeners when one throws', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      let calls = 0;
      hub.subscribe(userGroup, () => {
        throw new Error('listener failed');
      });
      hub.subscribe(userGroup, () => {
        calls++;
      });

      hub.setSourceData({ sourceId: 'lock', userId: 0 }, okStatus);

      expect(calls).toBe(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      errorSpy.mockRestore();
    });
  });

  describe('issues', () => {
    const issueKey = { sourceId: 'leaks', issueId: 'l1', userId: 0 };

    beforeEach(() => {
      hub.setSourceData({ sourceId: 'leaks', userId: 0 }, { issues: [leakIssue] });
    });

    it('should hide a dismissed issue', () => {
      hub.dismissIssue(issueKey);
      expect(hub.getView(userGroup).issues).toEqual([]);
    });

    it('should reject dismissing an issue that is not reported', () => {
      expect(() => hub.dismissIssue({ ...issueKey, issueId: 'gone' })).toThrow(IssueNotFoundError);
    });

    it('should run an issue action once until the source reports again', () => {
      expect(hub.executeIssueAction(issueKey, 'fix')).toEqual({ id: 'fix', label: 'Fix', resolving: true });
      expect(hub.getView(userGroup).issues[0].actions[0].inFlight).toBe(true);
      expect(hub.executeIssueAction(issueKey, 'fix')).toBeUndefined();

      hub.setSourceData({ sourceId: 'leaks', userId: 0 }, { issues: [leakIssue] });
      expect(hub.getView(userGroup).issues[0].actions[0].inFlight).toBe(false);
    });

    it('should reject an unknown action', () => {
      expect(() => hub.executeIssueAction(issueKey, 'missing')).toThrow('No action missing on issue leaks/l1@0');
    });

    it('should keep dismissals across an export and import', () => {
      hub.dismissIssue(issueKey);
      const records = hub.exportIssueRecords();

      const restored = createHub();
      restored.importIssueRecords(records);
      restored.setSourceData({ sourceId: 'leaks', userId: 0 }, { issues: [leakIssue] });

      expect(restored.getView(userGroup).issues).toEqual([]);
    });
  });

  describe('clearing', () => {
    it('should drop the data of a removed user', () => {
      hub.subscribe(userGroup, () => undefined);
      hub.setSourceData({ sourceId: 'account', userId: 10 }, okStatus);
      expect(asGroup(hub.getView(userGroup).entries[1]).entries[1].severity).toBe('ok');

      hub.receive({ type: 'user_removed', userId: 10 });

      const entry = asGroup(hub.getView(userGroup).entries[1]).entries[1];
      expect(entry.severity).toBe('unknown');
      expect(entry.summary).toBe('account summary');
    });

    it('should drop everything and close the open session', () => {
      hub.setSourceData({ sourceId: 'leaks', userId: 0 }, { issues: [leakIssue] });
      hub.refreshSources('rescan_button', userGroup);

      hub.clearAllData();

      expect(hub.getRefreshStatus()).toBe('none');
      expect(scheduler.pending()).toEqual([]);
      expect(hub.getView(userGroup).issues).toEqual([]);
      expect(hub.exportIssueRecords()).toEqual([]);
    });
  });

  describe('pullSafetyState', () => {
    it('should snapshot the state and every loggable source', () => {
      hub.setSourceData(
        { sourceId: 'account', userId: 0 },
        {
          status: { title: 'Account', summary: 'Check it', severity: 'critical_warning' },
          issues: [
            { ...leakIssue, id: 'a1', severity: 'critical_warning', actions: [] },
            { ...leakIssue, id: 'a2', severity: 'recommendation', actions: [] }
          ]
        }
      );
      hub.setSourceData({ sourceId: 'leaks', userId: 0 }, { issues: [leakIssue] });
      hub.dismissIssue({ sourceId: 'account', issueId: 'a2', userId: 0 });
      sink.clear();

      const [snapshot] = hub.pullSafetyState([userGroup]);

      expect(snapshot.state).toEqual({
        kind: 'safety_state',
        overallSeverity: 'critical_warning',
        openIssueCount: 2,
        dismissedIssueCount: 1
      });
      expect(snapshot.sources.map(source => [
        source.sourceId,
        source.isUserManaged,
        source.maxSeverity,
        source.openIssueCount,
        source.dismissedIssueCount
      ])).toEqual([
        ['lock', false, undefined, 0, 0],
        ['updates', false, undefined, 0, 0],
        ['account', false, 'critical_warning', 1, 1],
        ['account', true, undefined, 0, 0]
      ]);
      expect(sink.events).toHaveLength(5);
    });
  });

  describe('when disabled', () => {
    beforeEach(() => {
      hub = createHub({ enabled: false });
    });

    it('should reject changes and serve the default view', () => {
      expect(hub.isEnabled()).toBe(false);
      expect(() => hub.refreshSources('other', userGroup)).toThrow(FeatureDisabledError);
      expect(() => hub.setSourceData({ sourceId: 'lock', userId: 0 }, okStatus)).toThrow(FeatureDisabledError);
      expect(hub.getView(userGroup).entries).toEqual([]);
      expect(hub.pullSafetyState([userGroup])).toEqual([]);
    });

    it('should still allow clearing', () => {
      expect(() => hub.clearAllData()).not.toThrow();
      expect(() => hub.clearForUser(10)).not.toThrow();
    });

    it('should report transport data as rejected', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      hub.receive({ type: 'source_data', sourceKey: { sourceId: 'lock', userId: 0 }, payload: okStatus });

      expect(failures.map(failure => failure.error instanceof FeatureDisabledError)).toEqual([true]);
      errorSpy.mockRestore();
    });
  });
});
