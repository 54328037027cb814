/**
 * Refresh Coordinator
 *
 * Tracks the one refresh session that may be open at a time: which sources
 * were asked to report, which of them still owe a response, and how the
 * session ended. Emits refresh telemetry as responses and timeouts arrive.
 */

import { v4 as uuidv4 } from 'uuid';
import { IRefreshCoordinator } from '../interfaces/services.js';
import {
  Clock,
  RefreshReason,
  RefreshStatus,
  SourceKey,
  UserProfileGroup,
  systemClock
} from '../types/index.js';
import { encodeSourceKey } from '../utils/ids.js';
import { createLogger } from '../utils/logger.js';
import { TelemetryLogger } from './telemetry-logger.js';

const logger = createLogger('RefreshCoordinator');

interface InFlightSource {
  key: SourceKey;
  startTime: number;
}

interface RefreshSession {
  id: string;
  reason: RefreshReason;
  userProfileGroup: UserProfileGroup;
  startTime: number;
  inFlight: Map<string, InFlightSource>;
  trackedFailureSeen: boolean;
}

export class RefreshCoordinator implements IRefreshCoordinator {
  private session: RefreshSession | undefined;
  private sessionCounter = 0;
  private untrackedSourceIds: Set<string>;

  constructor(
    private telemetry: TelemetryLogger,
    untrackedSourceIds: string[] = [],
    private clock: Clock = systemClock
  ) {
    this.untrackedSourceIds = new Set(untrackedSourceIds);
  }

  // ==================== Session Lifecycle ====================

  /**
   * Opens a new session, discarding any session still open
   */
  startSession(reason: RefreshReason, userProfileGroup: UserProfileGroup): string {
    const now = this.clock();
    const previous = this.session;
    if (previous !== undefined) {
      logger.warn('Refresh superseded before completing', {
        sessionId: previous.id,
        abandonedSources: previous.inFlight.size
      });
      this.telemetry.refreshSuperseded(previous.reason, now - previous.startTime, previous.inFlight.size);
    }

    const id = `${uuidv4()}_${this.sessionCounter++}`;
    this.session = {
      id,
      reason,
      userProfileGroup,
      startTime: now,
      inFlight: new Map(),
      trackedFailureSeen: false
    };
    logger.debug('Refresh started', { sessionId: id, reason });
    return id;
  }

  /**
   * Records the sources a session waits for. Untracked sources are asked to
   * refresh but never awaited.
   */
  markInFlight(sessionId: string, sourceKeys: SourceKey[]): void {
    const session = this.currentSession(sessionId, 'markInFlight');
    if (session === undefined) {
      return;
    }
    const now = this.clock();
    for (const key of sourceKeys) {
      if (this.untrackedSourceIds.has(key.sourceId)) {
        continue;
      }
      session.inFlight.set(encodeSourceKey(key), { key: { ...key }, startTime: now });
    }
  }

  /**
   * Records a response. Returns true on the response that completes the
   * session, which is then cleared.
   *
   * A response to a current session with nothing in flight also completes it,
   * so a session that never called `markInFlight` ends on its first response.
   */
  reportComplete(sessionId: string, sourceKey: SourceKey, success: boolean): boolean {
    const session = this.currentSession(sessionId, 'reportComplete');
    if (session === undefined) {
      return false;
    }

    const now = this.clock();
    const tracked = !this.untrackedSourceIds.has(sourceKey.sourceId);
    const id = encodeSourceKey(sourceKey);
    const inFlight = session.inFlight.get(id);
    if (inFlight !== undefined) {
      session.inFlight.delete(id);
      this.telemetry.sourceRefresh(session.reason, sourceKey, now - inFlight.startTime, success ? 'success' : 'error');
    }
    if (tracked && !success) {
      session.trackedFailureSeen = true;
    }

    if (session.inFlight.size > 0) {
      return false;
    }

    this.telemetry.wholeRefresh(
      session.reason,
      now - session.startTime,
      session.trackedFailureSeen ? 'error' : 'success'
    );
    logger.debug('Refresh complete', { sessionId, failed: session.trackedFailureSeen });
    this.session = undefined;
    return true;
  }

  /**
   * Ends a session that ran out of time. Returns the sources that never
   * responded; a stale or completed session yields none.
   */
  timeout(sessionId: string): SourceKey[] {
    const session = this.session;
    if (session === undefined || session.id !== sessionId) {
      logger.debug('Ignoring timeout of a session that is no longer open', { sessionId });
      return [];
    }

    this.session = undefined;
    if (session.inFlight.size === 0) {
      return [];
    }

    const now = this.clock();
    const timedOut: SourceKey[] = [];
    for (const inFlight of session.inFlight.values()) {
      this.telemetry.sourceRefresh(session.reason, inFlight.key, now - inFlight.startTime, 'timeout');
      timedOut.push(inFlight.key);
    }
    this.telemetry.wholeRefresh(session.reason, now - session.startTime, 'timeout');
    logger.warn('Refresh timed out', { sessionId, timedOut: timedOut.map(encodeSourceKey) });
    return timedOut;
  }

  /**
   * Forgets the sources of a removed user. Returns whether the session was
   * cleared as a result.
   */
  clearForUser(userId: number): boolean {
    const session = this.session;
    if (session === undefined) {
      return false;
    }
    if (session.userProfileGroup.profileParentUserId === userId) {
      this.session = undefined;
      return true;
    }
    for (const [id, inFlight] of session.inFlight) {
      if (inFlight.key.userId === userId) {
        session.inFlight.delete(id);
      }
    }
    if (session.inFlight.size === 0) {
      this.session = undefined;
      return true;
    }
    return false;
  }

  /**
   * Drops the open session, or only the given one
   */
  clear(sessionId?: string): void {
    if (sessionId === undefined || this.session?.id === sessionId) {
      this.session = undefined;
    }
  }

  // ==================== Introspection ====================

  status(): RefreshStatus {
    const session = this.session;
    if (session === undefined || session.inFlight.size === 0) {
      return 'none';
    }
    return session.reason === 'rescan_button' ? 'full_rescan_in_progress' : 'data_fetch_in_progress';
  }

  currentSessionId(): string | undefined {
    return this.session?.id;
  }

  inFlightKeys(): SourceKey[] {
    if (this.session === undefined) {
      return [];
    }
    return Array.from(this.session.inFlight.values()).map(inFlight => ({ ...inFlight.key }));
  }

  private currentSession(sessionId: string, operation: string): RefreshSession | undefined {
    const session = this.session;
    if (session === undefined || session.id !== sessionId) {
      logger.warn(`${operation} with a session id that is no longer current`, {
        sessionId,
        currentSessionId: session?.id
      });
      return undefined;
    }
    return session;
  }
}
