/**
 * Severity scales, conversions between them and merge rules.
 *
 * `unknown` is not ordinal: it marks missing or errored data and has its own
 * merge rules, so it is never compared by rank.
 */

import {
  EntrySeverity,
  IssueSeverity,
  OverallSeverity,
  SourceSeverity
} from '../types/index.js';
import { createLogger } from './logger.js';

const logger = createLogger('Severity');

const SOURCE_SEVERITY_RANK: Record<SourceSeverity, number> = {
  unspecified: 0,
  information: 1,
  recommendation: 2,
  critical_warning: 3
};

const ISSUE_SEVERITY_RANK: Record<IssueSeverity, number> = {
  ok: 1,
  recommendation: 2,
  critical_warning: 3
};

const KNOWN_ENTRY_SEVERITY_RANK: Record<Exclude<EntrySeverity, 'unknown'>, number> = {
  unspecified: 0,
  ok: 1,
  recommendation: 2,
  critical_warning: 3
};

const KNOWN_OVERALL_SEVERITY_RANK: Record<Exclude<OverallSeverity, 'unknown'>, number> = {
  ok: 1,
  recommendation: 2,
  critical_warning: 3
};

export const SOURCE_SEVERITIES: readonly SourceSeverity[] = [
  'unspecified',
  'information',
  'recommendation',
  'critical_warning'
];

export function issueSeverityRank(severity: IssueSeverity): number {
  return ISSUE_SEVERITY_RANK[severity];
}

export function compareSourceSeverity(left: SourceSeverity, right: SourceSeverity): number {
  return SOURCE_SEVERITY_RANK[left] - SOURCE_SEVERITY_RANK[right];
}

export function maxSourceSeverity(left: SourceSeverity, right: SourceSeverity): SourceSeverity {
  return compareSourceSeverity(left, right) >= 0 ? left : right;
}

// ==================== Conversions ====================

export function sourceToIssueSeverity(severity: SourceSeverity): IssueSeverity {
  switch (severity) {
    case 'unspecified':
      logger.warn('Issue reported with unspecified severity, showing it as ok');
      return 'ok';
    case 'information':
      return 'ok';
    case 'recommendation':
      return 'recommendation';
    case 'critical_warning':
      return 'critical_warning';
  }
}

export function sourceToEntrySeverity(severity: SourceSeverity): EntrySeverity {
  switch (severity) {
    case 'unspecified':
      return 'unspecified';
    case 'information':
      return 'ok';
    case 'recommendation':
      return 'recommendation';
    case 'critical_warning':
      return 'critical_warning';
  }
}

export function entryToOverallSeverity(severity: EntrySeverity): OverallSeverity {
  switch (severity) {
    case 'unknown':
      return 'unknown';
    case 'unspecified':
    case 'ok':
      return 'ok';
    case 'recommendation':
      return 'recommendation';
    case 'critical_warning':
      return 'critical_warning';
  }
}

export function issueToOverallSeverity(severity: IssueSeverity): OverallSeverity {
  return severity;
}

// ==================== Merges ====================

/**
 * Merges two entry severities. Anything above ok wins over unknown;
 * otherwise unknown wins over the known levels.
 */
export function mergeEntrySeverity(left: EntrySeverity, right: EntrySeverity): EntrySeverity {
  if (left === 'unknown' || right === 'unknown') {
    const known = left === 'unknown' ? right : left;
    if (known !== 'unknown' && KNOWN_ENTRY_SEVERITY_RANK[known] > KNOWN_ENTRY_SEVERITY_RANK.ok) {
      return known;
    }
    return 'unknown';
  }
  return KNOWN_ENTRY_SEVERITY_RANK[left] >= KNOWN_ENTRY_SEVERITY_RANK[right] ? left : right;
}

/**
 * Merges two overall severities; unknown always wins
 */
export function mergeOverallSeverity(left: OverallSeverity, right: OverallSeverity): OverallSeverity {
  if (left === 'unknown' || right === 'unknown') {
    return 'unknown';
  }
  return KNOWN_OVERALL_SEVERITY_RANK[left] >= KNOWN_OVERALL_SEVERITY_RANK[right] ? left : right;
}

/**
 * Whether a known overall severity ranks strictly above another known one.
 * Unknown ranks above nothing and nothing ranks above unknown.
 */
export function overallSeverityExceeds(left: OverallSeverity, right: OverallSeverity): boolean {
  if (left === 'unknown' || right === 'unknown') {
    return false;
  }
  return KNOWN_OVERALL_SEVERITY_RANK[left] > KNOWN_OVERALL_SEVERITY_RANK[right];
}
