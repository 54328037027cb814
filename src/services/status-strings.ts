/**
 * Default string table for the aggregated view
 */

import { IssueCategory } from '../types/index.js';

export const HUB_STRINGS = {
  scanningTitle: 'Scanning',
  loadingSummary: 'Checking your settings',
  okTitle: 'Looks good',
  okReviewTitle: 'Review your settings',
  okSummary: 'No problems found',
  okReviewSummary: 'Some settings need your attention',
  deviceRecommendationTitle: 'Your device may be at risk',
  accountRecommendationTitle: 'Your account may be at risk',
  generalRecommendationTitle: 'Safety recommendation',
  deviceCriticalTitle: 'Your device is at risk',
  accountCriticalTitle: 'Your account is at risk',
  generalCriticalTitle: 'Safety warning',
  workProfilePaused: 'Work profile is paused',
  groupUnknownSummary: 'Status unavailable'
} as const;

const pluralRules = new Intl.PluralRules('en-US');

function plural(count: number, one: string, other: string): string {
  const template = pluralRules.select(count) === 'one' ? one : other;
  return template.replace('#', String(count));
}

/**
 * "1 alert", "3 alerts"
 */
export function alertsSummary(count: number): string {
  return plural(count, '# alert', '# alerts');
}

/**
 * Summary for entries whose source failed to refresh
 */
export function refreshErrorSummary(count: number): string {
  return plural(count, "Couldn't check setting", "Couldn't check # settings");
}

export function recommendationTitle(category: IssueCategory): string {
  switch (category) {
    case 'device':
      return HUB_STRINGS.deviceRecommendationTitle;
    case 'account':
      return HUB_STRINGS.accountRecommendationTitle;
    case 'general':
      return HUB_STRINGS.generalRecommendationTitle;
  }
}

export function criticalTitle(category: IssueCategory): string {
  switch (category) {
    case 'device':
      return HUB_STRINGS.deviceCriticalTitle;
    case 'account':
      return HUB_STRINGS.accountCriticalTitle;
    case 'general':
      return HUB_STRINGS.generalCriticalTitle;
  }
}
