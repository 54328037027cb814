/**
 * Hub Settings
 *
 * Runtime settings of the hub, read from the environment and overridable by
 * the embedding process.
 */

import { REFRESH_REASONS, RefreshReason } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('HubConfig');

// ==================== Types ====================

/**
 * Settings that control the hub at runtime
 */
export interface HubSettings {
  /** When false every mutating operation is rejected */
  enabled: boolean;
  /** When false no telemetry event is emitted */
  telemetryEnabled: boolean;
  /** Sources that are asked to refresh but whose responses are not awaited */
  untrackedSourceIds: string[];
  /** How long a refresh may run, per reason */
  refreshTimeoutsMs: Record<RefreshReason, number>;
  /** Writes debug lines */
  verboseLogging: boolean;
}

// ==================== Default Configuration ====================

export const DEFAULT_REFRESH_TIMEOUTS_MS: Readonly<Record<RefreshReason, number>> = {
  page_open: 15_000,
  rescan_button: 60_000,
  device_reboot: 30_000,
  locale_change: 30_000,
  feature_enabled: 30_000,
  other: 30_000
};

function parseTimeoutOverride(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn('Ignoring invalid SAFETY_HUB_REFRESH_TIMEOUT_MS', { value: raw });
    return undefined;
  }
  return value;
}

function parseIdList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map(id => id.trim())
    .filter(id => id.length > 0);
}

/**
 * Get default settings from the environment
 */
export function getDefaultHubSettings(env: NodeJS.ProcessEnv = process.env): HubSettings {
  const timeoutOverride = parseTimeoutOverride(env.SAFETY_HUB_REFRESH_TIMEOUT_MS);
  const refreshTimeoutsMs: Record<RefreshReason, number> = { ...DEFAULT_REFRESH_TIMEOUTS_MS };
  if (timeoutOverride !== undefined) {
    for (const reason of REFRESH_REASONS) {
      refreshTimeoutsMs[reason] = timeoutOverride;
    }
  }

  return {
    enabled: env.SAFETY_HUB_ENABLED !== 'false',
    telemetryEnabled: env.SAFETY_HUB_TELEMETRY_ENABLED !== 'false',
    untrackedSourceIds: parseIdList(env.SAFETY_HUB_UNTRACKED_SOURCE_IDS),
    refreshTimeoutsMs,
    verboseLogging: env.SAFETY_HUB_VERBOSE_LOGGING === 'true'
  };
}

/**
 * Resolves settings: environment defaults, then the given overrides
 */
export function resolveHubSettings(overrides?: Partial<HubSettings>): HubSettings {
  return { ...getDefaultHubSettings(), ...overrides };
}
