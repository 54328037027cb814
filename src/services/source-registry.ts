/**
 * Source Registry
 *
 * Parses and validates the source configuration and answers lookups on it.
 * Configuration errors are fatal: nothing is loaded from an invalid file.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  ConfigValidationError,
  ExternalSource,
  SafetyConfig,
  SourceDescriptor,
  SourcesGroup,
  UnknownSourceError,
  isExternalSource
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('SourceRegistry');

// ==================== Schema ====================

const sourceSeveritySchema = z.enum(['unspecified', 'information', 'recommendation', 'critical_warning']);
const profileSchema = z.enum(['none', 'primary', 'all']);

const dynamicSourceSchema = z
  .object({
    type: z.literal('dynamic'),
    id: z.string().min(1),
    packageName: z.string().min(1),
    title: z.string().min(1).optional(),
    titleForWork: z.string().min(1).optional(),
    summary: z.string().min(1).optional(),
    intentAction: z.string().min(1).optional(),
    profile: profileSchema.default('primary'),
    initialDisplayState: z.enum(['enabled', 'disabled', 'hidden']).default('enabled'),
    maxSeverity: sourceSeveritySchema.default('critical_warning'),
    loggingAllowed: z.boolean().default(true),
    refreshOnPageOpenAllowed: z.boolean().default(false)
  })
  .strict();

const staticSourceSchema = z
  .object({
    type: z.literal('static'),
    id: z.string().min(1),
    title: z.string().min(1),
    titleForWork: z.string().min(1).optional(),
    summary: z.string().min(1).optional(),
    intentAction: z.string().min(1),
    profile: profileSchema.default('primary')
  })
  .strict();

const issueOnlySourceSchema = z
  .object({
    type: z.literal('issue_only'),
    id: z.string().min(1),
    packageName: z.string().min(1),
    profile: profileSchema.default('primary'),
    maxSeverity: sourceSeveritySchema.default('critical_warning'),
    loggingAllowed: z.boolean().default(true),
    refreshOnPageOpenAllowed: z.boolean().default(false)
  })
  .strict();

const sourceSchema = z.discriminatedUnion('type', [
  dynamicSourceSchema,
  staticSourceSchema,
  issueOnlySourceSchema
]);

const groupSchema = z
  .object({
    id: z.string().min(1),
    type: z.enum(['collapsible', 'rigid', 'hidden']),
    title: z.string().min(1).optional(),
    summary: z.string().min(1).optional(),
    statelessIconType: z.enum(['none', 'privacy']).default('none'),
    sources: z.array(sourceSchema).min(1)
  })
  .strict();

const configSchema = z.object({
  groups: z.array(groupSchema).min(1)
});

type RawSource = z.infer<typeof sourceSchema>;
type RawGroup = z.infer<typeof groupSchema>;

// ==================== Parsing ====================

function toSourceDescriptor(raw: RawSource): SourceDescriptor {
  return { ...raw, supportsManagedProfiles: raw.profile === 'all' };
}

/**
 * Cross-field rules that the schema alone does not express
 */
function collectRuleViolations(groups: RawGroup[]): string[] {
  const violations: string[] = [];
  const groupIds = new Set<string>();
  const sourceIds = new Set<string>();

  for (const group of groups) {
    if (groupIds.has(group.id)) {
      violations.push(`groups.${group.id}: duplicate group id`);
    }
    groupIds.add(group.id);

    if (group.type !== 'hidden' && group.title === undefined) {
      violations.push(`groups.${group.id}: ${group.type} group requires a title`);
    }

    for (const source of group.sources) {
      const at = `groups.${group.id}.sources.${source.id}`;
      if (sourceIds.has(source.id)) {
        violations.push(`${at}: duplicate source id`);
      }
      sourceIds.add(source.id);

      switch (source.type) {
        case 'dynamic': {
          const shown = source.initialDisplayState !== 'hidden';
          if (shown && (source.title === undefined || source.summary === undefined)) {
            violations.push(`${at}: visible dynamic source requires a title and a summary`);
          }
          if (source.initialDisplayState === 'enabled' && source.intentAction === undefined) {
            violations.push(`${at}: enabled dynamic source requires an intentAction`);
          }
          if (shown && source.profile === 'all' && source.titleForWork === undefined) {
            violations.push(`${at}: source for all profiles requires a titleForWork`);
          }
          break;
        }
        case 'static':
          if (source.profile === 'all' && source.titleForWork === undefined) {
            violations.push(`${at}: source for all profiles requires a titleForWork`);
          }
          break;
        case 'issue_only':
          break;
      }
    }
  }

  return violations;
}

/**
 * Validates a raw configuration object
 */
export function parseSafetyConfig(raw: unknown): SafetyConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigValidationError('Invalid safety source configuration', issues);
  }

  const violations = collectRuleViolations(parsed.data.groups);
  if (violations.length > 0) {
    throw new ConfigValidationError('Invalid safety source configuration', violations);
  }

  const groups: SourcesGroup[] = parsed.data.groups.map(group => ({
    id: group.id,
    type: group.type,
    title: group.title,
    summary: group.summary,
    statelessIconType: group.statelessIconType,
    sources: group.sources.map(toSourceDescriptor)
  }));
  return { groups };
}

// ==================== Registry ====================

/**
 * Immutable view over a validated configuration
 */
export class SourceRegistry {
  private readonly sourcesById: Map<string, SourceDescriptor> = new Map();

  constructor(private readonly config: SafetyConfig) {
    for (const group of config.groups) {
      for (const source of group.sources) {
        this.sourcesById.set(source.id, source);
      }
    }
  }

  groups(): SourcesGroup[] {
    return this.config.groups;
  }

  /**
   * All sources, in configuration order
   */
  sources(): SourceDescriptor[] {
    return Array.from(this.sourcesById.values());
  }

  getSource(sourceId: string): SourceDescriptor | undefined {
    return this.sourcesById.get(sourceId);
  }

  requireSource(sourceId: string): SourceDescriptor {
    const source = this.sourcesById.get(sourceId);
    if (source === undefined) {
      throw new UnknownSourceError(sourceId);
    }
    return source;
  }

  /**
   * Sources that are asked to refresh and may set data
   */
  externalSources(): ExternalSource[] {
    return this.sources().filter(isExternalSource);
  }

  isLoggingAllowed(sourceId: string): boolean {
    const source = this.sourcesById.get(sourceId);
    if (source === undefined || !isExternalSource(source)) {
      return false;
    }
    return source.loggingAllowed;
  }
}

/**
 * Reads a JSON configuration file and builds a registry from it
 */
export async function loadSourceRegistry(path: string): Promise<SourceRegistry> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Safety source configuration is not valid JSON: ${path}`, [message]);
  }
  const registry = new SourceRegistry(parseSafetyConfig(raw));
  logger.info('Loaded safety source configuration', {
    path,
    groups: registry.groups().length,
    sources: registry.sources().length
  });
  return registry;
}
