/**
 * Validation of the data a source sets for one user
 */

import { z } from 'zod';
import {
  SourceDataValidationError,
  SourceDescriptor,
  SourceReport,
  SourceSeverity
} from '../types/index.js';
import { compareSourceSeverity } from '../utils/severity.js';

const sourceSeveritySchema = z.enum(['unspecified', 'information', 'recommendation', 'critical_warning']);

const issueActionSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  resolving: z.boolean().default(false),
  successMessage: z.string().min(1).optional(),
  pendingAction: z.string().min(1).optional()
});

const issueSchema = z.object({
  id: z.string().min(1),
  typeId: z.string().min(1),
  severity: sourceSeveritySchema.exclude(['unspecified']),
  category: z.enum(['device', 'account', 'general']).default('general'),
  title: z.string().min(1),
  summary: z.string().min(1),
  subtitle: z.string().min(1).optional(),
  actions: z.array(issueActionSchema).default([])
});

const statusSchema = z.object({
  title: z.string().min(1),
  summary: z.string().min(1),
  severity: sourceSeveritySchema,
  enabled: z.boolean().default(true),
  pendingAction: z.string().min(1).optional(),
  iconAction: z
    .object({
      type: z.enum(['gear', 'info']),
      pendingAction: z.string().min(1)
    })
    .optional()
});

export const sourceReportSchema = z.object({
  status: statusSchema.optional(),
  issues: z.array(issueSchema).default([])
});

function exceeds(severity: SourceSeverity, maxSeverity: SourceSeverity): boolean {
  return compareSourceSeverity(severity, maxSeverity) > 0;
}

/**
 * Parses a payload into a report and checks it against the source configuration
 */
export function validateSourceData(source: SourceDescriptor, payload: unknown): SourceReport {
  if (source.type === 'static') {
    throw new SourceDataValidationError(source.id, `Static source ${source.id} does not accept data`);
  }

  const parsed = sourceReportSchema.safeParse(payload);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new SourceDataValidationError(source.id, `Malformed data from ${source.id}: ${details}`);
  }
  const report: SourceReport = parsed.data;

  if (source.type === 'issue_only' && report.status !== undefined) {
    throw new SourceDataValidationError(source.id, `Issue-only source ${source.id} cannot set a status`);
  }
  if (report.status !== undefined && exceeds(report.status.severity, source.maxSeverity)) {
    throw new SourceDataValidationError(
      source.id,
      `Status severity ${report.status.severity} exceeds ${source.maxSeverity} for ${source.id}`
    );
  }

  const issueIds = new Set<string>();
  for (const issue of report.issues) {
    if (issueIds.has(issue.id)) {
      throw new SourceDataValidationError(source.id, `Duplicate issue id ${issue.id} from ${source.id}`);
    }
    issueIds.add(issue.id);

    if (exceeds(issue.severity, source.maxSeverity)) {
      throw new SourceDataValidationError(
        source.id,
        `Issue ${issue.id} severity ${issue.severity} exceeds ${source.maxSeverity} for ${source.id}`
      );
    }
    // Issues above information may not outrank the status of their own report
    if (
      report.status !== undefined &&
      exceeds(issue.severity, 'information') &&
      exceeds(issue.severity, report.status.severity)
    ) {
      throw new SourceDataValidationError(
        source.id,
        `Issue ${issue.id} severity ${issue.severity} exceeds status severity ${report.status.severity} for ${source.id}`
      );
    }

    const actionIds = new Set<string>();
    for (const action of issue.actions) {
      if (actionIds.has(action.id)) {
        throw new SourceDataValidationError(source.id, `Duplicate action id ${action.id} in issue ${issue.id}`);
      }
      actionIds.add(action.id);
    }
  }

  return report;
}
