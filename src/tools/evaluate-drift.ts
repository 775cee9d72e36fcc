import { z } from 'zod';
import { evaluatePolicyDrift } from '../analyzers/policy-drift.js';
import type { AppConfig } from '../config.js';
import { InvalidInputError } from '../errors.js';
import type { AuditEvent, EvaluationReport } from '../types/index.js';
import { auditEventsSchema, directorySnapshotSchema, toAuditEvents } from './schemas.js';

/**
 * Zod schema for validating evaluate_policy_drift tool input.
 */
export const evaluateDriftSchema = z.object({
    snapshotJson: z
        .string()
        .describe(
            'Directory snapshot JSON: tenancyId, activePrincipalCount, compartments, policies, groups, dynamicGroups'
        ),
    auditEventsJson: z
        .string()
        .optional()
        .describe('JSON array of identity audit events, normalized or raw OCI Audit records'),
    lookbackHours: z
        .number()
        .int()
        .positive()
        .optional()
        .describe('Correlation window in hours; defaults to AUDIT_LOOKBACK_HOURS'),
});

export type EvaluateDriftInput = z.infer<typeof evaluateDriftSchema>;

/**
 * Parses and validates the snapshot and audit events, then runs the policy
 * drift evaluation.
 */
export function evaluateDrift(
    input: EvaluateDriftInput,
    appConfig: AppConfig,
    now: Date = new Date()
): EvaluationReport {
    const snapshot = directorySnapshotSchema.safeParse(
        parseJson(input.snapshotJson, 'snapshotJson')
    );
    if (!snapshot.success) {
        throw new InvalidInputError(`Invalid directory snapshot: ${formatIssues(snapshot.error)}`);
    }

    let events: AuditEvent[] | undefined;
    if (input.auditEventsJson !== undefined) {
        const parsed = auditEventsSchema.safeParse(
            parseJson(input.auditEventsJson, 'auditEventsJson')
        );
        if (!parsed.success) {
            throw new InvalidInputError(`Invalid audit events: ${formatIssues(parsed.error)}`);
        }
        events = toAuditEvents(parsed.data);
    }

    return evaluatePolicyDrift(snapshot.data, events, {
        lookbackHours: input.lookbackHours ?? appConfig.auditLookbackHours,
        now,
        includeSubcompartments: appConfig.includeSubcompartments,
        region: appConfig.region,
    });
}

function parseJson(text: string, field: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        throw new InvalidInputError(`Invalid JSON in ${field}: please provide a valid JSON document.`);
    }
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}
