import { SnapshotMissingError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import {
    SEVERITY_ORDER,
    type AuditEvent,
    type CompartmentSummary,
    type DirectorySnapshot,
    type EngineConfig,
    type EvaluationReport,
    type Finding,
    type GroupMembershipSummary,
    type ParsedStatement,
    type PolicyStatement,
    type Severity,
} from '../types/index.js';
import { correlateFindings, withinLookback } from './audit-correlator.js';
import { sortByTimestampDesc } from './audit-events.js';
import { BlastRadiusResolver } from './blast-radius.js';
import { SnapshotDirectory, type GroupDirectory } from './directory.js';
import { classifyGrant } from './risk-rules.js';
import { parseStatement } from './statement-parser.js';

export const REPORT_NAME = 'iam_policy_drift_audit';
export const RECENT_EVENT_LIMIT = 200;
export const UNPARSED_RATIONALE = 'could not classify';

export interface EvaluateOptions {
    /** Overrides the directory built from the snapshot, e.g. with a live lookup. */
    directory?: GroupDirectory;
    logger?: Logger;
}

/**
 * Runs parse → classify → resolve → correlate over one snapshot and returns
 * the frozen report. Audit events are optional; `undefined` skips
 * correlation. Throws SnapshotMissingError when compartments or policies are
 * missing.
 */
export function evaluatePolicyDrift(
    snapshot: DirectorySnapshot | undefined,
    events: readonly AuditEvent[] | undefined,
    config: EngineConfig,
    options: EvaluateOptions = {}
): EvaluationReport {
    assertSnapshot(snapshot);
    const log = options.logger ?? defaultLogger;

    const statements = collectStatements(snapshot);
    const resolver = new BlastRadiusResolver(options.directory ?? new SnapshotDirectory(snapshot));

    const evaluated = statements.map((statement): Finding => {
        if (statement.parsed.kind === 'unparsed') {
            log.debug(
                { policyId: statement.policyId, reason: statement.parsed.error.reason },
                'Statement could not be parsed'
            );
            return {
                statement,
                severity: 'LOW',
                ruleId: 'unparsed',
                rationale: UNPARSED_RATIONALE,
                blastRadius: { count: null, unresolved: [] },
                recentlyModified: false,
                correlatedEvents: [],
            };
        }

        const { grant } = statement.parsed;
        const classification = classifyGrant(grant);
        const blastRadius = resolver.resolve(grant);
        if (blastRadius.unresolved.length > 0) {
            log.debug(
                { policyId: statement.policyId, groups: blastRadius.unresolved },
                'Grant references groups missing from the directory'
            );
        }

        return {
            statement,
            ...classification,
            blastRadius,
            recentlyModified: false,
            correlatedEvents: [],
        };
    });

    const window = { lookbackHours: config.lookbackHours, now: config.now };
    const correlated = events ? correlateFindings(evaluated, events, window) : evaluated;
    const findings = Object.freeze(sortFindings(correlated).map(freezeFinding));

    const recentEvents = events ? sortByTimestampDesc(withinLookback(events, window)) : [];
    const identityChanges = recentEvents.filter((event) => event.eventType !== 'other');

    const report: EvaluationReport = {
        metadata: {
            reportName: REPORT_NAME,
            generatedAt: config.now.toISOString(),
            region: config.region ?? null,
            tenancyId: snapshot.tenancyId,
            lookbackHours: config.lookbackHours,
            includeSubcompartments: config.includeSubcompartments,
        },
        summary: {
            total: findings.length,
            bySeverity: countBySeverity(findings),
            byCompartment: summarizeCompartments(findings),
            unparsed: findings.filter((f) => f.statement.parsed.kind === 'unparsed').length,
            unresolvedGroupReferences: findings.filter((f) => f.blastRadius.unresolved.length > 0)
                .length,
            recentlyModified: findings.filter((f) => f.recentlyModified).length,
            identityChangeEvents: identityChanges.length,
            scannedCompartments: snapshot.compartments.length,
            skippedCompartments: snapshot.skippedCompartments?.length ?? 0,
            policiesScanned: snapshot.policies.length,
            groups: snapshot.groups.length,
            dynamicGroups: snapshot.dynamicGroups.length,
            users: snapshot.users?.length ?? 0,
            usersWithMfa: snapshot.users?.filter((u) => u.mfaActivated === true).length ?? 0,
        },
        findings,
        skippedCompartments: snapshot.skippedCompartments ?? [],
        recentChangeEvents: identityChanges.slice(0, RECENT_EVENT_LIMIT),
        groupMembershipSummary: summarizeGroups(snapshot),
    };

    log.info(
        {
            findings: report.summary.total,
            bySeverity: report.summary.bySeverity,
            recentlyModified: report.summary.recentlyModified,
        },
        'Policy drift evaluation complete'
    );
    return report;
}

/**
 * Flattens policies into statements in snapshot order and parses each one.
 */
export function collectStatements(snapshot: DirectorySnapshot): PolicyStatement[] {
    const compartmentNames = new Map(snapshot.compartments.map((c) => [c.id, c.name]));
    const statements: PolicyStatement[] = [];

    for (const policy of snapshot.policies) {
        policy.statements.forEach((raw, index) => {
            statements.push({
                policyId: policy.id,
                policyName: policy.name,
                compartmentId: policy.compartmentId,
                compartmentName: compartmentNames.get(policy.compartmentId) ?? policy.compartmentId,
                index,
                sequence: statements.length,
                raw,
                parsed: toParsedStatement(raw),
            });
        });
    }
    return statements;
}

function toParsedStatement(raw: string): ParsedStatement {
    const result = parseStatement(raw);
    if (result.ok) return { kind: 'parsed', grant: result.value };
    return { kind: 'unparsed', error: { reason: result.error.reason, message: result.error.message } };
}

/**
 * CRITICAL first; equal severities keep original statement order.
 */
export function sortFindings(findings: readonly Finding[]): Finding[] {
    const rank = (severity: Severity) => SEVERITY_ORDER.indexOf(severity);
    return [...findings].sort(
        (a, b) => rank(a.severity) - rank(b.severity) || a.statement.sequence - b.statement.sequence
    );
}

function assertSnapshot(snapshot: DirectorySnapshot | undefined): asserts snapshot is DirectorySnapshot {
    if (!snapshot) {
        throw new SnapshotMissingError('no snapshot supplied');
    }
    if (!Array.isArray(snapshot.compartments) || snapshot.compartments.length === 0) {
        throw new SnapshotMissingError('compartment list is empty');
    }
    if (!Array.isArray(snapshot.policies) || snapshot.policies.length === 0) {
        throw new SnapshotMissingError('policy list is empty');
    }
}

function emptySeverityCounts(): Record<Severity, number> {
    return { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 };
}

function countBySeverity(findings: readonly Finding[]): Record<Severity, number> {
    const counts = emptySeverityCounts();
    for (const finding of findings) counts[finding.severity] += 1;
    return counts;
}

function summarizeCompartments(findings: readonly Finding[]): CompartmentSummary[] {
    const byId = new Map<string, CompartmentSummary>();
    for (const { statement, severity } of findings) {
        let entry = byId.get(statement.compartmentId);
        if (!entry) {
            entry = {
                compartmentId: statement.compartmentId,
                compartmentName: statement.compartmentName,
                total: 0,
                bySeverity: emptySeverityCounts(),
            };
            byId.set(statement.compartmentId, entry);
        }
        entry.total += 1;
        entry.bySeverity[severity] += 1;
    }
    return [...byId.values()].sort(
        (a, b) => b.total - a.total || a.compartmentName.localeCompare(b.compartmentName)
    );
}

function summarizeGroups(snapshot: DirectorySnapshot): GroupMembershipSummary[] {
    const directory = new SnapshotDirectory(snapshot);
    return snapshot.groups
        .map((group) => ({
            groupId: group.id,
            groupName: group.name,
            memberCount:
                directory.findGroup({ kind: 'group', value: group.id, byId: true })?.memberCount ?? null,
        }))
        .sort((a, b) => (b.memberCount ?? -1) - (a.memberCount ?? -1));
}

/**
 * Freezes the finding and everything it owns. Correlated events belong to
 * the caller and are only referenced.
 */
function freezeFinding(finding: Finding): Finding {
    const { statement } = finding;
    if (statement.parsed.kind === 'parsed') {
        const { grant } = statement.parsed;
        if (grant.subject.type !== 'any-user' && grant.subject.type !== 'any-group') {
            Object.freeze(grant.subject.names);
        }
        Object.freeze(grant.subject);
        Object.freeze(grant.scope);
        Object.freeze(grant);
    } else {
        Object.freeze(statement.parsed.error);
    }
    Object.freeze(statement.parsed);
    Object.freeze(statement);
    Object.freeze(finding.blastRadius.unresolved);
    Object.freeze(finding.blastRadius);
    return Object.freeze({ ...finding, correlatedEvents: Object.freeze([...finding.correlatedEvents]) });
}
