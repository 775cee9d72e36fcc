export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export const SEVERITY_ORDER: readonly Severity[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'];

export type Verb = 'inspect' | 'read' | 'use' | 'manage';

export type ParseErrorReason = 'UnsupportedVerb' | 'MalformedGrammar' | 'MissingSubject';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type NamedSubjectType = 'group' | 'dynamic-group' | 'service';

export type Subject =
    | { type: 'any-user' }
    | { type: 'any-group' }
    | { type: NamedSubjectType; names: readonly string[]; byId: boolean };

export type SubjectType = Subject['type'];

export type Scope =
    | { kind: 'tenancy' }
    | { kind: 'compartment'; target: string; byId: boolean }
    | { kind: 'unspecified' };

export interface Grant {
    readonly verb: Verb;
    readonly resourceType: string;
    readonly subject: Subject;
    readonly scope: Scope;
    readonly condition?: string;
}

export interface ParseFailure {
    readonly reason: ParseErrorReason;
    readonly message: string;
}

export type ParsedStatement =
    | { kind: 'parsed'; grant: Grant }
    | { kind: 'unparsed'; error: ParseFailure };

export interface PolicyStatement {
    readonly policyId: string;
    readonly policyName: string;
    readonly compartmentId: string;
    readonly compartmentName: string;
    /** Position of the statement inside its policy. */
    readonly index: number;
    /** Position across the whole snapshot, used as the sort tie-breaker. */
    readonly sequence: number;
    readonly raw: string;
    readonly parsed: ParsedStatement;
}

export interface Classification {
    readonly severity: Severity;
    readonly ruleId: string;
    readonly rationale: string;
}

export interface BlastRadius {
    /** null when the subject is not a countable group or a reference did not resolve. */
    readonly count: number | null;
    readonly unresolved: readonly string[];
    readonly note?: string;
}

export type AuditEventType =
    | 'policy-changed'
    | 'group-membership-changed'
    | 'group-changed'
    | 'dynamic-group-changed'
    | 'other';

export interface AuditEvent {
    readonly id: string;
    readonly timestamp: Date;
    readonly eventType: AuditEventType;
    readonly eventName: string;
    readonly principal: string;
    readonly resourceId: string;
    readonly resourceName: string;
    readonly compartmentId: string;
}

export interface Finding {
    readonly statement: PolicyStatement;
    readonly severity: Severity;
    readonly ruleId: string;
    readonly rationale: string;
    readonly blastRadius: BlastRadius;
    readonly recentlyModified: boolean;
    readonly correlatedEvents: readonly AuditEvent[];
}

export interface Compartment {
    id: string;
    name: string;
}

export interface Policy {
    id: string;
    name: string;
    compartmentId: string;
    description?: string;
    statements: string[];
}

export interface DirectoryGroup {
    id: string;
    name: string;
    /** Omitted when membership is not enumerable (dynamic groups) or derived from memberships. */
    memberCount?: number;
}

export interface GroupMembership {
    groupId: string;
    userId: string;
}

export interface DirectoryUser {
    id: string;
    name: string;
    mfaActivated?: boolean;
}

export interface SkippedCompartment {
    compartmentId: string;
    reason: string;
}

export interface DirectorySnapshot {
    tenancyId: string;
    activePrincipalCount: number;
    compartments: Compartment[];
    policies: Policy[];
    groups: DirectoryGroup[];
    dynamicGroups: DirectoryGroup[];
    memberships?: GroupMembership[];
    users?: DirectoryUser[];
    skippedCompartments?: SkippedCompartment[];
}

export interface EngineConfig {
    lookbackHours: number;
    now: Date;
    includeSubcompartments: boolean;
    region?: string;
}

export interface CompartmentSummary {
    compartmentId: string;
    compartmentName: string;
    total: number;
    bySeverity: Record<Severity, number>;
}

export interface GroupMembershipSummary {
    groupId: string;
    groupName: string;
    memberCount: number | null;
}

export interface EvaluationReport {
    metadata: {
        reportName: string;
        generatedAt: string;
        region: string | null;
        tenancyId: string;
        lookbackHours: number;
        includeSubcompartments: boolean;
    };
    summary: {
        total: number;
        bySeverity: Record<Severity, number>;
        byCompartment: CompartmentSummary[];
        unparsed: number;
        unresolvedGroupReferences: number;
        recentlyModified: number;
        identityChangeEvents: number;
        scannedCompartments: number;
        skippedCompartments: number;
        policiesScanned: number;
        groups: number;
        dynamicGroups: number;
        users: number;
        usersWithMfa: number;
    };
    findings: readonly Finding[];
    skippedCompartments: SkippedCompartment[];
    recentChangeEvents: readonly AuditEvent[];
    groupMembershipSummary: GroupMembershipSummary[];
}
