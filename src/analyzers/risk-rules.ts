import type { Classification, Grant, Severity } from '../types/index.js';

export interface RiskRule {
    id: string;
    severity: Severity;
    rationale: string;
    matches(grant: Grant): boolean;
}

/**
 * Identity, policy and compartment management resource-types. Managing any
 * of these lets a principal rewrite who can do what.
 */
export const SENSITIVE_RESOURCE_TYPES: ReadonlySet<string> = new Set([
    'policies',
    'groups',
    'dynamic-groups',
    'users',
    'compartments',
    'identity-providers',
    'domains',
    'network-sources',
    'authentication-policies',
    'tenancies',
]);

export const ALL_RESOURCES = 'all-resources';

/**
 * Aggregate resource-types that cover a whole service family.
 */
export const BROAD_RESOURCE_TYPES: ReadonlySet<string> = new Set([
    ALL_RESOURCES,
    'object-family',
    'instance-family',
    'virtual-network-family',
    'database-family',
    'volume-family',
    'cluster-family',
    'file-family',
]);

/**
 * Ordered rule chain. The first matching rule decides the severity, so the
 * order below is observable behavior.
 */
export const RISK_RULES: readonly RiskRule[] = [
    // Rule 1: Full tenancy admin
    {
        id: 'tenancy-manage-all',
        severity: 'CRITICAL',
        rationale: 'tenancy-wide manage-all grant',
        matches: (grant) =>
            grant.verb === 'manage' &&
            grant.resourceType === ALL_RESOURCES &&
            grant.scope.kind === 'tenancy',
    },
    // Rule 2: Anyone who can authenticate may manage
    {
        id: 'any-user-manage',
        severity: 'CRITICAL',
        rationale: 'unscoped principal with manage rights',
        matches: (grant) => grant.verb === 'manage' && grant.subject.type === 'any-user',
    },
    // Rule 3: Identity control plane, a privilege escalation vector
    {
        id: 'sensitive-manage',
        severity: 'HIGH',
        rationale: 'manage rights on identity, policy or compartment resources',
        matches: (grant) =>
            grant.verb === 'manage' && SENSITIVE_RESOURCE_TYPES.has(grant.resourceType),
    },
    // Rule 4: Wildcard group principal
    {
        id: 'wildcard-group',
        severity: 'HIGH',
        rationale: 'wildcard group principal',
        matches: (grant) =>
            grant.subject.type === 'any-group' ||
            (grant.subject.type === 'group' && grant.subject.names.includes('*')),
    },
    // Rule 5: Broad family access with nothing narrowing it
    {
        id: 'broad-unconditioned',
        severity: 'MEDIUM',
        rationale: 'broad use/manage grant without a condition',
        matches: (grant) =>
            (grant.verb === 'use' || grant.verb === 'manage') &&
            grant.condition === undefined &&
            BROAD_RESOURCE_TYPES.has(grant.resourceType),
    },
    // Rule 6: Read-only or condition-restricted
    {
        id: 'read-only-or-conditioned',
        severity: 'LOW',
        rationale: 'read-only or condition-restricted grant',
        matches: (grant) =>
            grant.verb === 'inspect' || grant.verb === 'read' || grant.condition !== undefined,
    },
];

export const FALLBACK_CLASSIFICATION: Readonly<Classification> = Object.freeze({
    severity: 'LOW',
    ruleId: 'fallback',
    rationale: 'no elevated-risk pattern matched.',
});

/**
 * Classifies a grant against the ordered rule chain. Pure: the same grant
 * always yields the same classification.
 */
export function classifyGrant(
    grant: Grant,
    rules: readonly RiskRule[] = RISK_RULES
): Classification {
    const rule = rules.find((r) => r.matches(grant));
    if (!rule) return FALLBACK_CLASSIFICATION;

    return { severity: rule.severity, ruleId: rule.id, rationale: rule.rationale };
}
