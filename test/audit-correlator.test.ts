import { describe, expect, test } from 'vitest';
import { correlateFindings, withinLookback } from '../src/analyzers/audit-correlator.js';
import { parseStatement } from '../src/analyzers/statement-parser.js';
import type { Finding, ParsedStatement } from '../src/types/index.js';
import { NOW, auditEvent, hoursAgo } from './fixtures.js';

function finding(raw: string, policyId = 'ocid1.policy.p1'): Finding {
    const result = parseStatement(raw);
    const parsed: ParsedStatement = result.ok
        ? { kind: 'parsed', grant: result.value }
        : { kind: 'unparsed', error: { reason: result.error.reason, message: result.error.message } };
    return {
        statement: {
            policyId,
            policyName: 'p1',
            compartmentId: 'ocid1.compartment.finance',
            compartmentName: 'finance',
            index: 0,
            sequence: 0,
            raw,
            parsed,
        },
        severity: 'HIGH',
        ruleId: 'sensitive-manage',
        rationale: 'test',
        blastRadius: { count: null, unresolved: [] },
        recentlyModified: false,
        correlatedEvents: [],
    };
}

const window = { lookbackHours: 24, now: NOW };

describe('withinLookback', () => {
    test('drops events older than the window', () => {
        const events = [
            auditEvent({ id: 'in', timestamp: hoursAgo(23) }),
            auditEvent({ id: 'edge', timestamp: hoursAgo(24) }),
            auditEvent({ id: 'out', timestamp: hoursAgo(25) }),
            auditEvent({ id: 'bad', timestamp: new Date(Number.NaN) }),
        ];
        expect(withinLookback(events, window).map((e) => e.id)).toEqual(['in', 'edge']);
    });

    test('drops events stamped after now', () => {
        const events = [
            auditEvent({ id: 'now', timestamp: NOW }),
            auditEvent({ id: 'future', timestamp: hoursAgo(-48) }),
        ];
        expect(withinLookback(events, window).map((e) => e.id)).toEqual(['now']);
    });
});

describe('correlateFindings', () => {
    test('attaches an event that touched the owning policy', () => {
        const event = auditEvent({
            id: 'evt-policy',
            eventType: 'policy-changed',
            resourceId: 'ocid1.policy.p1',
            timestamp: hoursAgo(2),
        });
        const [result] = correlateFindings(
            [finding('Allow group IamOps to manage policies in tenancy')],
            [event],
            { lookbackHours: 12, now: NOW }
        );
        expect(result.recentlyModified).toBe(true);
        expect(result.correlatedEvents).toEqual([event]);
    });

    test('ignores a matching event outside the window', () => {
        const event = auditEvent({
            id: 'evt-old',
            eventType: 'policy-changed',
            resourceId: 'ocid1.policy.p1',
            timestamp: hoursAgo(25),
        });
        const [result] = correlateFindings(
            [finding('Allow group IamOps to manage policies in tenancy')],
            [event],
            window
        );
        expect(result.recentlyModified).toBe(false);
        expect(result.correlatedEvents).toHaveLength(0);
    });

    test('ignores a matching event stamped in the future', () => {
        const event = auditEvent({
            id: 'evt-future',
            eventType: 'policy-changed',
            resourceId: 'ocid1.policy.p1',
            timestamp: hoursAgo(-48),
        });
        const [result] = correlateFindings(
            [finding('Allow group IamOps to manage policies in tenancy')],
            [event],
            window
        );
        expect(result.recentlyModified).toBe(false);
        expect(result.correlatedEvents).toHaveLength(0);
    });

    test('matches group membership changes by group name', () => {
        const membership = auditEvent({
            id: 'evt-member',
            eventType: 'group-membership-changed',
            resourceName: 'Admins',
            timestamp: hoursAgo(3),
        });
        const definition = auditEvent({
            id: 'evt-group',
            eventType: 'group-changed',
            resourceName: 'Admins',
            timestamp: hoursAgo(1),
        });
        const [result] = correlateFindings(
            [finding('Allow group Admins to manage buckets in tenancy', 'ocid1.policy.other')],
            [membership, definition],
            window
        );
        expect(result.correlatedEvents.map((e) => e.id)).toEqual(['evt-group', 'evt-member']);
    });

    test('requires the event kind to match the subject kind', () => {
        const event = auditEvent({
            id: 'evt-dyn',
            eventType: 'dynamic-group-changed',
            resourceName: 'Admins',
        });
        const [groupFinding, dynamicFinding] = correlateFindings(
            [
                finding('Allow group Admins to manage buckets in tenancy', 'ocid1.policy.a'),
                finding('Allow dynamic-group Admins to manage buckets in tenancy', 'ocid1.policy.b'),
            ],
            [event],
            window
        );
        expect(groupFinding.recentlyModified).toBe(false);
        expect(dynamicFinding.recentlyModified).toBe(true);
    });

    test('does not match unrelated event types on group names', () => {
        const event = auditEvent({ id: 'evt-other', eventType: 'other', resourceName: 'Admins' });
        const [result] = correlateFindings(
            [finding('Allow group Admins to manage buckets in tenancy', 'ocid1.policy.a')],
            [event],
            window
        );
        expect(result.recentlyModified).toBe(false);
    });

    test('attaches a repeated event once', () => {
        const event = auditEvent({ id: 'evt-dup', resourceId: 'ocid1.policy.p1' });
        const [result] = correlateFindings(
            [finding('Allow group A to read buckets in tenancy')],
            [event, event],
            window
        );
        expect(result.correlatedEvents).toHaveLength(1);
    });

    test('correlates unparsed statements through their policy id', () => {
        const event = auditEvent({ id: 'evt-p', resourceId: 'ocid1.policy.p1' });
        const [result] = correlateFindings([finding('Endorse group A to read buckets in tenancy')], [event], window);
        expect(result.recentlyModified).toBe(true);
    });

    test('is a no-op pass on an empty event list', () => {
        const input = [finding('Allow group A to read buckets in tenancy')];
        const output = correlateFindings(input, [], window);
        expect(output).toEqual(input);
        expect(output).not.toBe(input);
    });

    test('leaves the input findings untouched', () => {
        const input = finding('Allow group A to read buckets in tenancy');
        correlateFindings([input], [auditEvent({ id: 'e', resourceId: 'ocid1.policy.p1' })], window);
        expect(input.recentlyModified).toBe(false);
        expect(input.correlatedEvents).toHaveLength(0);
    });
});
