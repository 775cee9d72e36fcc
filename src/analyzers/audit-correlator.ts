import type { AuditEvent, AuditEventType, Finding } from '../types/index.js';
import { sortByTimestampDesc } from './audit-events.js';
import { referencedGroups } from './statement-parser.js';

const HOUR_MS = 60 * 60 * 1000;

const GROUP_EVENT_TYPES: Record<'group' | 'dynamic-group', ReadonlySet<AuditEventType>> = {
    group: new Set<AuditEventType>(['group-membership-changed', 'group-changed']),
    'dynamic-group': new Set<AuditEventType>(['dynamic-group-changed']),
};

export interface CorrelationWindow {
    lookbackHours: number;
    now: Date;
}

/**
 * Keeps events in `[now - lookbackHours, now]`. Events stamped after `now`
 * or with no readable timestamp are dropped.
 */
export function withinLookback(
    events: readonly AuditEvent[],
    { lookbackHours, now }: CorrelationWindow
): AuditEvent[] {
    const end = now.getTime();
    const cutoff = end - lookbackHours * HOUR_MS;
    return events.filter((event) => {
        const time = event.timestamp.getTime();
        return time >= cutoff && time <= end;
    });
}

/**
 * Attaches recent identity-change events to the findings they touch. A
 * finding matches an event when the event's resource is the owning policy,
 * or a group the grant names and the event changed that group's membership
 * or definition. Returns new findings; the input list is left untouched.
 */
export function correlateFindings(
    findings: readonly Finding[],
    events: readonly AuditEvent[],
    window: CorrelationWindow
): Finding[] {
    const recent = sortByTimestampDesc(withinLookback(events, window));
    if (recent.length === 0) return [...findings];

    return findings.map((finding) => {
        const matched = recent.filter((event) => matchesFinding(finding, event));
        if (matched.length === 0) return finding;

        return {
            ...finding,
            recentlyModified: true,
            correlatedEvents: sortByTimestampDesc(
                dedupeById([...finding.correlatedEvents, ...matched])
            ),
        };
    });
}

function matchesFinding(finding: Finding, event: AuditEvent): boolean {
    if (event.resourceId !== '' && event.resourceId === finding.statement.policyId) {
        return true;
    }

    const { parsed } = finding.statement;
    if (parsed.kind !== 'parsed') return false;

    return referencedGroups(parsed.grant).some((ref) => {
        if (!GROUP_EVENT_TYPES[ref.type].has(event.eventType)) return false;
        const affected = ref.byId ? event.resourceId : event.resourceName;
        return affected !== '' && affected === ref.name;
    });
}

function dedupeById(events: readonly AuditEvent[]): AuditEvent[] {
    const seen = new Set<string>();
    return events.filter((event) => {
        if (seen.has(event.id)) return false;
        seen.add(event.id);
        return true;
    });
}
