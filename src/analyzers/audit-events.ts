import type { AuditEvent, AuditEventType } from '../types/index.js';

/**
 * Shape of an OCI Audit record as returned by the audit ListEvents API.
 * Only the fields the correlator needs are declared.
 */
export interface RawAuditEvent {
    eventId?: string;
    eventType?: string;
    eventTime?: string;
    source?: string;
    data?: {
        eventName?: string;
        compartmentId?: string;
        resourceId?: string;
        resourceName?: string;
        identity?: {
            principalName?: string;
        };
    };
}

export const UNKNOWN_PRINCIPAL = 'UNKNOWN_PRINCIPAL';

// Checked in order: "dynamicgroup" contains "group", membership ops contain "group".
const EVENT_TYPE_TERMS: readonly [AuditEventType, readonly string[]][] = [
    ['policy-changed', ['createpolicy', 'updatepolicy', 'deletepolicy']],
    ['dynamic-group-changed', ['createdynamicgroup', 'updatedynamicgroup', 'deletedynamicgroup']],
    ['group-membership-changed', ['addusertogroup', 'removeuserfromgroup']],
    ['group-changed', ['creategroup', 'updategroup', 'deletegroup']],
];

/**
 * Classifies an audit record by its event type and name, compared with
 * everything but letters and digits stripped.
 */
export function classifyAuditEvent(eventType: string, eventName: string): AuditEventType {
    const normalized = `${eventType} ${eventName}`.toLowerCase().replace(/[^a-z0-9]/g, '');
    for (const [type, terms] of EVENT_TYPE_TERMS) {
        if (terms.some((term) => normalized.includes(term))) return type;
    }
    return 'other';
}

export function normalizeAuditEvent(raw: RawAuditEvent, fallbackId: string): AuditEvent {
    const data = raw.data ?? {};
    const eventType = raw.eventType ?? '';
    const eventName = data.eventName ?? '';
    const timestamp = raw.eventTime ? new Date(raw.eventTime) : new Date(Number.NaN);

    return {
        id: raw.eventId ?? fallbackId,
        timestamp,
        eventType: classifyAuditEvent(eventType, eventName),
        eventName,
        principal: data.identity?.principalName ?? UNKNOWN_PRINCIPAL,
        resourceId: data.resourceId ?? '',
        resourceName: data.resourceName ?? '',
        compartmentId: data.compartmentId ?? '',
    };
}

/**
 * Sorts newest first. Events with an unreadable timestamp sort last.
 */
export function sortByTimestampDesc(events: readonly AuditEvent[]): AuditEvent[] {
    const time = (event: AuditEvent) => {
        const ms = event.timestamp.getTime();
        return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
    };
    return [...events].sort((a, b) => time(b) - time(a));
}
