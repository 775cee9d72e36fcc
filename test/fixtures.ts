import type { AuditEvent, DirectorySnapshot, EngineConfig, Policy } from '../src/types/index.js';

export const NOW = new Date('2026-03-10T12:00:00.000Z');

export function hoursAgo(hours: number): Date {
    return new Date(NOW.getTime() - hours * 60 * 60 * 1000);
}

export function engineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
    return { lookbackHours: 24, now: NOW, includeSubcompartments: true, ...overrides };
}

export function policy(id: string, statements: string[], compartmentId = 'ocid1.compartment.finance'): Policy {
    return { id, name: `${id}-name`, compartmentId, statements };
}

export function snapshot(overrides: Partial<DirectorySnapshot> = {}): DirectorySnapshot {
    return {
        tenancyId: 'ocid1.tenancy.test',
        activePrincipalCount: 42,
        compartments: [
            { id: 'ocid1.tenancy.test', name: 'root' },
            { id: 'ocid1.compartment.finance', name: 'finance' },
        ],
        policies: [],
        groups: [
            { id: 'ocid1.group.auditors', name: 'Auditors', memberCount: 7 },
            { id: 'ocid1.group.admins', name: 'Admins', memberCount: 3 },
        ],
        dynamicGroups: [{ id: 'ocid1.dynamicgroup.fn', name: 'FnFunctions' }],
        ...overrides,
    };
}

export function auditEvent(overrides: Partial<AuditEvent> & { id: string }): AuditEvent {
    return {
        timestamp: hoursAgo(1),
        eventType: 'other',
        eventName: '',
        principal: 'alice@example.com',
        resourceId: '',
        resourceName: '',
        compartmentId: 'ocid1.compartment.finance',
        ...overrides,
    };
}
