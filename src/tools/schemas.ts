import { z } from 'zod';
import { UNKNOWN_PRINCIPAL, normalizeAuditEvent } from '../analyzers/audit-events.js';
import type { AuditEvent } from '../types/index.js';

const nonEmpty = z.string().min(1);

const groupSchema = z.object({
    id: nonEmpty,
    name: nonEmpty,
    memberCount: z.number().int().nonnegative().optional(),
});

/**
 * Directory snapshot as handed over by the collection layer.
 */
export const directorySnapshotSchema = z.object({
    tenancyId: nonEmpty,
    activePrincipalCount: z.number().int().nonnegative(),
    compartments: z.array(z.object({ id: nonEmpty, name: nonEmpty })),
    policies: z.array(
        z.object({
            id: nonEmpty,
            name: nonEmpty,
            compartmentId: nonEmpty,
            description: z.string().optional(),
            statements: z.array(z.string()),
        })
    ),
    groups: z.array(groupSchema).default([]),
    dynamicGroups: z.array(groupSchema).default([]),
    memberships: z.array(z.object({ groupId: nonEmpty, userId: nonEmpty })).optional(),
    users: z
        .array(z.object({ id: nonEmpty, name: z.string(), mfaActivated: z.boolean().optional() }))
        .optional(),
    skippedCompartments: z
        .array(z.object({ compartmentId: nonEmpty, reason: z.string() }))
        .optional(),
});

const timestamp = z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value));

/**
 * Audit event already normalized by the collection layer.
 */
export const auditEventSchema = z.object({
    id: nonEmpty,
    timestamp,
    eventType: z.enum([
        'policy-changed',
        'group-membership-changed',
        'group-changed',
        'dynamic-group-changed',
        'other',
    ]),
    eventName: z.string().default(''),
    principal: z.string().default(UNKNOWN_PRINCIPAL),
    resourceId: z.string().default(''),
    resourceName: z.string().default(''),
    compartmentId: z.string().default(''),
});

/**
 * Raw OCI Audit record, recognised by its `eventTime` field.
 */
export const rawAuditEventSchema = z.object({
    eventId: z.string().optional(),
    eventType: z.string().optional(),
    eventTime: z.string().datetime({ offset: true }),
    source: z.string().optional(),
    data: z
        .object({
            eventName: z.string().optional(),
            compartmentId: z.string().optional(),
            resourceId: z.string().optional(),
            resourceName: z.string().optional(),
            identity: z.object({ principalName: z.string().optional() }).optional(),
        })
        .optional(),
});

export const auditEventsSchema = z.array(z.union([auditEventSchema, rawAuditEventSchema]));

/**
 * Normalizes a validated event list; raw records get a positional id when
 * they carry none.
 */
export function toAuditEvents(input: z.infer<typeof auditEventsSchema>): AuditEvent[] {
    return input.map((event, index) =>
        'eventTime' in event ? normalizeAuditEvent(event, `event-${index}`) : event
    );
}
