import type { DirectorySnapshot } from '../types/index.js';

export type GroupKind = 'group' | 'dynamic-group';

export interface GroupLookupKey {
    kind: GroupKind;
    value: string;
    byId: boolean;
}

export interface ResolvedGroup {
    id: string;
    name: string;
    /** null when the directory knows the group but cannot count its members. */
    memberCount: number | null;
    /** Member user ids, present when the count was taken from the membership list. */
    memberIds?: ReadonlySet<string>;
}

/**
 * Read-only view over the directory that the blast-radius resolver queries.
 */
export interface GroupDirectory {
    findGroup(key: GroupLookupKey): ResolvedGroup | undefined;
    activePrincipalCount(): number;
}

/**
 * GroupDirectory backed by a materialized snapshot. Member counts come from
 * the group record when present, otherwise from the distinct users in the
 * membership list; dynamic groups without a count stay uncounted.
 */
export class SnapshotDirectory implements GroupDirectory {
    private readonly byName = new Map<string, ResolvedGroup>();
    private readonly byId = new Map<string, ResolvedGroup>();
    private readonly principals: number;

    constructor(snapshot: DirectorySnapshot) {
        this.principals = snapshot.activePrincipalCount;

        const members = new Map<string, Set<string>>();
        for (const membership of snapshot.memberships ?? []) {
            const users = members.get(membership.groupId) ?? new Set<string>();
            users.add(membership.userId);
            members.set(membership.groupId, users);
        }
        const hasMemberships = snapshot.memberships !== undefined;

        for (const group of snapshot.groups) {
            if (group.memberCount !== undefined || !hasMemberships) {
                this.index('group', { id: group.id, name: group.name, memberCount: group.memberCount ?? null });
                continue;
            }
            const memberIds = members.get(group.id) ?? new Set<string>();
            this.index('group', { id: group.id, name: group.name, memberCount: memberIds.size, memberIds });
        }
        for (const group of snapshot.dynamicGroups) {
            this.index('dynamic-group', { id: group.id, name: group.name, memberCount: group.memberCount ?? null });
        }
    }

    findGroup(key: GroupLookupKey): ResolvedGroup | undefined {
        const table = key.byId ? this.byId : this.byName;
        return table.get(`${key.kind}:${key.value}`);
    }

    activePrincipalCount(): number {
        return this.principals;
    }

    private index(kind: GroupKind, group: ResolvedGroup): void {
        this.byName.set(`${kind}:${group.name}`, group);
        this.byId.set(`${kind}:${group.id}`, group);
    }
}
