import { GroupNotFoundError } from '../errors.js';
import type { BlastRadius, Grant, Result } from '../types/index.js';
import type { GroupDirectory, GroupLookupKey, ResolvedGroup } from './directory.js';
import { referencedGroups } from './statement-parser.js';

export const UNRESOLVED_NOTE = 'unresolved group reference';
export const UNCOUNTED_NOTE = 'member count unavailable';

/**
 * Maps a grant's subject to the number of principals it reaches.
 *
 * One instance per run: lookups are cached by group kind and key, so the
 * directory is asked about each group at most once.
 */
export class BlastRadiusResolver {
    private readonly cache = new Map<string, Result<ResolvedGroup, GroupNotFoundError>>();

    constructor(private readonly directory: GroupDirectory) {}

    resolve(grant: Grant): BlastRadius {
        switch (grant.subject.type) {
            case 'any-user':
                return { count: this.directory.activePrincipalCount(), unresolved: [] };
            case 'any-group':
                return {
                    count: this.directory.activePrincipalCount(),
                    unresolved: [],
                    note: 'any-group approximated by tenancy principals',
                };
            case 'service':
                return { count: null, unresolved: [], note: 'service principal' };
        }

        const unresolved: string[] = [];
        const groups = new Map<string, ResolvedGroup>();

        for (const ref of referencedGroups(grant)) {
            const lookup = this.lookup({ kind: ref.type, value: ref.name, byId: ref.byId });
            if (!lookup.ok) {
                if (!unresolved.includes(lookup.error.groupRef)) unresolved.push(lookup.error.groupRef);
            } else {
                groups.set(`${ref.type}:${lookup.value.id}`, lookup.value);
            }
        }

        if (unresolved.length > 0) {
            return { count: null, unresolved, note: UNRESOLVED_NOTE };
        }
        return countMembers([...groups.values()]);
    }

    private lookup(key: GroupLookupKey): Result<ResolvedGroup, GroupNotFoundError> {
        const cacheKey = `${key.kind}:${key.byId ? 'id' : 'name'}:${key.value}`;
        const cached = this.cache.get(cacheKey);
        if (cached) return cached;

        const group = this.directory.findGroup(key);
        const result: Result<ResolvedGroup, GroupNotFoundError> = group
            ? { ok: true, value: group }
            : { ok: false, error: new GroupNotFoundError(key.value) };

        this.cache.set(cacheKey, result);
        return result;
    }
}

/**
 * Counts the principals reached by a set of distinct groups. A user in several
 * of them is counted once when every group carries its member ids; otherwise
 * the per-group counts are added.
 */
function countMembers(groups: ResolvedGroup[]): BlastRadius {
    const users = new Set<string>();
    let total = 0;
    let overlapKnown = true;

    for (const group of groups) {
        if (group.memberCount === null) {
            return { count: null, unresolved: [], note: UNCOUNTED_NOTE };
        }
        total += group.memberCount;
        if (group.memberIds) {
            for (const id of group.memberIds) users.add(id);
        } else {
            overlapKnown = false;
        }
    }

    return { count: overlapKnown ? users.size : total, unresolved: [] };
}
