import { ParseError } from '../errors.js';
import type { Grant, NamedSubjectType, Result, Scope, Subject, Verb } from '../types/index.js';

const VERBS: ReadonlySet<string> = new Set<Verb>(['inspect', 'read', 'use', 'manage']);

const NAMED_SUBJECTS: ReadonlySet<string> = new Set<NamedSubjectType>([
    'group',
    'dynamic-group',
    'service',
]);

/**
 * Parses a single OCI IAM policy statement:
 *
 *   Allow <subject> to <verb> <resource-type> [in tenancy | in compartment [id] <scope>] [where <condition>]
 *
 * Keywords are matched case-insensitively; group, service and compartment
 * names keep their case. The condition is kept as raw text.
 */
export function parseStatement(raw: string): Result<Grant, ParseError> {
    const { head, condition } = splitCondition(raw.trim());
    const tokens = head.split(/\s+/).filter((t) => t.length > 0);

    if (tokens.length === 0 || !isKeyword(tokens[0], 'allow')) {
        return fail('MalformedGrammar', `Statement must start with "Allow": ${raw}`);
    }

    const toIndex = tokens.findIndex((t, i) => i > 0 && isKeyword(t, 'to'));
    if (toIndex === -1) {
        if (tokens.length === 1) {
            return fail('MissingSubject', 'Statement has no subject');
        }
        return fail('MalformedGrammar', 'Statement is missing the "to" keyword');
    }

    const subject = parseSubject(tokens.slice(1, toIndex));
    if (!subject.ok) return subject;

    const verbToken = tokens[toIndex + 1];
    if (verbToken === undefined) {
        return fail('MalformedGrammar', 'Statement is missing a verb');
    }
    const verb = verbToken.toLowerCase();
    if (!isVerb(verb)) {
        return fail('UnsupportedVerb', `Unsupported verb "${verbToken}"`);
    }

    const resourceToken = tokens[toIndex + 2];
    if (resourceToken === undefined) {
        return fail('MalformedGrammar', 'Statement is missing a resource-type');
    }

    const scope = parseScope(tokens.slice(toIndex + 3));
    if (!scope.ok) return scope;

    const grant: Grant = {
        verb,
        resourceType: resourceToken.toLowerCase(),
        subject: subject.value,
        scope: scope.value,
        ...(condition !== undefined ? { condition } : {}),
    };
    return { ok: true, value: grant };
}

/**
 * Returns the group-like names a grant refers to, paired with their subject
 * kind. Service principals and wildcard subjects have none.
 */
export function referencedGroups(
    grant: Grant
): { type: 'group' | 'dynamic-group'; name: string; byId: boolean }[] {
    const { subject } = grant;
    if (subject.type !== 'group' && subject.type !== 'dynamic-group') return [];
    const type = subject.type;
    return subject.names.map((name) => ({ type, name, byId: subject.byId }));
}

function splitCondition(statement: string): { head: string; condition?: string } {
    const match = /\s+where\s+/i.exec(statement);
    if (!match) return { head: statement };

    const condition = statement.slice(match.index + match[0].length).trim();
    return {
        head: statement.slice(0, match.index),
        ...(condition.length > 0 ? { condition } : {}),
    };
}

function parseSubject(tokens: string[]): Result<Subject, ParseError> {
    const [keywordToken, ...rest] = tokens;
    if (keywordToken === undefined) {
        return fail('MissingSubject', 'Statement has no subject');
    }

    const keyword = keywordToken.toLowerCase();
    if (keyword === 'any-user' || keyword === 'any-group') {
        if (rest.length > 0) {
            return fail('MalformedGrammar', `Unexpected tokens after ${keyword}: ${rest.join(' ')}`);
        }
        return { ok: true, value: { type: keyword } };
    }

    if (!isNamedSubject(keyword)) {
        return fail('MalformedGrammar', `Unknown subject type "${keywordToken}"`);
    }

    const byId = rest.length > 0 && isKeyword(rest[0], 'id');
    const names = (byId ? rest.slice(1) : rest)
        .join(' ')
        .split(',')
        .map((name) => unquoteName(name.trim()))
        .filter((name) => name.length > 0);

    if (names.length === 0) {
        return fail('MissingSubject', `No ${keyword} name given`);
    }
    return { ok: true, value: { type: keyword, names, byId } };
}

function parseScope(tokens: string[]): Result<Scope, ParseError> {
    if (tokens.length === 0) {
        return { ok: true, value: { kind: 'unspecified' } };
    }
    if (!isKeyword(tokens[0], 'in')) {
        return fail('MalformedGrammar', `Unexpected token "${tokens[0]}" after resource-type`);
    }

    const location = tokens.slice(1);
    if (location.length === 1 && isKeyword(location[0], 'tenancy')) {
        return { ok: true, value: { kind: 'tenancy' } };
    }
    if (location.length >= 2 && isKeyword(location[0], 'compartment')) {
        const byId = isKeyword(location[1], 'id');
        const target = byId ? location.slice(2) : location.slice(1);
        if (target.length === 1) {
            return { ok: true, value: { kind: 'compartment', target: unquoteName(target[0]), byId } };
        }
    }
    return fail('MalformedGrammar', `Invalid location clause "in ${location.join(' ')}"`);
}

/**
 * Strips quotes and an identity-domain prefix: `'Default'/'Admins'` → `Admins`.
 */
function unquoteName(name: string): string {
    const slash = name.lastIndexOf('/');
    const local = slash === -1 ? name : name.slice(slash + 1);
    return local.replace(/^'(.*)'$/, '$1');
}

function isKeyword(token: string | undefined, keyword: string): boolean {
    return token !== undefined && token.toLowerCase() === keyword;
}

function isVerb(value: string): value is Verb {
    return VERBS.has(value);
}

function isNamedSubject(value: string): value is NamedSubjectType {
    return NAMED_SUBJECTS.has(value);
}

function fail(reason: ParseError['reason'], message: string): { ok: false; error: ParseError } {
    return { ok: false, error: new ParseError(reason, message) };
}
