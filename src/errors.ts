import type { ParseErrorReason } from './types/index.js';

export type PolicyEngineErrorKind = 'ParseError' | 'GroupNotFound' | 'SnapshotMissing' | 'InvalidInput';

/**
 * Base class for engine errors. `kind` lets callers tell "skip this item"
 * failures apart from "abort the run" failures without instanceof chains.
 */
export abstract class PolicyEngineError extends Error {
    abstract readonly kind: PolicyEngineErrorKind;
}

export class ParseError extends PolicyEngineError {
    readonly kind = 'ParseError';

    constructor(
        readonly reason: ParseErrorReason,
        message: string
    ) {
        super(message);
        this.name = 'ParseError';
    }
}

export class GroupNotFoundError extends PolicyEngineError {
    readonly kind = 'GroupNotFound';

    constructor(readonly groupRef: string) {
        super(`Group not found in directory snapshot: ${groupRef}`);
        this.name = 'GroupNotFoundError';
    }
}

export class SnapshotMissingError extends PolicyEngineError {
    readonly kind = 'SnapshotMissing';

    constructor(detail: string) {
        super(`Directory snapshot unavailable: ${detail}`);
        this.name = 'SnapshotMissingError';
    }
}

export class InvalidInputError extends PolicyEngineError {
    readonly kind = 'InvalidInput';

    constructor(message: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

export function isPolicyEngineError(error: unknown): error is PolicyEngineError {
    return error instanceof PolicyEngineError;
}
