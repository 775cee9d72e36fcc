import { z } from 'zod';
import { UNPARSED_RATIONALE } from '../analyzers/policy-drift.js';
import { classifyGrant } from '../analyzers/risk-rules.js';
import { parseStatement } from '../analyzers/statement-parser.js';
import type { Classification, Grant, ParseFailure } from '../types/index.js';

export const classifyStatementSchema = z.object({
    statement: z
        .string()
        .min(1)
        .describe('A single OCI IAM policy statement, e.g. "Allow group Admins to manage all-resources in tenancy"'),
});

export type ClassifyStatementInput = z.infer<typeof classifyStatementSchema>;

export type ClassifyStatementResult =
    | ({ parsed: true; grant: Grant } & Classification)
    | ({ parsed: false; error: ParseFailure } & Classification);

/**
 * Classifies one statement without any directory context. Unparsable input
 * is reported as LOW, the same way a full evaluation reports it.
 */
export function classifyStatement(input: ClassifyStatementInput): ClassifyStatementResult {
    const result = parseStatement(input.statement);
    if (!result.ok) {
        return {
            parsed: false,
            error: { reason: result.error.reason, message: result.error.message },
            severity: 'LOW',
            ruleId: 'unparsed',
            rationale: UNPARSED_RATIONALE,
        };
    }
    return { parsed: true, grant: result.value, ...classifyGrant(result.value) };
}
