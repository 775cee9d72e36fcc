import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z
    .string()
    .trim()
    .toLowerCase()
    .transform((value, ctx) => {
        if (['1', 'true', 'yes', 'y', 'on'].includes(value)) return true;
        if (['0', 'false', 'no', 'n', 'off'].includes(value)) return false;
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Expected a boolean flag, received "${value}"`,
        });
        return z.NEVER;
    });

/**
 * Environment schema. Empty strings count as unset so a blank line in .env
 * falls back to the default.
 */
const envSchema = z.object({
    AUDIT_LOOKBACK_HOURS: z.coerce.number().int().positive().default(24),
    INCLUDE_SUBCOMPARTMENTS: booleanFlag.default('true'),
    OCI_REGION: z.string().trim().min(1).optional(),
    LOG_LEVEL: z
        .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
        .default('info'),
});

export interface AppConfig {
    auditLookbackHours: number;
    includeSubcompartments: boolean;
    region?: string;
    logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const parsed = envSchema.safeParse(cleaned);

    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }

    return {
        auditLookbackHours: parsed.data.AUDIT_LOOKBACK_HOURS,
        includeSubcompartments: parsed.data.INCLUDE_SUBCOMPARTMENTS,
        region: parsed.data.OCI_REGION,
        logLevel: parsed.data.LOG_LEVEL,
    };
}

export const config = loadConfig();
