#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { config } from './config.js';
import { isPolicyEngineError } from './errors.js';
import { logger } from './logger.js';
import { classifyStatement, classifyStatementSchema } from './tools/classify-statement.js';
import { evaluateDrift, evaluateDriftSchema } from './tools/evaluate-drift.js';

const server = new Server(
    { name: 'iam-policy-drift-engine', version: '1.0.0' },
    { capabilities: { tools: {} } }
);

/**
 * List all available tools.
 */
server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
        {
            name: 'evaluate_policy_drift',
            description:
                'Evaluates every statement of an OCI IAM directory snapshot. ' +
                'Classifies each grant as CRITICAL/HIGH/MEDIUM/LOW, resolves its blast radius ' +
                'from group membership counts, and flags findings touched by identity audit ' +
                'events inside the lookback window. Returns findings ordered by severity ' +
                'with per-severity and per-compartment summaries.',
            inputSchema: {
                type: 'object' as const,
                properties: {
                    snapshotJson: {
                        type: 'string',
                        description:
                            'Directory snapshot JSON (tenancyId, activePrincipalCount, compartments, policies, groups, dynamicGroups)',
                    },
                    auditEventsJson: {
                        type: 'string',
                        description: 'Optional JSON array of identity audit events',
                    },
                    lookbackHours: {
                        type: 'integer',
                        description: `Correlation window in hours (default ${config.auditLookbackHours})`,
                    },
                },
                required: ['snapshotJson'],
            },
        },
        {
            name: 'classify_policy_statement',
            description:
                'Parses a single OCI IAM policy statement and returns its structured grant, ' +
                'severity, matching rule and rationale.',
            inputSchema: {
                type: 'object' as const,
                properties: {
                    statement: {
                        type: 'string',
                        description: 'The policy statement to classify',
                    },
                },
                required: ['statement'],
            },
        },
    ],
}));

/**
 * Handle tool execution requests: validate, run, and return JSON text.
 */
server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    let run: (() => unknown) | undefined;
    if (name === 'evaluate_policy_drift') {
        run = () => evaluateDrift(evaluateDriftSchema.parse(args), config);
    } else if (name === 'classify_policy_statement') {
        run = () => classifyStatement(classifyStatementSchema.parse(args));
    }

    if (run) {
        try {
            const result = run();
            return {
                content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
            };
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error occurred';
            logger.warn(
                { tool: name, kind: isPolicyEngineError(error) ? error.kind : 'Unexpected' },
                message
            );
            return {
                content: [{ type: 'text', text: `Error: ${message}` }],
                isError: true,
            };
        }
    }

    throw new Error(`Unknown tool: ${name}`);
});

/**
 * Start the MCP server using stdio transport.
 */
async function main(): Promise<void> {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info({ lookbackHours: config.auditLookbackHours }, 'IAM policy drift MCP server running');
}

main().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Failed to start MCP server');
    process.exitCode = 1;
});
