import pino from 'pino';
import { config } from './config.js';

/**
 * Structured logger. Writes to stderr: stdout carries the MCP stdio transport.
 */
export const logger = pino(
    { name: 'iam-policy-drift-engine', level: config.logLevel },
    pino.destination(2)
);

export type Logger = typeof logger;
