#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { CrawlErrorContext } from '../domain/errors';
import { runCrawl } from '../index';

type CliErrorEnvelope = {
    event: 'crawl.failed';
    name: string;
    message: string;
    code?: string;
    context?: CrawlErrorContext;
    stack?: string;
};

const allowedNumberKeys = ['page', 'status', 'attempts', 'batch'] as const;
const allowedStringKeys = ['chunk', 'stage'] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null;

const extractContext = (value: unknown): CrawlErrorContext | undefined => {
    if (!isRecord(value)) return undefined;

    const context: CrawlErrorContext = {};
    for (const key of allowedNumberKeys) {
        const raw = value[key];
        if (typeof raw === 'number' && Number.isFinite(raw)) context[key] = raw;
    }
    for (const key of allowedStringKeys) {
        const raw = value[key];
        if (typeof raw === 'string') context[key] = raw;
    }

    return Object.keys(context).length > 0 ? context : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
    const debug = env.DEBUG?.toLowerCase();
    return debug === '1' || debug === 'true';
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
    const error = err instanceof Error ? err : new Error(String(err));
    const errorRecord = isRecord(err) ? err : {};

    const envelope: CliErrorEnvelope = {
        event: 'crawl.failed',
        name: error.name || 'Error',
        message: error.message
    };

    if (typeof errorRecord.code === 'string') {
        envelope.code = errorRecord.code;
    }

    const context = extractContext(errorRecord.context);
    if (context) {
        envelope.context = context;
    }

    if (includeStack && typeof error.stack === 'string') {
        envelope.stack = error.stack;
    }

    return envelope;
};

export const executeCrawlCli = async (): Promise<void> => {
    dotenv.config();
    try {
        const summary = await runCrawl();
        console.log(JSON.stringify({ event: 'crawl.completed', ...summary }));
    } catch (err) {
        console.error(JSON.stringify(buildCliErrorEnvelope(err, isDebugMode())));
        process.exitCode = 1;
    }
};

if (require.main === module) {
    void executeCrawlCli();
}
