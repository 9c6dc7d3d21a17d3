/**
 * @file Record Schemas
 *
 * Zod schemas for records read back from a storage backend. Anything that
 * fails validation is reported as RecordCorruptError with every issue.
 *
 * @module dag/store
 */

import { z } from 'zod';
import type { JobRecord, WorkflowRecord } from './types.js';
import { RecordCorruptError } from '../errors.js';

const TimestampSchema = z.string().min(1).nullable();

export const SubjectRefSchema = z.object({
    type: z.string().min(1),
    id: z.string().min(1),
});

export const WorkflowRecordSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    jobCount: z.number().int().nonnegative(),
    jobsProcessed: z.number().int().nonnegative(),
    jobsFailed: z.number().int().nonnegative(),
    finishedJobIds: z.array(z.string()),
    createdAt: z.string().min(1),
    finishedAt: TimestampSchema,
    cancelledAt: TimestampSchema,
    subject: SubjectRefSchema.nullable(),
});

export const JobExceptionSchema = z.object({
    name: z.string(),
    message: z.string(),
    stack: z.string().nullable(),
});

export const JobRecordSchema = z.object({
    workflowId: z.string().min(1),
    jobId: z.string().min(1),
    sequence: z.number().int().nonnegative(),
    name: z.string(),
    payloadType: z.string(),
    dependencies: z.array(z.string()),
    delay: z.number().nonnegative().nullable(),
    queue: z.string().nullable(),
    connection: z.string().nullable(),
    gated: z.boolean(),
    createdAt: z.string().min(1),
    startedAt: TimestampSchema,
    gatedAt: TimestampSchema,
    finishedAt: TimestampSchema,
    failedAt: TimestampSchema,
    exception: JobExceptionSchema.nullable(),
    attempts: z.number().int().nonnegative(),
});

/**
 * Parse raw JSON text against a schema.
 *
 * @throws RecordCorruptError on malformed JSON or schema violations
 */
function record_parse<T>(schema: z.ZodType<T>, path: string, raw: string): T {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (e: unknown) {
        throw new RecordCorruptError(path, e instanceof Error ? e.message : String(e));
    }

    const result = schema.safeParse(json);
    if (!result.success) {
        const detail = result.error.issues
            .map((issue: z.ZodIssue): string => `[${issue.path.join('.')}] ${issue.message}`)
            .join('; ');
        throw new RecordCorruptError(path, detail);
    }
    return result.data;
}

export function workflowRecord_parse(path: string, raw: string): WorkflowRecord {
    return record_parse(WorkflowRecordSchema, path, raw);
}

export function jobRecord_parse(path: string, raw: string): JobRecord {
    return record_parse(JobRecordSchema, path, raw);
}
