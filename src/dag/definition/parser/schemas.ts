/**
 * @file Manifest Schemas
 *
 * Zod runtime schemas for workflow manifests. Optional fields default so
 * that manifests only declare what differs from the default.
 *
 * @module dag/definition/parser/schemas
 */

import { z } from 'zod';

/**
 * Job types must be identifiers; the registry is keyed by them.
 */
const TypeSchema = z
    .string()
    .regex(/^[A-Za-z][A-Za-z0-9_.-]*$/, 'type has invalid format, must be an identifier');

/**
 * `needs` can be absent (root), a single id, or a list of ids.
 */
const NeedsSchema = z
    .union([z.string(), z.array(z.string()), z.null()])
    .optional();

export const JobEntrySchema = z.object({
    id:         z.string().min(1, 'job id is required'),
    type:       TypeSchema,
    name:       z.string().optional(),
    needs:      NeedsSchema,
    delay:      z.number().int().nonnegative().nullable().optional(),
    gated:      z.boolean().default(false),
    queue:      z.string().min(1).optional(),
    connection: z.string().min(1).optional(),
    parameters: z.record(z.string(), z.unknown()).default({}),
});

export type RawJob = z.infer<typeof JobEntrySchema>;

export const ManifestSchema = z.object({
    name:       z.string().min(1, 'manifest name is required'),
    subject:    z.object({ type: z.string().min(1), id: z.string().min(1) }).optional(),
    queue:      z.string().min(1).optional(),
    connection: z.string().min(1).optional(),
    jobs:       z.array(JobEntrySchema).min(1, 'manifest must have at least one job'),
});

export type RawManifest = z.infer<typeof ManifestSchema>;
