/**
 * @file Shared Parsing Utilities
 *
 * @module dag/definition/parser
 */

import yaml from 'js-yaml';
import type { z } from 'zod';
import { ManifestError } from '../../errors.js';

/**
 * Parse a YAML string into a JS value.
 *
 * @throws ManifestError on YAML syntax errors
 */
export function yaml_parse(yamlStr: string): unknown {
    try {
        return yaml.load(yamlStr);
    } catch (e: unknown) {
        throw new ManifestError(e instanceof Error ? e.message : String(e));
    }
}

/**
 * Normalize the `needs` field into the canonical form.
 * - null/undefined → [] (root job)
 * - string → [string]
 * - array → array (as-is)
 */
export function needs_normalize(raw: string | string[] | null | undefined): string[] {
    if (raw === null || raw === undefined) return [];
    if (typeof raw === 'string') return [raw];
    return [...raw];
}

/** `[path] message; [path] message` */
export function issues_format(issues: readonly z.ZodIssue[]): string {
    return issues
        .map((issue: z.ZodIssue): string => `[${issue.path.join('.')}] ${issue.message}`)
        .join('; ');
}
