/**
 * @file DAG Validator
 *
 * Validates a list of job nodes for structural correctness: no duplicate
 * ids, no references to unknown jobs, no cycles.
 *
 * The definition builder cannot produce a cycle (dependencies must exist
 * before their dependents are added), but graphs assembled from raw nodes
 * or manifests can, so JobGraph runs these checks on construction.
 *
 * @module dag/graph
 */

import type { JobNode, ValidationResult } from './types.js';

/**
 * Validate job nodes for structural correctness.
 *
 * @param nodes - Nodes in insertion order
 * @returns ValidationResult with valid flag and error messages
 */
export function graph_validate(nodes: readonly JobNode<unknown>[]): ValidationResult {
    const errors: string[] = [];
    const seen = new Set<string>();

    for (const node of nodes) {
        if (seen.has(node.id)) {
            errors.push(`Duplicate job id '${node.id}'`);
        }
        seen.add(node.id);
    }

    for (const node of nodes) {
        for (const dependency of node.dependencies) {
            if (!seen.has(dependency)) {
                errors.push(`Job '${node.id}': references nonexistent dependency '${dependency}'`);
            }
        }
    }

    const cycle = cycle_find(nodes);
    if (cycle) {
        errors.push(`Cycle detected: ${cycle.join(' -> ')}`);
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

/**
 * Find one cycle, if any.
 *
 * Depth-first walk over dependency pointers. The returned path follows
 * the direction work flows (dependency first) and repeats its first id at
 * the end, e.g. `['a', 'b', 'c', 'a']`.
 *
 * @returns The cycle path, or null when the nodes are acyclic
 */
export function cycle_find(nodes: readonly JobNode<unknown>[]): string[] | null {
    const byId = new Map<string, JobNode<unknown>>();
    for (const node of nodes) {
        if (!byId.has(node.id)) byId.set(node.id, node);
    }

    const marks = new Map<string, 'visiting' | 'done'>();
    const stack: string[] = [];

    const visit = (id: string): string[] | null => {
        const mark = marks.get(id);
        if (mark === 'done') return null;
        if (mark === 'visiting') {
            return [...stack.slice(stack.indexOf(id)), id];
        }

        marks.set(id, 'visiting');
        stack.push(id);
        for (const dependency of byId.get(id)?.dependencies ?? []) {
            if (!byId.has(dependency)) continue;
            const found = visit(dependency);
            if (found) return found;
        }
        stack.pop();
        marks.set(id, 'done');
        return null;
    };

    for (const id of byId.keys()) {
        const found = visit(id);
        if (found) return found.reverse();
    }
    return null;
}
