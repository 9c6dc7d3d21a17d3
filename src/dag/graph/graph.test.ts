/**
 * @file Graph Layer Tests
 *
 * JobGraph construction and topology queries, plus the non-throwing
 * validator.
 *
 * @module dag/graph
 */

import { describe, it, expect } from 'vitest';
import type { JobNode } from './types.js';
import { JobGraph } from './JobGraph.js';
import { graph_validate, cycle_find } from './validator.js';
import {
    CycleDetectedError,
    DuplicateJobError,
    UnresolvableDependencyError,
} from '../errors.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

function node_make(id: string, dependencies: string[] = [], gated: boolean = false): JobNode<string> {
    return {
        id,
        name: id,
        type: 'Stub',
        payload: `payload-${id}`,
        dependencies,
        delay: null,
        queue: { queue: null, connection: null },
        gated,
    };
}

/** A, B roots; C needs A and B; D needs A. */
function diamondish_build(): JobGraph<string> {
    return JobGraph.graph_fromNodes([
        node_make('A'),
        node_make('B'),
        node_make('C', ['A', 'B']),
        node_make('D', ['A']),
    ]);
}

// ═══════════════════════════════════════════════════════════════════
// JobGraph
// ═══════════════════════════════════════════════════════════════════

describe('dag/graph/JobGraph', (): void => {
    it('should keep nodes in insertion order', (): void => {
        const graph = diamondish_build();
        expect(graph.size).toBe(4);
        expect(graph.nodes_list().map((n): string => n.id)).toEqual(['A', 'B', 'C', 'D']);
    });

    it('should identify roots and terminals', (): void => {
        const graph = diamondish_build();
        expect(graph.roots_list()).toEqual(['A', 'B']);
        expect(graph.terminals_list()).toEqual(['C', 'D']);
    });

    it('should list direct dependents in insertion order', (): void => {
        const graph = diamondish_build();
        expect(graph.dependents_list('A')).toEqual(['C', 'D']);
        expect(graph.dependents_list('B')).toEqual(['C']);
        expect(graph.dependents_list('C')).toEqual([]);
    });

    it('should resolve transitive descendants and ancestors', (): void => {
        const graph = JobGraph.graph_fromNodes([
            node_make('a'),
            node_make('b', ['a']),
            node_make('c', ['b']),
            node_make('x'),
        ]);
        expect([...graph.descendants_resolve('a')].sort()).toEqual(['b', 'c']);
        expect([...graph.ancestors_resolve('c')].sort()).toEqual(['a', 'b']);
        expect(graph.descendants_resolve('x').size).toBe(0);
    });

    it('should derive edges from dependency to dependent', (): void => {
        expect(diamondish_build().edges_list()).toEqual([
            { from: 'A', to: 'C' },
            { from: 'B', to: 'C' },
            { from: 'A', to: 'D' },
        ]);
    });

    it('should order topologically with insertion order as tie-break', (): void => {
        expect(diamondish_build().topological_order()).toEqual(['A', 'B', 'C', 'D']);

        const graph = JobGraph.graph_fromNodes([
            node_make('late', ['early']),
            node_make('early'),
        ]);
        expect(graph.topological_order()).toEqual(['early', 'late']);
    });

    it('should de-duplicate dependencies and freeze nodes', (): void => {
        const graph = JobGraph.graph_fromNodes([node_make('A'), node_make('B', ['A', 'A'])]);
        const node = graph.node_get('B');
        expect(node?.dependencies).toEqual(['A']);
        expect(Object.isFrozen(node)).toBe(true);
        expect(Object.isFrozen(node?.dependencies)).toBe(true);
    });

    it('should answer node lookups', (): void => {
        const graph = diamondish_build();
        expect(graph.node_has('C')).toBe(true);
        expect(graph.node_has('Z')).toBe(false);
        expect(graph.node_get('Z')).toBeUndefined();
        expect(graph.node_get('C')?.payload).toBe('payload-C');
    });

    it('should reject duplicate ids', (): void => {
        expect((): JobGraph<string> => JobGraph.graph_fromNodes([node_make('A'), node_make('A')]))
            .toThrow(DuplicateJobError);
    });

    it('should reject unknown dependencies', (): void => {
        expect((): JobGraph<string> => JobGraph.graph_fromNodes([node_make('A', ['ghost'])]))
            .toThrow("Job 'A' depends on 'ghost', which has not been added");
        expect((): JobGraph<string> => JobGraph.graph_fromNodes([node_make('A', ['ghost'])]))
            .toThrow(UnresolvableDependencyError);
    });

    it('should reject cycles and report the path', (): void => {
        const nodes = [node_make('a', ['c']), node_make('b', ['a']), node_make('c', ['b'])];
        try {
            JobGraph.graph_fromNodes(nodes);
            expect.unreachable('cycle was accepted');
        } catch (e: unknown) {
            expect(e).toBeInstanceOf(CycleDetectedError);
            if (e instanceof CycleDetectedError) {
                expect(e.cycle).toEqual(['a', 'b', 'c', 'a']);
                expect(e.message).toBe('Cycle detected: a -> b -> c -> a');
                expect(e.code).toBe('CYCLE_DETECTED');
            }
        }
    });

    it('should accept an empty graph', (): void => {
        const graph = JobGraph.graph_fromNodes<string>([]);
        expect(graph.size).toBe(0);
        expect(graph.roots_list()).toEqual([]);
        expect(graph.topological_order()).toEqual([]);
    });
});

// ═══════════════════════════════════════════════════════════════════
// Validator
// ═══════════════════════════════════════════════════════════════════

describe('dag/graph/validator', (): void => {
    it('should accept a valid graph', (): void => {
        const result = graph_validate([node_make('A'), node_make('B', ['A'])]);
        expect(result).toEqual({ valid: true, errors: [] });
    });

    it('should collect every problem without throwing', (): void => {
        const result = graph_validate([
            node_make('A'),
            node_make('A'),
            node_make('B', ['missing']),
        ]);
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
            "Duplicate job id 'A'",
            "Job 'B': references nonexistent dependency 'missing'",
        ]);
    });

    it('should report a self-dependency as a cycle', (): void => {
        const result = graph_validate([node_make('A', ['A'])]);
        expect(result.errors).toEqual(['Cycle detected: A -> A']);
    });

    it('should return null for acyclic nodes', (): void => {
        expect(cycle_find([node_make('A'), node_make('B', ['A'])])).toBeNull();
    });
});
