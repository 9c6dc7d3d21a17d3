/**
 * @file Job Graph
 *
 * Immutable directed acyclic graph of job nodes. Every other layer (the
 * definition builder, the resolver, the engine, the visualizer) queries
 * topology through this class.
 *
 * Adjacency is derived once from each node's backward `dependencies`
 * pointers; insertion order is kept and used as the tie-break for
 * dispatch and topological order.
 *
 * @module dag/graph
 */

import type { GraphEdge, JobNode } from './types.js';
import { cycle_find } from './validator.js';
import {
    CycleDetectedError,
    DuplicateJobError,
    UnresolvableDependencyError,
} from '../errors.js';

export class JobGraph<P = unknown> {
    private readonly nodes: Map<string, Readonly<JobNode<P>>>;
    private readonly order: readonly string[];
    private readonly dependents: Map<string, string[]>;

    private constructor(nodes: Readonly<JobNode<P>>[]) {
        this.nodes = new Map(nodes.map((node: Readonly<JobNode<P>>): [string, Readonly<JobNode<P>>] => [node.id, node]));
        this.order = Object.freeze(nodes.map((node: Readonly<JobNode<P>>): string => node.id));
        this.dependents = new Map(this.order.map((id: string): [string, string[]] => [id, []]));
        for (const node of nodes) {
            for (const dependency of node.dependencies) {
                this.dependents.get(dependency)?.push(node.id);
            }
        }
    }

    /**
     * Build a frozen graph from nodes in insertion order.
     *
     * @throws DuplicateJobError if two nodes share an id
     * @throws UnresolvableDependencyError if a dependency id is unknown
     * @throws CycleDetectedError if the nodes contain a cycle
     */
    static graph_fromNodes<P>(nodes: readonly JobNode<P>[]): JobGraph<P> {
        const ids = new Set<string>();
        for (const node of nodes) {
            if (ids.has(node.id)) throw new DuplicateJobError(node.id);
            ids.add(node.id);
        }
        for (const node of nodes) {
            for (const dependency of node.dependencies) {
                if (!ids.has(dependency)) throw new UnresolvableDependencyError(node.id, dependency);
            }
        }
        const cycle = cycle_find(nodes);
        if (cycle) throw new CycleDetectedError(cycle);

        const frozen = nodes.map((node: JobNode<P>): Readonly<JobNode<P>> => Object.freeze({
            ...node,
            dependencies: Object.freeze([...new Set(node.dependencies)]),
            queue: Object.freeze({ ...node.queue }),
        }));
        return new JobGraph(frozen);
    }

    get size(): number {
        return this.order.length;
    }

    node_has(id: string): boolean {
        return this.nodes.has(id);
    }

    node_get(id: string): Readonly<JobNode<P>> | undefined {
        return this.nodes.get(id);
    }

    /** All nodes in insertion order. */
    nodes_list(): Readonly<JobNode<P>>[] {
        return this.order.map((id: string): Readonly<JobNode<P>> => this.node_require(id));
    }

    /** Nodes without dependencies, in insertion order. */
    roots_list(): string[] {
        return this.order.filter((id: string): boolean => this.node_require(id).dependencies.length === 0);
    }

    /** Nodes nothing depends on, in insertion order. */
    terminals_list(): string[] {
        return this.order.filter((id: string): boolean => (this.dependents.get(id) ?? []).length === 0);
    }

    /** Direct dependents of a node, in insertion order. */
    dependents_list(id: string): string[] {
        return [...(this.dependents.get(id) ?? [])];
    }

    /** Every node reachable by following dependents from `id` (excluding `id`). */
    descendants_resolve(id: string): Set<string> {
        return this.closure_walk(id, (current: string): readonly string[] => this.dependents.get(current) ?? []);
    }

    /** Every node `id` transitively depends on (excluding `id`). */
    ancestors_resolve(id: string): Set<string> {
        return this.closure_walk(id, (current: string): readonly string[] => this.nodes.get(current)?.dependencies ?? []);
    }

    edges_list(): GraphEdge[] {
        const edges: GraphEdge[] = [];
        for (const id of this.order) {
            for (const dependency of this.node_require(id).dependencies) {
                edges.push({ from: dependency, to: id });
            }
        }
        return edges;
    }

    /**
     * Topological order via Kahn's algorithm, roots first. Among nodes
     * that become available together, insertion order wins.
     */
    topological_order(): string[] {
        const inDegree = new Map<string, number>();
        for (const id of this.order) {
            inDegree.set(id, this.node_require(id).dependencies.length);
        }

        const position = new Map(this.order.map((id: string, index: number): [string, number] => [id, index]));
        const queue: string[] = this.roots_list();
        const result: string[] = [];

        while (queue.length > 0) {
            queue.sort((a: string, b: string): number => (position.get(a) ?? 0) - (position.get(b) ?? 0));
            const current = queue.shift();
            if (current === undefined) break;
            result.push(current);

            for (const dependent of this.dependents.get(current) ?? []) {
                const remaining = (inDegree.get(dependent) ?? 1) - 1;
                inDegree.set(dependent, remaining);
                if (remaining === 0) queue.push(dependent);
            }
        }

        return result;
    }

    private node_require(id: string): Readonly<JobNode<P>> {
        const node = this.nodes.get(id);
        if (!node) throw new Error(`JobGraph invariant broken: '${id}' is ordered but not stored`);
        return node;
    }

    private closure_walk(start: string, next: (id: string) => readonly string[]): Set<string> {
        const seen = new Set<string>();
        const stack: string[] = [...next(start)];
        while (stack.length > 0) {
            const current = stack.pop();
            if (current === undefined || seen.has(current)) continue;
            seen.add(current);
            stack.push(...next(current));
        }
        return seen;
    }
}
