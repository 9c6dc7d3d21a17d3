/**
 * @file Workflow Definition Builder
 *
 * Fluent builder that turns `job_add` / `workflow_add` calls into a sealed
 * JobGraph. Dependencies are resolved at the moment a job is added, so
 * every dependency must already exist and the graph can only grow
 * forwards. `graph_build()` seals the definition.
 *
 * Nested workflows are inlined: each child job id is prefixed with
 * `<nestedId>.`, child roots inherit the nested workflow's dependencies,
 * and depending on the nested id means depending on the child's
 * terminal jobs.
 *
 * @module dag/definition
 */

import type { JobNode } from '../graph/types.js';
import type { JobRecord, SubjectRef, WorkflowRecord } from '../store/types.js';
import type { DefinitionInfo, JobDraft, WorkflowDraft } from '../events/types.js';
import type { DependencyRef } from './dependency.js';
import type { TypeIdentity } from './identity.js';
import { JobGraph } from '../graph/JobGraph.js';
import { EventBus } from '../events/EventBus.js';
import { WorkflowEvents } from '../events/types.js';
import { ConditionalDependency } from './dependency.js';
import { typeIdentity_default } from './identity.js';
import {
    DefinitionSealedError,
    DuplicateJobError,
    UnresolvableDependencyError,
} from '../errors.js';

// ─── Options ────────────────────────────────────────────────────

/**
 * Per-job options.
 *
 * @property id - Explicit job id; defaults to the payload's type identity
 * @property name - Display name; defaults to the type identity
 * @property delay - Milliseconds, or a Date converted relative to now
 * @property gated - Hold the job for a manual start once it is ready
 * @property queue - Queue name for dispatch; engine default when absent
 * @property connection - Connection name for dispatch
 */
export interface JobOptions {
    id?: string;
    name?: string;
    delay?: number | Date | null;
    gated?: boolean;
    queue?: string;
    connection?: string;
}

export interface NestedWorkflowOptions {
    id?: string;
}

export type ThenCallback = (workflow: Readonly<WorkflowRecord>) => void | Promise<void>;

export type CatchCallback = (
    workflow: Readonly<WorkflowRecord>,
    job: Readonly<JobRecord>,
    error: unknown,
) => void | Promise<void>;

export interface DefinitionOptions {
    /** Bus that receives JobAdding/JobAdded/WorkflowAdding/WorkflowAdded. */
    events?: EventBus;
    identity?: TypeIdentity;
    /** Entity the workflow is about. */
    subject?: SubjectRef | null;
    /** Default queue/connection for every job of this definition. */
    queue?: string | null;
    connection?: string | null;
    clock?: () => Date;
}

// ─── Builder ────────────────────────────────────────────────────

export class WorkflowDefinition<P = unknown> {
    readonly name: string;
    readonly subject: SubjectRef | null;
    readonly events: EventBus;

    private readonly identity: TypeIdentity;
    private readonly clock: () => Date;
    private readonly defaultQueue: string | null;
    private readonly defaultConnection: string | null;

    private readonly nodes: JobNode<P>[] = [];
    private readonly nodeIndex = new Map<string, JobNode<P>>();
    /** nested workflow id → terminal job ids it expands to */
    private readonly nested = new Map<string, string[]>();
    /** nested workflow id → dependencies it was added with */
    private readonly nestedDependencies = new Map<string, string[]>();
    private readonly thenCallbacks: ThenCallback[] = [];
    private readonly catchCallbacks: CatchCallback[] = [];
    private sealed: JobGraph<P> | null = null;

    constructor(name: string = '', options: DefinitionOptions = {}) {
        this.name = name;
        this.subject = options.subject ?? null;
        this.events = options.events ?? new EventBus();
        this.identity = options.identity ?? typeIdentity_default;
        this.clock = options.clock ?? ((): Date => new Date());
        this.defaultQueue = options.queue ?? null;
        this.defaultConnection = options.connection ?? null;
    }

    info(): DefinitionInfo {
        return { name: this.name, subject: this.subject };
    }

    /**
     * Add a job.
     *
     * @returns The id the job was added under
     * @throws UnresolvableDependencyError if a dependency has not been added
     * @throws DuplicateJobError if the id is taken
     * @throws DefinitionSealedError after graph_build()
     */
    job_add(payload: P, dependencies: readonly DependencyRef[] = [], options: JobOptions = {}): string {
        this.mutable_check();
        const typeName = this.identity(payload);
        const initialId = options.id ?? typeName;
        const resolved = this.dependencies_resolve(initialId, dependencies);

        const draft: JobDraft = {
            id: initialId,
            name: options.name ?? typeName,
            delay: this.delay_normalize(options.delay ?? null),
        };
        this.events.emit(WorkflowEvents.JOB_ADDING, {
            definition: this.info(),
            payload,
            dependencies: resolved,
            draft,
        });

        if (this.id_taken(draft.id)) throw new DuplicateJobError(draft.id);

        const node: JobNode<P> = {
            id: draft.id,
            name: draft.name,
            type: typeName,
            payload,
            dependencies: resolved,
            delay: draft.delay,
            queue: {
                queue: options.queue ?? this.defaultQueue,
                connection: options.connection ?? this.defaultConnection,
            },
            gated: options.gated ?? false,
        };
        this.node_push(node);
        this.events.emit(WorkflowEvents.JOB_ADDED, { definition: this.info(), node });
        return node.id;
    }

    /** job_add with `gated: true`. */
    gatedJob_add(payload: P, dependencies: readonly DependencyRef[] = [], options: Omit<JobOptions, 'gated'> = {}): string {
        return this.job_add(payload, dependencies, { ...options, gated: true });
    }

    /**
     * Inline another definition's jobs. Seals the child.
     *
     * @returns The nested workflow id
     */
    workflow_add(child: WorkflowDefinition<P>, dependencies: readonly DependencyRef[] = [], options: NestedWorkflowOptions = {}): string {
        this.mutable_check();
        const childGraph = child.graph_build();
        const initialId = options.id ?? (child.name || this.identity(child));
        const resolved = this.dependencies_resolve(initialId, dependencies);

        const draft: WorkflowDraft = { id: initialId };
        this.events.emit(WorkflowEvents.WORKFLOW_ADDING, {
            definition: this.info(),
            child: child.info(),
            dependencies: resolved,
            draft,
        });

        if (this.id_taken(draft.id)) throw new DuplicateJobError(draft.id);

        const prefix = `${draft.id}.`;
        for (const node of childGraph.nodes_list()) {
            if (this.id_taken(prefix + node.id)) throw new DuplicateJobError(prefix + node.id);
        }

        const jobIds: string[] = [];
        for (const node of childGraph.nodes_list()) {
            const id = prefix + node.id;
            this.node_push({
                ...node,
                id,
                dependencies: node.dependencies.length === 0
                    ? [...resolved]
                    : node.dependencies.map((dependency: string): string => prefix + dependency),
                queue: { ...node.queue },
            });
            jobIds.push(id);
        }

        this.nested.set(draft.id, childGraph.terminals_list().map((id: string): string => prefix + id));
        for (const [innerId, terminals] of child.nested) {
            this.nested.set(prefix + innerId, terminals.map((id: string): string => prefix + id));
        }
        this.nestedDependencies.set(draft.id, resolved);

        this.events.emit(WorkflowEvents.WORKFLOW_ADDED, { definition: this.info(), id: draft.id, jobIds });
        return draft.id;
    }

    /**
     * Run `callback` against this definition only when `condition` holds.
     */
    when(condition: boolean | (() => boolean), callback: (definition: this) => void): this {
        const holds = typeof condition === 'function' ? condition() : condition;
        if (holds) callback(this);
        return this;
    }

    /** Register a callback for when every job has finished. */
    then(callback: ThenCallback): this {
        this.mutable_check();
        this.thenCallbacks.push(callback);
        return this;
    }

    /** Register a callback for each job failure. */
    catch(callback: CatchCallback): this {
        this.mutable_check();
        this.catchCallbacks.push(callback);
        return this;
    }

    /**
     * Seal the definition and return its graph. Repeated calls return the
     * same graph.
     *
     * @throws CycleDetectedError if the collected nodes contain a cycle
     */
    graph_build(): JobGraph<P> {
        if (this.sealed) return this.sealed;
        this.sealed = JobGraph.graph_fromNodes(this.nodes);
        return this.sealed;
    }

    isSealed(): boolean {
        return this.sealed !== null;
    }

    thenCallbacks_list(): readonly ThenCallback[] {
        return [...this.thenCallbacks];
    }

    catchCallbacks_list(): readonly CatchCallback[] {
        return [...this.catchCallbacks];
    }

    jobIds_list(): string[] {
        return this.nodes.map((node: JobNode<P>): string => node.id);
    }

    /**
     * Whether a job with this id exists, optionally with exactly these
     * dependencies (order-insensitive; nested ids expand) and this delay.
     */
    job_has(id: string, dependencies?: readonly string[], delay?: number | null): boolean {
        const node = this.nodeIndex.get(id);
        if (!node) return false;
        if (dependencies !== undefined && !this.set_equal(node.dependencies, this.ids_expand(dependencies))) {
            return false;
        }
        if (delay !== undefined && node.delay !== delay) return false;
        return true;
    }

    /**
     * Whether a nested workflow with this id exists, optionally added with
     * exactly these dependencies.
     */
    workflow_has(id: string, dependencies?: readonly string[]): boolean {
        const added = this.nestedDependencies.get(id);
        if (!added) return false;
        if (dependencies !== undefined && !this.set_equal(added, this.ids_expand(dependencies))) {
            return false;
        }
        return true;
    }

    // ─── Internals ──────────────────────────────────────────────

    private mutable_check(): void {
        if (this.sealed) throw new DefinitionSealedError(this.name);
    }

    private id_taken(id: string): boolean {
        return this.nodeIndex.has(id) || this.nested.has(id);
    }

    private node_push(node: JobNode<P>): void {
        this.nodes.push(node);
        this.nodeIndex.set(node.id, node);
    }

    private dependencies_resolve(jobId: string, refs: readonly DependencyRef[]): string[] {
        const resolved: string[] = [];
        for (const ref of refs) {
            let target: string | null;
            if (ref instanceof ConditionalDependency) {
                target = this.id_taken(ref.primary) ? ref.primary : ref.fallback;
            } else {
                target = ref;
            }
            if (target === null) continue;

            const terminals = this.nested.get(target);
            if (terminals) {
                resolved.push(...terminals);
            } else if (this.nodeIndex.has(target)) {
                resolved.push(target);
            } else {
                throw new UnresolvableDependencyError(jobId, target);
            }
        }
        return [...new Set(resolved)];
    }

    private ids_expand(ids: readonly string[]): string[] {
        return ids.flatMap((id: string): string[] => this.nested.get(id) ?? [id]);
    }

    private set_equal(a: readonly string[], b: readonly string[]): boolean {
        const left = new Set(a);
        const right = new Set(b);
        return left.size === right.size && [...left].every((id: string): boolean => right.has(id));
    }

    private delay_normalize(delay: number | Date | null): number | null {
        if (delay === null) return null;
        const ms = delay instanceof Date ? Math.max(0, delay.getTime() - this.clock().getTime()) : delay;
        if (!Number.isFinite(ms) || ms < 0) {
            throw new RangeError(`Job delay must be a non-negative number of milliseconds, got ${String(delay)}`);
        }
        return ms;
    }
}
