/**
 * @file DAG Graph Type Definitions
 *
 * Core types for the job dependency graph. A workflow is a set of job
 * nodes; each node lists the jobs it depends on (backward pointers). The
 * graph is built once by a WorkflowDefinition and frozen before any job
 * is dispatched.
 *
 * The graph layer is pure topology: no I/O, no run state. Run state lives
 * in dag/state, persistence in dag/store.
 *
 * @module dag/graph
 */

// ─── Queue Routing ──────────────────────────────────────────────

/**
 * Opaque routing target handed to the queue on dispatch.
 *
 * @property queue - Queue name (null: the queue's default)
 * @property connection - Connection name (null: the queue's default)
 */
export interface QueueRef {
    queue: string | null;
    connection: string | null;
}

// ─── Job Node ───────────────────────────────────────────────────

/**
 * A single node in the graph: one job of a workflow.
 *
 * Only direct dependencies are stored. Transitive dependencies are derived
 * by the graph on demand.
 *
 * @property id - Unique within the owning graph
 * @property name - Display name
 * @property type - Type identity of the payload
 * @property payload - The executable job; the engine never inspects it
 * @property dependencies - Ids of direct predecessors, insertion ordered
 * @property delay - Dispatch delay in milliseconds (null: immediate)
 * @property queue - Where the job is routed when dispatched
 * @property gated - Whether the job waits for a manual start once ready
 */
export interface JobNode<P = unknown> {
    id: string;
    name: string;
    type: string;
    payload: P;
    dependencies: readonly string[];
    delay: number | null;
    queue: QueueRef;
    gated: boolean;
}

// ─── Graph Edge ─────────────────────────────────────────────────

/**
 * An edge points from a dependency to its dependent (the direction work
 * flows), although nodes declare edges the other way round.
 */
export interface GraphEdge {
    from: string;
    to: string;
}

// ─── Validation Result ──────────────────────────────────────────

export interface ValidationResult {
    valid: boolean;
    errors: string[];
}
