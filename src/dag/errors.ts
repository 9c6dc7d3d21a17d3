/**
 * @file Workflow Error Taxonomy
 *
 * Every error the engine raises derives from WorkflowError and carries a
 * stable `code`. The main families:
 *
 *   - Definition errors: thrown synchronously while a graph is built,
 *     before anything is persisted or dispatched.
 *   - Transition errors: a caller asked a job or workflow to move to a
 *     state its current state does not allow.
 *   - Lookup / storage errors: unknown ids, corrupt records.
 *
 * Job failures are NOT errors in this sense. They are recorded on the
 * job and surfaced through the workflow's catch callback.
 *
 * @module dag/errors
 */

export type WorkflowErrorCode =
    | 'UNRESOLVABLE_DEPENDENCY'
    | 'DUPLICATE_JOB'
    | 'CYCLE_DETECTED'
    | 'DEFINITION_SEALED'
    | 'INVALID_STATE_TRANSITION'
    | 'WORKFLOW_NOT_FOUND'
    | 'JOB_NOT_FOUND'
    | 'RECORD_CORRUPT'
    | 'UNKNOWN_JOB_TYPE'
    | 'MANIFEST_INVALID'
    | 'ASSERTION_FAILED'
    | 'SETTINGS_INVALID';

/**
 * Base class for all engine errors.
 */
export class WorkflowError extends Error {
    constructor(
        public readonly code: WorkflowErrorCode,
        message: string,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

// ─── Definition-time ────────────────────────────────────────────

export class UnresolvableDependencyError extends WorkflowError {
    constructor(
        public readonly jobId: string,
        public readonly dependency: string,
    ) {
        super('UNRESOLVABLE_DEPENDENCY', `Job '${jobId}' depends on '${dependency}', which has not been added`);
    }
}

export class DuplicateJobError extends WorkflowError {
    constructor(public readonly jobId: string) {
        super('DUPLICATE_JOB', `A job or nested workflow with id '${jobId}' already exists; pass an explicit id`);
    }
}

export class CycleDetectedError extends WorkflowError {
    constructor(public readonly cycle: string[]) {
        super('CYCLE_DETECTED', `Cycle detected: ${cycle.join(' -> ')}`);
    }
}

export class DefinitionSealedError extends WorkflowError {
    constructor(public readonly definitionName: string) {
        super('DEFINITION_SEALED', `Workflow definition '${definitionName}' has already been built and cannot change`);
    }
}

// ─── Transitions ────────────────────────────────────────────────

export class InvalidStateTransitionError extends WorkflowError {
    constructor(
        public readonly subject: string,
        public readonly from: string,
        public readonly action: string,
    ) {
        super('INVALID_STATE_TRANSITION', `Cannot ${action} '${subject}' while it is ${from}`);
    }
}

// ─── Lookup / storage ───────────────────────────────────────────

export class WorkflowNotFoundError extends WorkflowError {
    constructor(public readonly workflowId: string) {
        super('WORKFLOW_NOT_FOUND', `Workflow '${workflowId}' not found`);
    }
}

export class JobNotFoundError extends WorkflowError {
    constructor(
        public readonly workflowId: string,
        public readonly jobId: string,
    ) {
        super('JOB_NOT_FOUND', `Job '${jobId}' not found in workflow '${workflowId}'`);
    }
}

export class RecordCorruptError extends WorkflowError {
    constructor(
        public readonly path: string,
        detail: string,
    ) {
        super('RECORD_CORRUPT', `Record at '${path}' is invalid: ${detail}`);
    }
}

// ─── Manifests ──────────────────────────────────────────────────

export class UnknownJobTypeError extends WorkflowError {
    constructor(public readonly jobType: string) {
        super('UNKNOWN_JOB_TYPE', `No job type '${jobType}' is registered`);
    }
}

export class ManifestError extends WorkflowError {
    constructor(detail: string) {
        super('MANIFEST_INVALID', `Invalid workflow manifest: ${detail}`);
    }
}

// ─── Configuration ─────────────────────────────────────────────

export class SettingsError extends WorkflowError {
    constructor(public readonly problems: string[]) {
        super('SETTINGS_INVALID', `Invalid settings: ${problems.join('; ')}`);
    }
}

// ─── Testing ────────────────────────────────────────────────────

export class WorkflowAssertionError extends WorkflowError {
    constructor(message: string) {
        super('ASSERTION_FAILED', message);
    }
}
