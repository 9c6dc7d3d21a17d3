/**
 * @file Manifest Parser
 *
 * Builds a WorkflowDefinition from a YAML manifest:
 *
 *   name: nightly-report
 *   jobs:
 *     - id: extract
 *       type: Extract
 *     - id: publish
 *       type: Publish
 *       needs: [extract]
 *       gated: true
 *
 * The document is validated against `ManifestSchema` before any field
 * access. `needs` may point at jobs declared further down: jobs are added
 * to the definition in topological order, so the builder's add-time
 * dependency check still holds.
 *
 * @module dag/definition/parser
 */

import type { JobNode } from '../../graph/types.js';
import type { DefinitionOptions } from '../WorkflowDefinition.js';
import { WorkflowDefinition } from '../WorkflowDefinition.js';
import { JobGraph } from '../../graph/JobGraph.js';
import { ManifestError, UnknownJobTypeError } from '../../errors.js';
import { issues_format, needs_normalize, yaml_parse } from './common.js';
import { ManifestSchema, type RawJob } from './schemas.js';

/**
 * Builds a job payload from the manifest entry's parameters.
 */
export type JobFactory<P> = (parameters: Record<string, unknown>, jobId: string) => P;

export type JobTypeRegistry<P> = Readonly<Record<string, JobFactory<P>>>;

/**
 * Parse a manifest YAML string into a WorkflowDefinition.
 *
 * @param yamlStr - Raw YAML string
 * @param registry - Job factories keyed by `type`
 * @param options - Passed to the definition (bus, clock, identity)
 * @throws ManifestError on YAML or schema violations
 * @throws UnknownJobTypeError if a `type` is not registered
 * @throws DuplicateJobError, UnresolvableDependencyError, CycleDetectedError
 *   on structural problems
 */
export function manifest_parse<P>(
    yamlStr: string,
    registry: JobTypeRegistry<P>,
    options: Omit<DefinitionOptions, 'subject' | 'queue' | 'connection'> = {},
): WorkflowDefinition<P> {
    const raw = yaml_parse(yamlStr);

    // ── Boundary: validate the full document before touching any fields ──
    const result = ManifestSchema.safeParse(raw);
    if (!result.success) {
        throw new ManifestError(issues_format(result.error.issues));
    }
    const doc = result.data;

    const factories = new Map<string, JobFactory<P>>();
    for (const job of doc.jobs) {
        const factory = Object.hasOwn(registry, job.type) ? registry[job.type] : undefined;
        if (!factory) throw new UnknownJobTypeError(job.type);
        factories.set(job.type, factory);
    }

    const order = order_resolve(doc.jobs);
    const byId = new Map(doc.jobs.map((job: RawJob): [string, RawJob] => [job.id, job]));

    const definition = new WorkflowDefinition<P>(doc.name, {
        ...options,
        subject: doc.subject ?? null,
        queue: doc.queue ?? null,
        connection: doc.connection ?? null,
    });

    for (const id of order) {
        const job = byId.get(id);
        const factory = job ? factories.get(job.type) : undefined;
        if (!job || !factory) continue;
        definition.job_add(factory(job.parameters, job.id), needs_normalize(job.needs), {
            id: job.id,
            name: job.name ?? job.type,
            delay: job.delay ?? null,
            gated: job.gated,
            queue: job.queue,
            connection: job.connection,
        });
    }
    return definition;
}

/**
 * Topological order of the manifest's jobs, manifest order breaking
 * ties. Structural errors are raised by the graph.
 */
function order_resolve(jobs: readonly RawJob[]): string[] {
    const skeleton = jobs.map((job: RawJob): JobNode<null> => ({
        id: job.id,
        name: job.name ?? job.type,
        type: job.type,
        payload: null,
        dependencies: needs_normalize(job.needs),
        delay: null,
        queue: { queue: null, connection: null },
        gated: job.gated,
    }));
    return JobGraph.graph_fromNodes(skeleton).topological_order();
}
