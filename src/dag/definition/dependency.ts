/**
 * @file Dependency References
 *
 * What a job may name as a dependency when it is added:
 *
 *   - a job id already in the definition,
 *   - the id of a nested workflow (expands to that workflow's terminal jobs),
 *   - a ConditionalDependency, which picks its target by whether the
 *     primary id exists at the moment the dependent job is added.
 *
 * @module dag/definition
 */

export class ConditionalDependency {
    constructor(
        readonly primary: string,
        readonly fallback: string | null,
    ) {}
}

export type DependencyRef = string | ConditionalDependency;

/**
 * Depend on `primary` if it was added (e.g. by a branch that ran),
 * otherwise on `fallback`, otherwise on nothing.
 */
export function dependency_conditional(primary: string, fallback?: string): ConditionalDependency {
    return new ConditionalDependency(primary, fallback ?? null);
}
