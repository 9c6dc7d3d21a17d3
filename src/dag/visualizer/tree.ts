/**
 * @file Tree Renderer
 *
 * Terminal view of a job graph. Each job hangs under its first
 * dependency; jobs with more than one dependency are tagged as joins.
 *
 *   ● A
 *   ├─ ○ C [join:A+B]
 *   └─ ● D
 *   ✗ B
 *
 * @module dag/visualizer
 */

import type { JobGraph } from '../graph/JobGraph.js';
import type { JobNode } from '../graph/types.js';
import type { JobStatus } from '../state/types.js';

export const STATUS_MARKERS: Record<JobStatus, string> = {
    pending: '○',
    gated: '◌',
    processing: '◉',
    finished: '●',
    failed: '✗',
};

export const TREE_LEGEND = 'Legend: ● finished  ◉ processing  ○ pending  ◌ gated  ✗ failed';

export function tree_render<P>(graph: JobGraph<P>, statuses: ReadonlyMap<string, JobStatus> = new Map()): string[] {
    const children = new Map<string, string[]>();
    const roots: string[] = [];
    for (const node of graph.nodes_list()) {
        const parent = node.dependencies[0];
        if (parent === undefined) {
            roots.push(node.id);
            continue;
        }
        const list = children.get(parent) ?? [];
        list.push(node.id);
        children.set(parent, list);
    }

    const line_format = (node: Readonly<JobNode<P>>): string => {
        const marker = STATUS_MARKERS[statuses.get(node.id) ?? 'pending'];
        const tags: string[] = [];
        if (node.gated) tags.push('gated');
        if (node.dependencies.length > 1) tags.push(`join:${node.dependencies.join('+')}`);
        const suffix = tags.length > 0 ? ` [${tags.join(', ')}]` : '';
        const name = node.name === node.id ? '' : ` (${node.name})`;
        return `${marker} ${node.id}${name}${suffix}`;
    };

    const lines: string[] = [];
    const branch_render = (id: string, prefix: string, isLast: boolean, isRoot: boolean): void => {
        const node = graph.node_get(id);
        if (!node) return;
        lines.push(isRoot ? line_format(node) : `${prefix}${isLast ? '└─ ' : '├─ '}${line_format(node)}`);

        const below = children.get(id) ?? [];
        const nextPrefix = isRoot ? '' : `${prefix}${isLast ? '   ' : '│  '}`;
        below.forEach((childId: string, index: number): void => {
            branch_render(childId, nextPrefix, index === below.length - 1, false);
        });
    };

    for (const root of roots) {
        branch_render(root, '', true, true);
    }
    return lines;
}
