/**
 * @file DOT Renderer
 *
 * Renders a job graph as Graphviz DOT text. Edges point from a
 * dependency to its dependent; when statuses are given, nodes are
 * filled by status.
 *
 * @module dag/visualizer
 */

import type { JobGraph } from '../graph/JobGraph.js';
import type { GraphEdge, JobNode } from '../graph/types.js';
import type { JobStatus } from '../state/types.js';

export interface DotRenderOptions {
    name?: string;
    statuses?: ReadonlyMap<string, JobStatus>;
    /** Graphviz rank direction. Default 'LR'. */
    direction?: 'LR' | 'TB';
}

export const STATUS_COLORS: Record<JobStatus, string> = {
    pending: 'white',
    gated: 'orange',
    processing: 'gold',
    finished: 'palegreen',
    failed: 'salmon',
};

function dot_escape(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function dot_quote(value: string): string {
    return `"${dot_escape(value)}"`;
}

export function dot_render<P>(graph: JobGraph<P>, options: DotRenderOptions = {}): string {
    const lines: string[] = [];
    lines.push(`digraph ${dot_quote(options.name ?? 'workflow')} {`);
    lines.push(`    rankdir=${options.direction ?? 'LR'};`);
    lines.push('    node [shape=box];');

    for (const node of graph.nodes_list()) {
        lines.push(`    ${dot_quote(node.id)} [${nodeAttributes_format(node, options.statuses?.get(node.id))}];`);
    }
    for (const edge of graph.edges_list()) {
        lines.push(`    ${edgeLine_format(edge)};`);
    }

    lines.push('}');
    return lines.join('\n');
}

function nodeAttributes_format<P>(node: Readonly<JobNode<P>>, status: JobStatus | undefined): string {
    const label = node.name === node.id
        ? dot_quote(node.id)
        : `"${dot_escape(node.id)}\\n${dot_escape(node.name)}"`;
    const attributes: string[] = [`label=${label}`];
    if (node.gated) attributes.push('peripheries=2');
    if (status) {
        attributes.push('style=filled', `fillcolor=${STATUS_COLORS[status]}`);
    }
    return attributes.join(', ');
}

function edgeLine_format(edge: GraphEdge): string {
    return `${dot_quote(edge.from)} -> ${dot_quote(edge.to)}`;
}
