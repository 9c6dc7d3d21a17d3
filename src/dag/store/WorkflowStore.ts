/**
 * @file Workflow Store
 *
 * WorkflowRepository over any StorageBackend. Records are JSON files:
 *
 *   <basePath>/<workflowsTable>/<workflowId>.json
 *   <basePath>/<jobsTable>/<workflowId>/<jobId>.json
 *
 * Job ids are URI-encoded in file names, since nested ids contain dots
 * and caller-chosen ids may contain anything.
 *
 * @module dag/store
 */

import type {
    JobRecord,
    StorageBackend,
    SubjectRef,
    WorkflowRecord,
    WorkflowRepository,
} from './types.js';
import { jobRecord_parse, workflowRecord_parse } from './schemas.js';

export interface WorkflowStoreOptions {
    basePath?: string;
    workflowsTable?: string;
    jobsTable?: string;
}

export class WorkflowStore implements WorkflowRepository {
    private readonly workflowsPath: string;
    private readonly jobsPath: string;

    constructor(
        private readonly backend: StorageBackend,
        options: WorkflowStoreOptions = {},
    ) {
        const basePath = (options.basePath ?? '.dagflow').replace(/\/+$/, '');
        this.workflowsPath = `${basePath}/${options.workflowsTable ?? 'workflows'}`;
        this.jobsPath = `${basePath}/${options.jobsTable ?? 'workflow_jobs'}`;
    }

    // ─── Workflows ──────────────────────────────────────────────

    async workflow_save(record: WorkflowRecord): Promise<void> {
        await this.backend.record_write(this.workflowPath_resolve(record.id), JSON.stringify(record));
    }

    async workflow_load(workflowId: string): Promise<WorkflowRecord | null> {
        const path = this.workflowPath_resolve(workflowId);
        const raw = await this.backend.record_read(path);
        if (raw === null) return null;
        return workflowRecord_parse(path, raw);
    }

    async workflows_list(): Promise<WorkflowRecord[]> {
        if (!(await this.backend.path_exists(this.workflowsPath))) return [];

        const records: WorkflowRecord[] = [];
        for (const child of await this.backend.children_list(this.workflowsPath)) {
            if (!child.endsWith('.json')) continue;
            const path = `${this.workflowsPath}/${child}`;
            const raw = await this.backend.record_read(path);
            if (raw !== null) records.push(workflowRecord_parse(path, raw));
        }

        // Newest first; id breaks ties so the order is stable
        records.sort((a: WorkflowRecord, b: WorkflowRecord): number =>
            b.createdAt.localeCompare(a.createdAt) || a.id.localeCompare(b.id));
        return records;
    }

    async workflowsForSubject_list(subject: SubjectRef): Promise<WorkflowRecord[]> {
        const all = await this.workflows_list();
        return all.filter((record: WorkflowRecord): boolean =>
            record.subject !== null && record.subject.type === subject.type && record.subject.id === subject.id);
    }

    async workflow_delete(workflowId: string): Promise<void> {
        await this.backend.path_remove(this.workflowPath_resolve(workflowId));
        await this.backend.path_remove(this.jobDir_resolve(workflowId));
    }

    // ─── Jobs ───────────────────────────────────────────────────

    async job_save(record: JobRecord): Promise<void> {
        await this.backend.record_write(this.jobPath_resolve(record.workflowId, record.jobId), JSON.stringify(record));
    }

    async job_load(workflowId: string, jobId: string): Promise<JobRecord | null> {
        const path = this.jobPath_resolve(workflowId, jobId);
        const raw = await this.backend.record_read(path);
        if (raw === null) return null;
        return jobRecord_parse(path, raw);
    }

    async jobs_list(workflowId: string): Promise<JobRecord[]> {
        const dir = this.jobDir_resolve(workflowId);
        if (!(await this.backend.path_exists(dir))) return [];

        const records: JobRecord[] = [];
        for (const child of await this.backend.children_list(dir)) {
            if (!child.endsWith('.json')) continue;
            const path = `${dir}/${child}`;
            const raw = await this.backend.record_read(path);
            if (raw !== null) records.push(jobRecord_parse(path, raw));
        }

        records.sort((a: JobRecord, b: JobRecord): number => a.sequence - b.sequence);
        return records;
    }

    // ─── Paths ──────────────────────────────────────────────────

    private workflowPath_resolve(workflowId: string): string {
        return `${this.workflowsPath}/${encodeURIComponent(workflowId)}.json`;
    }

    private jobDir_resolve(workflowId: string): string {
        return `${this.jobsPath}/${encodeURIComponent(workflowId)}`;
    }

    private jobPath_resolve(workflowId: string, jobId: string): string {
        return `${this.jobDir_resolve(workflowId)}/${encodeURIComponent(jobId)}.json`;
    }
}
