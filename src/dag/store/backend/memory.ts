/**
 * @file Memory Storage Backend
 *
 * StorageBackend kept entirely in process memory. Used by tests and by
 * engines that do not need runs to outlive the process.
 *
 * @module dag/store/backend
 */

import type { StorageBackend } from '../types.js';

/**
 * Normalize a path: collapse repeated slashes, drop a trailing slash.
 */
function path_normalize(path: string): string {
    const collapsed = path.replace(/\/+/g, '/');
    return collapsed.length > 1 ? collapsed.replace(/\/$/, '') : collapsed;
}

function parent_resolve(path: string): string | null {
    const index = path.lastIndexOf('/');
    if (index < 0) return null;
    return index === 0 ? '/' : path.substring(0, index);
}

export class MemoryBackend implements StorageBackend {
    private readonly files = new Map<string, string>();
    private readonly dirs = new Set<string>();

    async record_write(path: string, data: string): Promise<void> {
        const normalized = path_normalize(path);
        const parent = parent_resolve(normalized);
        if (parent) this.dirs_ensure(parent);
        this.files.set(normalized, data);
    }

    async record_read(path: string): Promise<string | null> {
        return this.files.get(path_normalize(path)) ?? null;
    }

    async path_exists(path: string): Promise<boolean> {
        const normalized = path_normalize(path);
        return this.files.has(normalized) || this.dirs.has(normalized);
    }

    async children_list(path: string): Promise<string[]> {
        const prefix = `${path_normalize(path)}/`;
        const names = new Set<string>();
        for (const entry of [...this.files.keys(), ...this.dirs]) {
            if (!entry.startsWith(prefix)) continue;
            const rest = entry.substring(prefix.length);
            if (rest && !rest.includes('/')) names.add(rest);
        }
        return [...names].sort();
    }

    async dir_create(path: string): Promise<void> {
        this.dirs_ensure(path_normalize(path));
    }

    async path_remove(path: string): Promise<void> {
        const normalized = path_normalize(path);
        const prefix = `${normalized}/`;
        for (const key of [...this.files.keys()]) {
            if (key === normalized || key.startsWith(prefix)) this.files.delete(key);
        }
        for (const dir of [...this.dirs]) {
            if (dir === normalized || dir.startsWith(prefix)) this.dirs.delete(dir);
        }
    }

    private dirs_ensure(path: string): void {
        let current: string | null = path;
        while (current && current !== '/' && !this.dirs.has(current)) {
            this.dirs.add(current);
            current = parent_resolve(current);
        }
    }
}
