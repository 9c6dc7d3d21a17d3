/**
 * @file Filesystem Storage Backend
 *
 * StorageBackend against the real filesystem via fs/promises. Paths
 * are used as given, so relative paths resolve against the working
 * directory.
 *
 * @module dag/store/backend
 */

import { mkdir, readFile, readdir, rm, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { StorageBackend } from '../types.js';

function code_of(error: unknown): string | null {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}

export class FsBackend implements StorageBackend {
    async record_write(path: string, data: string): Promise<void> {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, data, 'utf-8');
    }

    async record_read(path: string): Promise<string | null> {
        try {
            return await readFile(path, 'utf-8');
        } catch (e: unknown) {
            if (code_of(e) === 'ENOENT') return null;
            throw e;
        }
    }

    async path_exists(path: string): Promise<boolean> {
        try {
            await stat(path);
            return true;
        } catch (e: unknown) {
            if (code_of(e) === 'ENOENT') return false;
            throw e;
        }
    }

    async children_list(path: string): Promise<string[]> {
        try {
            const names = await readdir(path);
            return names.sort();
        } catch (e: unknown) {
            const code = code_of(e);
            if (code === 'ENOENT' || code === 'ENOTDIR') return [];
            throw e;
        }
    }

    async dir_create(path: string): Promise<void> {
        await mkdir(path, { recursive: true });
    }

    async path_remove(path: string): Promise<void> {
        await rm(path, { recursive: true, force: true });
    }
}
