import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { type FileStoragePort } from '@worksheetbot/core';

/**
 * Stores files under a root directory on local disk. Keys may not escape the
 * root; `put` returns the absolute path it wrote.
 */
export class LocalFileStorage implements FileStoragePort {
    private readonly root: string;

    public constructor(root: string) {
        this.root = path.resolve(root);
    }

    public async start(): Promise<void> {
        await mkdir(this.root, { recursive: true });
    }

    public async put(key: string, data: Buffer | string): Promise<string> {
        const target = this.resolve(key);
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(target, data);
        return target;
    }

    public async get(key: string): Promise<Buffer> {
        return readFile(this.resolve(key));
    }

    public async exists(key: string): Promise<boolean> {
        try {
            await access(this.resolve(key));
            return true;
        } catch (error) {
            if (isMissingFile(error)) return false;
            throw error;
        }
    }

    private resolve(key: string): string {
        const target = path.resolve(this.root, key);
        const relative = path.relative(this.root, target);
        if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
            throw new Error(`Storage key escapes root ${this.root}: ${key}`);
        }
        return target;
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
