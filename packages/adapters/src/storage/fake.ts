import { type FileStoragePort } from '@worksheetbot/core';

export class FakeFileStorage implements FileStoragePort {
    private storage = new Map<string, Buffer>();

    public constructor(seed: Record<string, string> = {}) {
        for (const [path, data] of Object.entries(seed)) {
            this.storage.set(path, Buffer.from(data, 'utf8'));
        }
    }

    public async put(path: string, data: Buffer | string): Promise<string> {
        this.storage.set(path, typeof data === 'string' ? Buffer.from(data, 'utf8') : data);
        return path;
    }

    public async get(path: string): Promise<Buffer> {
        const data = this.storage.get(path);
        if (!data) throw new Error(`File not found: ${path}`);
        return data;
    }

    public async exists(path: string): Promise<boolean> {
        return this.storage.has(path);
    }

    public read(path: string): string | undefined {
        return this.storage.get(path)?.toString('utf8');
    }

    public paths(): string[] {
        return [...this.storage.keys()];
    }
}
