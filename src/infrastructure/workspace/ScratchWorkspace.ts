import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../../domain/errors/RenderErrors';

/**
 * A per-request temporary directory. Everything written under it goes away
 * with `dispose()`, which is safe to call more than once.
 */
export class ScratchWorkspace {
    private disposed = false;

    private constructor(public readonly dir: string) { }

    static async create(root: string, prefix: string): Promise<ScratchWorkspace> {
        const dir = path.join(root, `${prefix}-${uuidv4()}`);
        await fs.promises.mkdir(dir, { recursive: true });
        return new ScratchWorkspace(dir);
    }

    path(...segments: string[]): string {
        return path.join(this.dir, ...segments);
    }

    async dispose(): Promise<void> {
        if (this.disposed) {
            return;
        }
        this.disposed = true;
        try {
            await fs.promises.rm(this.dir, { recursive: true, force: true });
        } catch (error) {
            console.warn(`[Workspace] Failed to cleanup temp dir ${this.dir}: ${errorMessage(error)}`);
        }
    }
}
