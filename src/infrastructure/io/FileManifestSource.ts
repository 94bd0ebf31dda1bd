import fs from 'fs';
import path from 'path';
import type { IManifestSource } from '../../Platform/Ports.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';

/** Parent manifests live at <root>/<name>/manifest.yaml. */
export class FileManifestSource implements IManifestSource {
    constructor(private readonly root: string = 'products') { }

    async load(name: string): Promise<string> {
        if (!/^[\w.-]+$/.test(name) || name.startsWith('.')) {
            throw new KernelError(ErrorCode.MANIFEST_INVALID, `Illegal parent manifest name '${name}'`);
        }
        const file = path.join(this.root, name, 'manifest.yaml');
        try {
            return await fs.promises.readFile(file, 'utf8');
        } catch (e) {
            throw new KernelError(ErrorCode.NOT_FOUND, `Failed to read parent manifest at '${file}'`, { operation: 'manifest.load' }, { cause: e });
        }
    }
}
