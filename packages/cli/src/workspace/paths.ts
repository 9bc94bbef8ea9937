import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        data: join(root, 'data'),
        outputs: join(root, 'outputs'),
        storePath: join(root, 'data', 'transactions.json'),
        config: {
            rulesPath: join(root, 'config', 'rules.yaml'),
        },
    };
}

/**
 * Nearest directory at or above startPath that holds a workspace rules file.
 */
export function findWorkspace(startPath: string = process.cwd()): Workspace | null {
    let current = resolve(startPath);
    for (;;) {
        const workspace = resolveWorkspace(current);
        if (existsSync(workspace.config.rulesPath)) {
            return workspace;
        }
        const parent = dirname(current);
        if (parent === current) {
            return null;
        }
        current = parent;
    }
}

/**
 * Workspace from --workspace, or found from the current directory.
 */
export function openWorkspace(explicitRoot?: string): Workspace | null {
    return explicitRoot ? resolveWorkspace(resolve(explicitRoot)) : findWorkspace();
}

/**
 * Bare file names land in outputs/; paths are taken as given.
 */
export function getOutputPath(workspace: Workspace, target: string): string {
    if (target.includes('/') || target.includes('\\')) {
        return resolve(target);
    }
    return join(workspace.outputs, target);
}
