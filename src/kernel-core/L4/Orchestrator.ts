import type { Atom, Hash, ProjectRecord } from '../L0/Ontology.js';
import type { PolicyGuard } from '../L0/PolicyGuard.js';
import type { Vault } from '../L2/Vault.js';
import type { ILoom, IManifestSource } from '../../Platform/Ports.js';
import type { Manifest, ManifestNode } from './Manifest.js';
import { importTable, mergeManifests, parseManifest } from './Manifest.js';
import { ErrorCode, KernelError, isKernelError, withContext } from '../Errors.js';

export interface BuildReport {
    appName: string;
    rootHash: Hash;
    nodes: Array<[string, Hash]>;   // processing order
    warnings: string[];
}

export const ROOT_NODE = 'root';

/**
 * Manifest compiler. Nodes are processed strictly in declaration order,
 * which must already be a valid topological order.
 */
export class Orchestrator {
    constructor(
        private readonly vault: Vault,
        private readonly guard: PolicyGuard,
        private readonly loom: ILoom,
        private readonly manifests: IManifestSource
    ) { }

    public async buildApp(raw: string): Promise<Hash> {
        return (await this.buildReport(raw)).rootHash;
    }

    public async buildReport(raw: string): Promise<BuildReport> {
        const manifest = await this.resolve(parseManifest(raw), []);
        console.log(`[Orchestrator] Building App: ${manifest.app_name}`);

        const imports = importTable(manifest.imports);
        const nodeMap = new Map<string, Hash>();
        const order: Array<[string, Hash]> = [];
        const warnings: string[] = [];

        for (const node of manifest.nodes) {
            const atom = await this.materialize(node, manifest.app_name, imports);

            for (const dep of node.dependencies) {
                const depHash = nodeMap.get(dep);
                if (depHash) {
                    atom.inputs.push(depHash);
                } else {
                    const warning = `Dependency '${dep}' not found for node '${node.name}'`;
                    console.warn(`[Orchestrator] Warning: ${warning}`);
                    warnings.push(warning);
                }
            }

            let hash: Hash;
            try {
                hash = await this.vault.persistVerified(atom, this.guard);
            } catch (e) {
                throw withContext(e, { node: node.name, operation: 'buildApp' });
            }

            console.log(`[Orchestrator] Node '${node.name}' persisted: ${hash}`);
            nodeMap.set(node.name, hash);
            order.push([node.name, hash]);
        }

        const last = order[order.length - 1];
        const rootHash = nodeMap.get(ROOT_NODE) ?? (last ? last[1] : '');
        return { appName: manifest.app_name, rootHash, nodes: order, warnings };
    }

    /**
     * Builds the manifest as a tracked project: BUILDING until the graph
     * commits, then ACTIVE with the new root. A failed build leaves the
     * record in BUILDING.
     */
    public async deployProject(raw: string, orgHash: Hash): Promise<ProjectRecord> {
        const { app_name: name } = parseManifest(raw);

        let existing: ProjectRecord | null = null;
        try {
            existing = await this.vault.getProject(name);
        } catch (e) {
            if (!isKernelError(e) || e.code !== ErrorCode.NOT_FOUND) throw e;
        }
        if (existing?.status === 'ARCHIVED') {
            throw new KernelError(ErrorCode.ILLEGAL_TRANSITION, `Project '${name}' is archived`, { operation: 'deployProject' });
        }
        if (!existing) await this.vault.createProject(name, orgHash);

        const rootHash = await this.buildApp(raw);
        await this.vault.updateProjectHash(name, rootHash);
        return this.vault.updateProjectStatus(name, 'ACTIVE');
    }

    /** `chain` holds the names already loaded, starting with the root's app_name. */
    private async resolve(manifest: Manifest, chain: string[]): Promise<Manifest> {
        const parentName = manifest.extends;
        if (parentName === undefined) return manifest;
        const seen = chain.length === 0 ? [manifest.app_name] : chain;
        if (seen.includes(parentName)) {
            throw new KernelError(ErrorCode.MANIFEST_INVALID, `Cyclic inheritance: ${[...seen, parentName].join(' -> ')}`, { operation: 'resolve' });
        }

        console.log(`[Orchestrator] '${manifest.app_name}' extends '${parentName}'`);
        const parentRaw = await this.manifests.load(parentName);
        const parent = await this.resolve(parseManifest(parentRaw, `parent manifest '${parentName}'`), [...seen, parentName]);
        return mergeManifests(parent, manifest);
    }

    private async materialize(node: ManifestNode, appName: string, imports: ReadonlyMap<string, Hash>): Promise<Atom> {
        if (node.intent !== undefined) {
            try {
                const woven = await this.loom.weave(node.intent, appName);
                return { ...woven, inputs: [...woven.inputs] };
            } catch (e) {
                const reason = isKernelError(e) ? e.reason : e instanceof Error ? e.message : String(e);
                throw new KernelError(ErrorCode.WEAVE_FAILED, `Failed to weave node '${node.name}': ${reason}`, { node: node.name, operation: 'weave' }, { cause: e });
            }
        }

        const refName = node.use_ref ?? '';
        const masterHash = imports.get(refName);
        if (!masterHash) {
            throw new KernelError(ErrorCode.IMPORT_NOT_FOUND, `Import reference '${refName}' not found in manifest imports`, { node: node.name });
        }
        console.log(`[Orchestrator] Linking to master atom: ${refName} -> ${masterHash}`);

        let master: Atom;
        try {
            master = await this.vault.fetch(masterHash);
        } catch (e) {
            throw withContext(e, { node: node.name, operation: 'link' });
        }
        // Re-contextualised instance: same logic, own inputs, own scope
        return { opCode: master.opCode, inputs: [], payloadRef: master.payloadRef, contextId: appName };
    }
}
