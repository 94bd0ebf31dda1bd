// src/kernel-core/L2/Vault.ts
import { produce } from 'immer';
import { z } from 'zod';
import type { IBlobStore, IKeyValueStore, ISystemClock } from '../../Platform/Ports.js';
import type { Atom, Hash, IdentityRecord, ProjectRecord, ProjectStatus } from '../L0/Ontology.js';
import { GLOBAL_CONTEXT, OpCode, isValidOpCode } from '../L0/Ontology.js';
import { canonicalize, hash, merkleRoot } from '../L0/Crypto.js';
import { decodePayload, decodeRate, describeIssues, IOContractSchema } from '../L0/Codec.js';
import { toKernelError } from '../L0/Guards.js';
import type { PolicyGuard } from '../L0/PolicyGuard.js';
import { ErrorCode, KernelError, withContext } from '../Errors.js';

// --- Key Namespaces ---
export const ATOM_PREFIX = 'atom:';
export const IDENTITY_PREFIX = 'identity:';
export const PROJECT_PREFIX = 'project:';

// --- Record Schemas (read path) ---
const AtomSchema = z.object({
    opCode: z.number().int().min(0).max(0xffff),
    inputs: z.array(z.string()),
    payloadRef: z.string(),
    contextId: z.string(),
});

const IdentitySchema = z.object({
    publicKey: z.string(),
    role: z.string(),
    orgHash: z.string(),
    accessNodes: z.array(z.string()),
});

const ProjectSchema = z.object({
    name: z.string(),
    rootHash: z.string(),
    orgHash: z.string(),
    status: z.enum(['BUILDING', 'ACTIVE', 'ARCHIVED']),
    createdAt: z.string(),
});

// --- Project Lifecycle ---
const PROJECT_TRANSITIONS: Record<ProjectStatus, readonly ProjectStatus[]> = {
    BUILDING: ['ACTIVE', 'ARCHIVED'],
    ACTIVE: ['ARCHIVED'],
    ARCHIVED: [],
};

// --- Introspection Shapes ---
export type RecordKind = 'atom' | 'identity' | 'project';

export interface InventoryEntry {
    key: string;
    kind: RecordKind;
    label: string;
}

export interface GraphNode {
    data: { id: string; label: string; kind: 'atom' | 'identity' };
}

export interface GraphEdge {
    data: { source: string; target: string; kind: 'dependency' | 'access' };
}

export interface GraphDocument {
    nodes: GraphNode[];
    edges: GraphEdge[];
}

export type GraphFormat = 'json' | 'dot';

/** Canonical form: exactly the four identity-bearing fields. */
export function canonicalAtom(atom: Atom): Atom {
    return {
        opCode: atom.opCode,
        inputs: [...atom.inputs],
        payloadRef: atom.payloadRef,
        contextId: atom.contextId,
    };
}

export function atomHash(atom: Atom): Hash {
    return hash(canonicalize(canonicalAtom(atom)));
}

export function principalHashOf(publicKey: string): Hash {
    return hash(publicKey);
}

/**
 * Vault: the content-addressed store.
 * Atoms are append-only and keyed by the hash of their canonical form;
 * identity and project records are mutable, last-write-wins.
 */
export class Vault {
    constructor(
        private readonly store: IKeyValueStore,
        private readonly blobs: IBlobStore,
        private readonly clock: ISystemClock = { now: () => new Date().toISOString() }
    ) { }

    public get Blobs(): IBlobStore { return this.blobs; }

    // ─── Atoms ──────────────────────────────────────────────────────

    /** Unchecked write. Bootstrap and legacy paths only. */
    public async persist(atom: Atom): Promise<Hash> {
        if (!isValidOpCode(atom.opCode)) {
            throw new KernelError(ErrorCode.INVALID_OPERATION, `opCode ${atom.opCode} is outside the u16 range`, { opCode: atom.opCode });
        }
        const canonical = canonicalAtom(atom);
        const h = atomHash(canonical);
        if (canonical.inputs.includes(h)) {
            throw new KernelError(ErrorCode.INVALID_OPERATION, 'Atom references its own hash', { hash: h });
        }
        await this.store.put(ATOM_PREFIX + h, canonicalize(canonical));
        return h;
    }

    /**
     * Governed write. Checks run in a fixed order and the first failure wins:
     * payload, interest-free law, sovereignty law, context isolation, compatibility.
     */
    public async persistVerified(atom: Atom, guard: PolicyGuard): Promise<Hash> {
        const opCode = atom.opCode;

        // 1. Payload
        let payload: Uint8Array;
        try {
            payload = await this.blobs.read(atom.payloadRef);
        } catch (e) {
            throw withContext(e, { opCode, operation: 'persistVerified' });
        }

        // 2. Interest-Free Law
        if (opCode === OpCode.FINANCIAL) {
            const verdict = guard.checkInterestFree(decodeRate(payload));
            if (!verdict.ok) throw toKernelError(verdict, { opCode });
        }

        // 3. Data Sovereignty Law
        if (opCode === OpCode.IO_FETCH) {
            const contract = decodePayload(IOContractSchema, payload, ErrorCode.MALFORMED_CONTRACT);
            const verdict = guard.checkSovereignty(contract.endpoint, contract.sensitivity);
            if (!verdict.ok) throw toKernelError(verdict, { opCode });
        }

        // 4. Context Isolation
        const resolved: Atom[] = [];
        for (const input of atom.inputs) {
            const dep = await this.tryFetch(input);
            if (!dep) {
                throw new KernelError(ErrorCode.MISSING_DEPENDENCY, `Input ${input} does not exist`, { hash: input, opCode });
            }
            if (dep.contextId !== GLOBAL_CONTEXT && dep.contextId !== atom.contextId) {
                throw new KernelError(
                    ErrorCode.CONTEXT_ISOLATION,
                    `Context '${atom.contextId}' may not depend on atom ${input} from context '${dep.contextId}'`,
                    { hash: input, opCode }
                );
            }
            resolved.push(dep);
        }

        // 5. Structural Compatibility
        guard.verifyCompatibility(atom, resolved);

        // 6. Commit
        return this.persist(atom);
    }

    /** Persists each atom, then folds their hashes into a Merkle root. */
    public async persistBatch(atoms: readonly Atom[], guard?: PolicyGuard): Promise<Hash> {
        if (atoms.length === 0) {
            throw new KernelError(ErrorCode.INVALID_OPERATION, 'Cannot compute the Merkle root of an empty batch', { operation: 'persistBatch' });
        }
        const hashes: Hash[] = [];
        for (const atom of atoms) {
            hashes.push(guard ? await this.persistVerified(atom, guard) : await this.persist(atom));
        }
        return merkleRoot(hashes);
    }

    public async fetch(h: Hash): Promise<Atom> {
        const atom = await this.tryFetch(h);
        if (!atom) throw new KernelError(ErrorCode.NOT_FOUND, `Logic atom ${h} not found`, { hash: h });
        return atom;
    }

    public async exists(h: Hash): Promise<boolean> {
        return this.store.has(ATOM_PREFIX + h);
    }

    private async tryFetch(h: Hash): Promise<Atom | null> {
        const raw = await this.store.get(ATOM_PREFIX + h);
        return raw === null ? null : this.decode(AtomSchema, raw, ATOM_PREFIX + h);
    }

    // ─── Identities ─────────────────────────────────────────────────

    public async persistIdentity(identity: IdentityRecord): Promise<Hash> {
        const principal = principalHashOf(identity.publicKey);
        await this.store.put(IDENTITY_PREFIX + principal, canonicalize(identity));
        return principal;
    }

    public async fetchIdentity(principal: Hash): Promise<IdentityRecord> {
        const raw = await this.store.get(IDENTITY_PREFIX + principal);
        if (raw === null) throw new KernelError(ErrorCode.NOT_FOUND, `Identity ${principal} not found`, { hash: principal });
        return this.decode(IdentitySchema, raw, IDENTITY_PREFIX + principal);
    }

    /** Writes a global PERMISSION atom over the resource and links it to the principal. */
    public async grantAccess(principal: Hash, resource: Hash): Promise<Hash> {
        const identity = await this.fetchIdentity(principal);
        if (!(await this.exists(resource))) {
            throw new KernelError(ErrorCode.MISSING_DEPENDENCY, `Resource ${resource} does not exist`, { hash: resource });
        }
        const payloadRef = await this.blobs.write(new Uint8Array(0));
        const permission = await this.persist({
            opCode: OpCode.PERMISSION,
            inputs: [resource],
            payloadRef,
            contextId: GLOBAL_CONTEXT,
        });
        if (!identity.accessNodes.includes(permission)) {
            await this.persistIdentity(produce(identity, draft => {
                draft.accessNodes.push(permission);
            }));
        }
        return permission;
    }

    /** Resonance: some access node is a PERMISSION atom naming the resource. */
    public async verifyResonance(principal: Hash, resource: Hash): Promise<boolean> {
        const raw = await this.store.get(IDENTITY_PREFIX + principal);
        if (raw === null) return false;
        const identity = this.decode(IdentitySchema, raw, IDENTITY_PREFIX + principal);

        for (const node of identity.accessNodes) {
            const atom = await this.tryFetch(node);
            if (atom && atom.opCode === OpCode.PERMISSION && atom.inputs.includes(resource)) {
                return true;
            }
        }
        return false;
    }

    // ─── Projects ───────────────────────────────────────────────────

    public async persistProject(project: ProjectRecord): Promise<void> {
        await this.store.put(PROJECT_PREFIX + project.name, canonicalize(project));
    }

    public async createProject(name: string, orgHash: Hash): Promise<ProjectRecord> {
        const project: ProjectRecord = { name, rootHash: '', orgHash, status: 'BUILDING', createdAt: this.clock.now() };
        await this.persistProject(project);
        return project;
    }

    public async getProject(name: string): Promise<ProjectRecord> {
        const raw = await this.store.get(PROJECT_PREFIX + name);
        if (raw === null) throw new KernelError(ErrorCode.NOT_FOUND, `Project '${name}' not found`, { operation: 'getProject' });
        return this.decode(ProjectSchema, raw, PROJECT_PREFIX + name);
    }

    public async listProjects(): Promise<ProjectRecord[]> {
        const rows = await this.store.entries(PROJECT_PREFIX);
        return rows.map(([key, raw]) => this.decode(ProjectSchema, raw, key));
    }

    public async updateProjectStatus(name: string, status: ProjectStatus): Promise<ProjectRecord> {
        const project = await this.getProject(name);
        if (project.status === status) return project;
        if (!PROJECT_TRANSITIONS[project.status].includes(status)) {
            throw new KernelError(
                ErrorCode.ILLEGAL_TRANSITION,
                `Illegal project transition ${project.status} -> ${status}`,
                { operation: 'updateProjectStatus' }
            );
        }
        const updated = produce(project, draft => {
            draft.status = status;
        });
        await this.persistProject(updated);
        return updated;
    }

    public async updateProjectHash(name: string, rootHash: Hash): Promise<ProjectRecord> {
        const project = await this.getProject(name);
        const updated = produce(project, draft => {
            draft.rootHash = rootHash;
        });
        await this.persistProject(updated);
        return updated;
    }

    // ─── Introspection ──────────────────────────────────────────────

    public async inventory(): Promise<InventoryEntry[]> {
        const rows = await this.store.entries();
        const out: InventoryEntry[] = [];
        for (const [key, raw] of rows) {
            if (key.startsWith(ATOM_PREFIX)) {
                const atom = this.decode(AtomSchema, raw, key);
                out.push({ key: key.slice(ATOM_PREFIX.length), kind: 'atom', label: `Op:${atom.opCode} @${atom.contextId}` });
            } else if (key.startsWith(IDENTITY_PREFIX)) {
                const id = this.decode(IdentitySchema, raw, key);
                out.push({ key: key.slice(IDENTITY_PREFIX.length), kind: 'identity', label: id.role });
            } else if (key.startsWith(PROJECT_PREFIX)) {
                const p = this.decode(ProjectSchema, raw, key);
                out.push({ key: p.name, kind: 'project', label: `${p.name} (${p.status})` });
            }
        }
        return out;
    }

    public async exportGraph(format: 'json'): Promise<GraphDocument>;
    public async exportGraph(format: 'dot'): Promise<string>;
    public async exportGraph(format: GraphFormat): Promise<GraphDocument | string>;
    public async exportGraph(format: GraphFormat): Promise<GraphDocument | string> {
        const doc = await this.buildGraph();
        return format === 'dot' ? toDot(doc) : doc;
    }

    private async buildGraph(): Promise<GraphDocument> {
        const nodes: GraphNode[] = [];
        const edges: GraphEdge[] = [];

        for (const [key, raw] of await this.store.entries(ATOM_PREFIX)) {
            const id = key.slice(ATOM_PREFIX.length);
            const atom = this.decode(AtomSchema, raw, key);
            nodes.push({ data: { id, label: `Op:${atom.opCode}`, kind: 'atom' } });
            for (const input of atom.inputs) {
                edges.push({ data: { source: input, target: id, kind: 'dependency' } });
            }
        }

        for (const [key, raw] of await this.store.entries(IDENTITY_PREFIX)) {
            const id = key.slice(IDENTITY_PREFIX.length);
            const identity = this.decode(IdentitySchema, raw, key);
            nodes.push({ data: { id, label: identity.role, kind: 'identity' } });
            for (const node of identity.accessNodes) {
                edges.push({ data: { source: id, target: node, kind: 'access' } });
            }
        }

        return { nodes, edges };
    }

    private decode<T extends z.ZodTypeAny>(schema: T, raw: string, key: string): z.infer<T> {
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (e) {
            throw new KernelError(ErrorCode.CORRUPT_RECORD, `Record ${key} is not valid JSON`, { operation: 'decode' }, { cause: e });
        }
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new KernelError(ErrorCode.CORRUPT_RECORD, `Record ${key} is malformed: ${describeIssues(parsed.error)}`, { operation: 'decode' });
        }
        return parsed.data;
    }
}

// --- DOT rendering ---
const quote = (s: string): string => `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

export function toDot(doc: GraphDocument): string {
    const lines = ['digraph vault {'];
    for (const n of doc.nodes) {
        const shape = n.data.kind === 'identity' ? 'box' : 'ellipse';
        lines.push(`  ${quote(n.data.id)} [label=${quote(n.data.label)}, shape=${shape}];`);
    }
    for (const e of doc.edges) {
        const style = e.data.kind === 'access' ? ' [style=dashed]' : '';
        lines.push(`  ${quote(e.data.source)} -> ${quote(e.data.target)}${style};`);
    }
    lines.push('}');
    return lines.join('\n');
}
