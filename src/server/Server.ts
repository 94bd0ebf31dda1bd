import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server as HttpServer } from 'http';
import { z } from 'zod';
import type { Engine } from '../Platform/Engine.js';
import type { Atom } from '../kernel-core/L0/Ontology.js';
import { renderTemplate } from '../Platform/Template.js';
import { canonicalize, verifySignature } from '../kernel-core/L0/Crypto.js';
import { describeIssues, encodeJson } from '../kernel-core/L0/Codec.js';
import { principalHashOf } from '../kernel-core/L2/Vault.js';
import type { ErrorCategory } from '../kernel-core/Errors.js';
import { ErrorCode, KernelError, formatError, isKernelError } from '../kernel-core/Errors.js';

// --- Request Schemas ---
const AtomRequest = z.object({
    opCode: z.number().int().min(0).max(0xffff),
    inputs: z.array(z.string()).default([]),
    contextId: z.string().min(1),
    payload: z.union([
        z.object({ base64: z.string() }),
        z.object({ text: z.string() }),
        z.object({ json: z.unknown().refine(v => v !== undefined, { message: 'Required' }) }),
    ]).optional(),
});

const BuildRequest = z.object({
    manifest: z.string().min(1),
    variables: z.record(z.union([z.string(), z.number()])).default({}),
    orgHash: z.string().default(''),
});

const StatusRequest = z.object({
    status: z.enum(['BUILDING', 'ACTIVE', 'ARCHIVED']),
});

const IdentityRequest = z.object({
    publicKey: z.string().regex(/^[0-9a-f]{64}$/i),
    role: z.string().min(1),
    orgHash: z.string(),
    signature: z.string().regex(/^[0-9a-f]+$/i),
});

const GrantRequest = z.object({
    resource: z.string().min(1),
});

/** The message a principal signs to register or update its identity record. */
export function identityClaim(publicKey: string, role: string, orgHash: string): string {
    return canonicalize({ publicKey, role, orgHash });
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
    NOT_FOUND: 404,
    VALIDATION: 422,
    RUNTIME: 500,
    INVALID_OPERATION: 400,
    STORAGE: 503,
};

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new KernelError(ErrorCode.INVALID_OPERATION, `Invalid request: ${describeIssues(parsed.error)}`, { operation: 'request' });
    }
    return parsed.data;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const route = (fn: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
};

function payloadBytes(payload: z.infer<typeof AtomRequest>['payload']): Uint8Array {
    if (payload === undefined) return new Uint8Array(0);
    if ('base64' in payload) return new Uint8Array(Buffer.from(payload.base64, 'base64'));
    if ('text' in payload) return new Uint8Array(Buffer.from(payload.text, 'utf8'));
    return encodeJson(payload.json);
}

export class ApiServer {
    public readonly app: express.Express;
    private http: HttpServer | null = null;

    constructor(private readonly engine: Engine, private readonly port: number = 3000) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json({ limit: '1mb' }));
        this.setupRoutes();
        this.app.use(this.handleError);
    }

    public async start(): Promise<HttpServer> {
        const registry = await this.engine.boot();
        console.log(`[Server] Genesis catalogue ready (${registry.size} atoms).`);
        return new Promise(resolve => {
            const server = this.app.listen(this.port, () => {
                console.log(`[Server] Listening on port ${this.port}`);
                resolve(server);
            });
            this.http = server;
        });
    }

    public async stop(): Promise<void> {
        const server = this.http;
        if (!server) return;
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
        this.http = null;
    }

    private setupRoutes() {
        const { vault, guard, kernel, orchestrator } = this.engine;

        // Atoms
        this.app.post('/atoms', route(async (req, res) => {
            const body = parseBody(AtomRequest, req.body);
            const payloadRef = await vault.Blobs.write(payloadBytes(body.payload));
            const hash = await vault.persistVerified({ opCode: body.opCode, inputs: body.inputs, payloadRef, contextId: body.contextId }, guard);
            res.status(201).json({ hash });
        }));

        this.app.get('/atoms/:hash', route(async (req, res) => {
            res.json(await vault.fetch(req.params['hash'] ?? ''));
        }));

        // Evaluation
        this.app.post('/execute/:hash', route(async (req, res) => {
            const hash = req.params['hash'] ?? '';
            const traced = await kernel.executeTraced(hash);
            if (traced.status === 'FAILED') throw traced.error;
            res.json({ hash, result: traced.result, trace: Object.fromEntries(traced.trace) });
        }));

        this.app.post('/execute/:hash/scalar', route(async (req, res) => {
            const hash = req.params['hash'] ?? '';
            const metered = await kernel.executeWithMetrics(hash);
            const { contextId } = await vault.fetch(hash);
            const candidate = await this.engine.optimizer.optimizeIfNeeded(hash, metered.elapsedNs, contextId);
            res.json({
                hash,
                result: metered.result,
                elapsedNs: metered.elapsedNs,
                slow: this.engine.optimizer.isSlow(metered.elapsedNs),
                candidate: candidate ? await this.admitCandidate(hash, candidate) : null,
            });
        }));

        // Build & Projects
        this.app.post('/build', route(async (req, res) => {
            const body = parseBody(BuildRequest, req.body);
            const manifest = renderTemplate(body.manifest, body.variables);
            const project = await orchestrator.deployProject(manifest, body.orgHash);
            res.status(201).json(project);
        }));

        this.app.get('/projects', route(async (_req, res) => {
            res.json(await vault.listProjects());
        }));

        this.app.get('/projects/:name', route(async (req, res) => {
            res.json(await vault.getProject(req.params['name'] ?? ''));
        }));

        this.app.patch('/projects/:name/status', route(async (req, res) => {
            const body = parseBody(StatusRequest, req.body);
            res.json(await vault.updateProjectStatus(req.params['name'] ?? '', body.status));
        }));

        // Identities & Resonance
        this.app.post('/identities', route(async (req, res) => {
            const body = parseBody(IdentityRequest, req.body);
            const claim = identityClaim(body.publicKey, body.role, body.orgHash);
            if (!(await verifySignature(claim, body.signature, body.publicKey))) {
                throw new KernelError(ErrorCode.SIGNATURE_INVALID, 'Identity claim signature does not verify', { operation: 'registerIdentity' });
            }
            const principal = principalHashOf(body.publicKey);
            let accessNodes: string[] = [];
            try {
                accessNodes = (await vault.fetchIdentity(principal)).accessNodes;
            } catch (e) {
                if (!isKernelError(e) || e.code !== ErrorCode.NOT_FOUND) throw e;
            }
            const hash = await vault.persistIdentity({ publicKey: body.publicKey, role: body.role, orgHash: body.orgHash, accessNodes });
            res.status(201).json({ principal: hash });
        }));

        this.app.post('/identities/:principal/grants', route(async (req, res) => {
            const body = parseBody(GrantRequest, req.body);
            const permission = await vault.grantAccess(req.params['principal'] ?? '', body.resource);
            res.status(201).json({ permission });
        }));

        this.app.get('/resonance', route(async (req, res) => {
            const principal = typeof req.query['principal'] === 'string' ? req.query['principal'] : '';
            const resource = typeof req.query['resource'] === 'string' ? req.query['resource'] : '';
            res.json({ principal, resource, resonant: await vault.verifyResonance(principal, resource) });
        }));

        // Introspection
        this.app.get('/inventory', route(async (_req, res) => {
            res.json(await vault.inventory());
        }));

        this.app.get('/graph', route(async (req, res) => {
            if (req.query['format'] === 'dot') {
                res.type('text/vnd.graphviz').send(await vault.exportGraph('dot'));
                return;
            }
            res.json(await vault.exportGraph('json'));
        }));

        this.app.get('/registry', route(async (_req, res) => {
            res.json(Object.fromEntries(this.engine.Registry));
        }));
    }

    /** Persists an optimizer candidate; null when the guard refuses it. */
    private async admitCandidate(slowHash: string, candidate: Atom): Promise<string | null> {
        try {
            return await this.engine.vault.persistVerified(candidate, this.engine.guard);
        } catch (e) {
            if (!isKernelError(e)) throw e;
            console.warn(`[Server] Candidate for ${slowHash} rejected: ${formatError(e)}`);
            return null;
        }
    }

    private handleError = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (isKernelError(err)) {
            const status = STATUS_BY_CATEGORY[err.category];
            if (status >= 500) console.error(`[Server] ${formatError(err)}`);
            res.status(status).json({ error: { code: err.code, category: err.category, message: err.reason, context: err.context } });
            return;
        }
        console.error('[Server] Unhandled error:', err);
        res.status(500).json({ error: { code: 'INTERNAL', message: err instanceof Error ? err.message : String(err) } });
    };
}
