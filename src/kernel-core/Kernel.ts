import type { Atom, Hash, JsonValue } from './L0/Ontology.js';
import { OpCode, opKind } from './L0/Ontology.js';
import { decodeI32Pair } from './L0/Codec.js';
import { HANDLERS } from './L3/Dispatch.js';
import type { Vault } from './L2/Vault.js';
import type { IFetcher } from '../Platform/Ports.js';
import { ErrorCode, KernelError, withContext } from './Errors.js';

export type EvaluationState = 'PENDING' | 'RESOLVING' | 'EVALUATED' | 'FAILED';

export interface MeteredResult {
    result: number;
    elapsedNs: number;
}

export type TracedEvaluation =
    | { status: 'EVALUATED'; result: JsonValue; trace: ReadonlyMap<Hash, EvaluationState> }
    | { status: 'FAILED'; error: KernelError; trace: ReadonlyMap<Hash, EvaluationState> };

/**
 * One top-level evaluation. Shared subgraphs are computed once: the memo
 * holds the in-flight promise, so concurrent parents await the same work.
 */
class EvaluationSession {
    private memo: Map<Hash, Promise<JsonValue>> = new Map();
    public readonly states: Map<Hash, EvaluationState> = new Map();

    constructor(private readonly vault: Vault, private readonly fetcher: IFetcher) { }

    public evaluate(hash: Hash): Promise<JsonValue> {
        let pending = this.memo.get(hash);
        if (!pending) {
            this.states.set(hash, 'PENDING');
            pending = this.run(hash);
            this.memo.set(hash, pending);
        }
        return pending;
    }

    private async run(hash: Hash): Promise<JsonValue> {
        let atom: Atom | undefined;
        try {
            atom = await this.vault.fetch(hash);

            // Fan-out; results stay in input order
            this.states.set(hash, 'RESOLVING');
            const inputs = await Promise.all(atom.inputs.map(input => this.evaluate(input)));

            const ref = atom.payloadRef;
            const result = await HANDLERS[opKind(atom.opCode)]({
                hash,
                atom,
                inputs,
                payload: () => this.vault.Blobs.read(ref),
                fetcher: this.fetcher,
            });

            this.states.set(hash, 'EVALUATED');
            return result;
        } catch (e) {
            this.states.set(hash, 'FAILED');
            const ctx = atom ? { hash, opCode: atom.opCode, operation: 'executeSmart' } : { hash, operation: 'executeSmart' };
            throw withContext(e, ctx, ErrorCode.EVALUATION_FAILED);
        }
    }
}

export class GraphKernel {
    constructor(
        private readonly vault: Vault,
        private readonly fetcher: IFetcher
    ) { }

    /** Legacy numeric path: ADD over two LE i32s in the payload. */
    public async execute(hash: Hash): Promise<number> {
        const [a, b] = await this.loadScalarOperands(hash);
        return addI32(a, b);
    }

    /** Times the arithmetic only; fetch and decode happen before the clock starts. */
    public async executeWithMetrics(hash: Hash): Promise<MeteredResult> {
        const [a, b] = await this.loadScalarOperands(hash);
        const start = process.hrtime.bigint();
        const result = addI32(a, b);
        const elapsedNs = Number(process.hrtime.bigint() - start);
        return { result, elapsedNs };
    }

    /** Primary evaluator: recursive over the DAG rooted at hash. */
    public async executeSmart(hash: Hash): Promise<JsonValue> {
        return new EvaluationSession(this.vault, this.fetcher).evaluate(hash);
    }

    /** As executeSmart, but never throws a KernelError; reports per-atom states. */
    public async executeTraced(hash: Hash): Promise<TracedEvaluation> {
        const session = new EvaluationSession(this.vault, this.fetcher);
        try {
            const result = await session.evaluate(hash);
            return { status: 'EVALUATED', result, trace: session.states };
        } catch (e) {
            return { status: 'FAILED', error: withContext(e, { hash }, ErrorCode.EVALUATION_FAILED), trace: session.states };
        }
    }

    private async loadScalarOperands(hash: Hash): Promise<[number, number]> {
        const atom = await this.vault.fetch(hash);
        if (atom.opCode !== OpCode.ADD) {
            throw new KernelError(ErrorCode.INVALID_OPERATION, `Unknown OpCode: ${atom.opCode}`, { hash, opCode: atom.opCode, operation: 'execute' });
        }
        const payload = await this.vault.Blobs.read(atom.payloadRef);
        try {
            return decodeI32Pair(payload);
        } catch (e) {
            throw withContext(e, { hash, opCode: atom.opCode, operation: 'execute' }, ErrorCode.EVALUATION_FAILED);
        }
    }
}

function addI32(a: number, b: number): number {
    return (a + b) | 0;
}
