// src/kernel-core/L3/Dispatch.ts
import type { Atom, Hash, JsonObject, JsonValue, OpKind } from '../L0/Ontology.js';
import { isJsonObject } from '../L0/Ontology.js';
import type { FilterConfig } from '../L0/Codec.js';
import {
    decodeJson, decodePayload, decodeText, describeIssues, schemaToZod,
    FilterConfigSchema, GatewayConfigSchema, IOContractSchema,
} from '../L0/Codec.js';
import type { IFetcher } from '../../Platform/Ports.js';
import { ErrorCode, KernelError, isKernelError } from '../Errors.js';

export interface DispatchContext {
    hash: Hash;
    atom: Atom;
    inputs: readonly JsonValue[];   // same order as atom.inputs
    payload: () => Promise<Uint8Array>;
    fetcher: IFetcher;
}

export type Handler = (ctx: DispatchContext) => Promise<JsonValue>;

export const MASK = '***';

// --- JSON narrowing for values that arrive from outside the process ---
export function toJsonValue(v: unknown): JsonValue {
    if (v === null || typeof v === 'string' || typeof v === 'boolean') return v;
    if (typeof v === 'number') return Number.isFinite(v) ? v : null;
    if (Array.isArray(v)) return v.map(toJsonValue);
    if (typeof v === 'object') {
        const out: JsonObject = {};
        for (const [k, val] of Object.entries(v)) {
            if (val !== undefined) out[k] = toJsonValue(val);
        }
        return out;
    }
    return null;
}

// --- FILTER ---
const asNumber = (v: JsonValue | undefined): number => {
    if (typeof v === 'number') return v;
    if (typeof v === 'string' && v.trim() !== '') return Number(v);
    return NaN;
};

const asText = (v: JsonValue | undefined): string => {
    if (v === undefined || v === null) return '';
    return typeof v === 'object' ? JSON.stringify(v) : String(v);
};

/** Returns null for an unrecognised operator. */
export function compileFilter(cfg: FilterConfig): ((row: JsonValue) => boolean) | null {
    const field = (row: JsonValue): JsonValue | undefined => (isJsonObject(row) ? row[cfg.field] : undefined);
    const target = String(cfg.val);
    switch (cfg.op) {
        case '>': return row => asNumber(field(row)) > asNumber(cfg.val);
        case '<': return row => asNumber(field(row)) < asNumber(cfg.val);
        case '==': return row => field(row) !== undefined && asText(field(row)) === target;
        case '!=': return row => asText(field(row)) !== target || field(row) === undefined;
        case 'contains': return row => field(row) !== undefined && asText(field(row)).includes(target);
        case 'not_contains': return row => !asText(field(row)).includes(target) || field(row) === undefined;
        default: return null;
    }
}

const filter: Handler = async ({ inputs, payload, hash }) => {
    const cfg = decodePayload(FilterConfigSchema, await payload(), ErrorCode.MALFORMED_PAYLOAD);
    const list = inputs[0];
    if (!Array.isArray(list)) {
        throw new KernelError(ErrorCode.MALFORMED_PAYLOAD, 'FILTER input 0 did not evaluate to a list');
    }
    const predicate = compileFilter(cfg);
    if (!predicate) {
        console.warn(`[Kernel] FILTER ${hash}: unknown operator '${cfg.op}', passing ${list.length} rows through`);
        return list;
    }
    return list.filter(predicate);
};

// --- MERGE ---
const merge: Handler = async ({ inputs }) => {
    const out: JsonValue[] = [];
    for (const value of inputs) {
        if (Array.isArray(value)) out.push(...value);
    }
    return out;
};

// --- TRIGGER ---
const trigger: Handler = async ({ payload }) => {
    const bytes = await payload();
    if (bytes.length === 0) return null;
    return toJsonValue(decodeJson(bytes));
};

// --- FINANCIAL ---
const financial: Handler = async ({ inputs }) => {
    const first = inputs[0];
    return first !== undefined ? first : { audit: 'acknowledged' };
};

// --- IO_FETCH ---
const ioFetch: Handler = async ({ payload, fetcher }) => {
    const contract = decodePayload(IOContractSchema, await payload(), ErrorCode.MALFORMED_PAYLOAD);
    let body: unknown;
    try {
        body = await fetcher.fetchJson(contract.endpoint);
    } catch (e) {
        if (isKernelError(e)) throw e;
        throw new KernelError(ErrorCode.NETWORK_FAILURE, `Fetch failed for ${contract.endpoint}: ${e instanceof Error ? e.message : String(e)}`, {}, { cause: e });
    }
    const verdict = schemaToZod(contract.schema).safeParse(body);
    if (!verdict.success) {
        throw new KernelError(ErrorCode.SCHEMA_VIOLATION, `Response from ${contract.endpoint} violates its contract: ${describeIssues(verdict.error)}`);
    }
    return toJsonValue(body);
};

// --- GATEWAY ---
function maskValue(value: JsonValue, fields: readonly string[]): JsonValue {
    if (fields.length === 0) return value;
    if (Array.isArray(value)) return value.map(v => maskValue(v, fields));
    if (!isJsonObject(value)) return value;
    const out: JsonObject = { ...value };
    for (const f of fields) {
        if (f in out) out[f] = MASK;
    }
    return out;
}

const gateway: Handler = async ({ inputs, payload, hash }): Promise<JsonValue> => {
    const bytes = await payload();
    const cfg = bytes.length === 0
        ? { origin: undefined, mask: [] }
        : decodePayload(GatewayConfigSchema, bytes, ErrorCode.MALFORMED_PAYLOAD);
    const origin = cfg.origin ?? hash;
    const first = inputs[0];
    if (first === undefined) {
        const degraded: JsonObject = { error: 'NO_INPUT', origin, message: 'Gateway has no input to forward' };
        return degraded;
    }
    const envelope: JsonObject = { origin, payload: maskValue(first, cfg.mask), masked_fields: [...cfg.mask] };
    return envelope;
};

// --- SYNTHESIS ---
const synthesis: Handler = async ({ payload, hash }) => ({
    status: 'synthesis_required',
    intent: decodeText(await payload()),
    atom: hash,
});

// --- PERMISSION, UNKNOWN ---
// No value of their own; evaluate to null.
const opaque: Handler = async () => null;

/**
 * One handler per operation kind. The Record type keeps the table
 * exhaustive over OpKind, UNKNOWN included.
 */
export const HANDLERS: Record<OpKind, Handler> = {
    ADD: async () => ({ kind: 'legacy_scalar' }),
    FILTER: filter,
    MERGE: merge,
    TRIGGER: trigger,
    FINANCIAL: financial,
    IO_FETCH: ioFetch,
    GATEWAY: gateway,
    PERMISSION: opaque,
    SYNTHESIS: synthesis,
    UNKNOWN: opaque,
};
