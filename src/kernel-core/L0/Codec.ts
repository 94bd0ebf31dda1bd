// src/kernel-core/L0/Codec.ts
// Payload codecs. Atoms carry only a blob reference; these turn blob bytes
// into the typed configuration each operation expects.
import { z } from 'zod';
import { ErrorCode, KernelError } from '../Errors.js';

// --- 1. Binary ---

export function encodeI32s(...values: number[]): Uint8Array {
    const buf = Buffer.alloc(values.length * 4);
    values.forEach((v, i) => buf.writeInt32LE(v, i * 4));
    return new Uint8Array(buf);
}

/** First 4 bytes as LE i32; payloads shorter than that carry rate 0. */
export function decodeRate(bytes: Uint8Array): number {
    if (bytes.length < 4) return 0;
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).readInt32LE(0);
}

export function decodeI32Pair(bytes: Uint8Array): [number, number] {
    if (bytes.length < 8) {
        throw new KernelError(ErrorCode.MALFORMED_PAYLOAD, `Insufficient data for ADD operation: ${bytes.length} bytes, need 8`);
    }
    const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return [buf.readInt32LE(0), buf.readInt32LE(4)];
}

// --- 2. Text / JSON ---

export function encodeJson(value: unknown): Uint8Array {
    return new Uint8Array(Buffer.from(JSON.stringify(value), 'utf8'));
}

export function decodeText(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8');
}

export function decodeJson(bytes: Uint8Array, code: ErrorCode = ErrorCode.MALFORMED_PAYLOAD): unknown {
    try {
        return JSON.parse(decodeText(bytes));
    } catch (e) {
        throw new KernelError(code, `Payload is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
}

/** JSON decode + schema check; failures carry the given code. */
export function decodePayload<T extends z.ZodTypeAny>(schema: T, bytes: Uint8Array, code: ErrorCode): z.infer<T> {
    const parsed = schema.safeParse(decodeJson(bytes, code));
    if (!parsed.success) {
        throw new KernelError(code, `Payload rejected: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}

export function describeIssues(err: z.ZodError): string {
    return err.issues
        .map(i => `${i.path.length > 0 ? i.path.join('.') : '<root>'}: ${i.message}`)
        .join('; ');
}

// --- 3. Operation Configs ---

export const FilterConfigSchema = z.object({
    field: z.string(),
    op: z.string(),
    val: z.union([z.number(), z.string()]),
});
export type FilterConfig = z.infer<typeof FilterConfigSchema>;

export const IOContractSchema = z.object({
    endpoint: z.string().min(1),
    schema: z.record(z.unknown()),
    sensitivity: z.union([z.literal(0), z.literal(1), z.literal(2)]),
});
export type IOContract = z.infer<typeof IOContractSchema>;

export const GatewayConfigSchema = z.object({
    origin: z.string().optional(),
    mask: z.array(z.string()).default([]),
});
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

// --- 4. Response Contracts ---
// Compiles the JSON-schema subset carried by I/O contracts into a zod validator:
// type, properties, required, items, enum. Unrecognised keywords are ignored.

export function schemaToZod(doc: unknown): z.ZodTypeAny {
    if (typeof doc !== 'object' || doc === null || Array.isArray(doc)) return z.unknown();
    const node = new Map<string, unknown>(Object.entries(doc));

    const enumValues = node.get('enum');
    if (Array.isArray(enumValues) && enumValues.length > 0) {
        const allowed = enumValues.map(v => JSON.stringify(v));
        return z.unknown().refine(v => allowed.includes(JSON.stringify(v)), {
            message: `Expected one of ${allowed.join(', ')}`,
        });
    }

    switch (node.get('type')) {
        case 'string': return z.string();
        case 'number': return z.number();
        case 'integer': return z.number().int();
        case 'boolean': return z.boolean();
        case 'null': return z.null();
        case 'array': return z.array(schemaToZod(node.get('items')));
        case 'object': {
            const props = node.get('properties');
            const required = node.get('required');
            const requiredSet = new Set(Array.isArray(required) ? required.filter((r): r is string => typeof r === 'string') : []);
            const shape: Record<string, z.ZodTypeAny> = {};
            if (typeof props === 'object' && props !== null && !Array.isArray(props)) {
                for (const [key, sub] of Object.entries(props)) {
                    const zs = schemaToZod(sub);
                    shape[key] = requiredSet.has(key) ? zs : zs.optional();
                }
            }
            for (const key of requiredSet) {
                if (!(key in shape)) shape[key] = z.unknown().refine(v => v !== undefined, { message: 'Required' });
            }
            return z.object(shape).passthrough();
        }
        default:
            return z.unknown();
    }
}
