/**
 * ONTOLOGY
 * The single source of truth for the engine's primitives.
 */

// --- 1. Identifiers ---
export type Hash = string;      // sha256 hex of a canonical record
export type BlobRef = string;   // opaque blob store handle, e.g. "local://<sha256>"
export type ContextID = string;

export const GLOBAL_CONTEXT: ContextID = 'global';

// --- 2. Operation Codes ---
export const OpCode = {
    ADD: 1,
    FILTER: 2,
    MERGE: 3,
    TRIGGER: 10,
    FINANCIAL: 100,
    IO_FETCH: 200,
    GATEWAY: 201,
    PERMISSION: 500,
    SYNTHESIS: 999,
} as const;

export type KnownOpKind = keyof typeof OpCode;
export type OpKind = KnownOpKind | 'UNKNOWN';

export const KNOWN_OP_KINDS: readonly KnownOpKind[] = [
    'ADD', 'FILTER', 'MERGE', 'TRIGGER', 'FINANCIAL', 'IO_FETCH', 'GATEWAY', 'PERMISSION', 'SYNTHESIS',
];

const KIND_BY_CODE = new Map<number, KnownOpKind>(KNOWN_OP_KINDS.map((k): [number, KnownOpKind] => [OpCode[k], k]));

export function opKind(code: number): OpKind {
    return KIND_BY_CODE.get(code) ?? 'UNKNOWN';
}

// --- 3. Atom ---
export interface Atom {
    opCode: number;         // u16
    inputs: Hash[];         // order is significant
    payloadRef: BlobRef;
    contextId: ContextID;
}

export function isValidOpCode(code: number): boolean {
    return Number.isInteger(code) && code >= 0 && code <= 0xffff;
}

// --- 4. Identity ---
export interface IdentityRecord {
    publicKey: string;
    role: string;
    orgHash: Hash;
    accessNodes: Hash[];    // PERMISSION atoms
}

// --- 5. Project ---
export type ProjectStatus = 'BUILDING' | 'ACTIVE' | 'ARCHIVED';

export interface ProjectRecord {
    name: string;
    rootHash: Hash;
    orgHash: Hash;
    status: ProjectStatus;
    createdAt: string;      // ISO-8601
}

// --- 6. Values produced by evaluation ---
export type JsonValue =
    | null
    | boolean
    | number
    | string
    | JsonValue[]
    | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(v: JsonValue | undefined): v is JsonObject {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}
