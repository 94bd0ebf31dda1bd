/**
 * Kernel Error Taxonomy
 * Every rejection and failure carries a code, a category and typed context.
 * Display formatting lives in formatError(), not in the error shape.
 */

export enum ErrorCode {
    // I. Storage
    STORAGE_FAILURE = 'STORAGE_FAILURE',
    CORRUPT_RECORD = 'CORRUPT_RECORD',

    // II. Lookup
    NOT_FOUND = 'NOT_FOUND',
    IMPORT_NOT_FOUND = 'IMPORT_NOT_FOUND',

    // III. Validation (Guard)
    POLICY_VIOLATION = 'POLICY_VIOLATION',
    CONTEXT_ISOLATION = 'CONTEXT_ISOLATION',
    MISSING_DEPENDENCY = 'MISSING_DEPENDENCY',
    MALFORMED_CONTRACT = 'MALFORMED_CONTRACT',
    TYPE_MISMATCH = 'TYPE_MISMATCH',
    MANIFEST_INVALID = 'MANIFEST_INVALID',
    ILLEGAL_TRANSITION = 'ILLEGAL_TRANSITION',
    SIGNATURE_INVALID = 'SIGNATURE_INVALID',

    // IV. Runtime
    MALFORMED_PAYLOAD = 'MALFORMED_PAYLOAD',
    NETWORK_FAILURE = 'NETWORK_FAILURE',
    SCHEMA_VIOLATION = 'SCHEMA_VIOLATION',
    WEAVE_FAILED = 'WEAVE_FAILED',
    EVALUATION_FAILED = 'EVALUATION_FAILED',

    // V. Operation
    INVALID_OPERATION = 'INVALID_OPERATION',
}

export type ErrorCategory = 'STORAGE' | 'NOT_FOUND' | 'VALIDATION' | 'RUNTIME' | 'INVALID_OPERATION';

const CATEGORY: Record<ErrorCode, ErrorCategory> = {
    [ErrorCode.STORAGE_FAILURE]: 'STORAGE',
    [ErrorCode.CORRUPT_RECORD]: 'STORAGE',
    [ErrorCode.NOT_FOUND]: 'NOT_FOUND',
    [ErrorCode.IMPORT_NOT_FOUND]: 'NOT_FOUND',
    [ErrorCode.POLICY_VIOLATION]: 'VALIDATION',
    [ErrorCode.CONTEXT_ISOLATION]: 'VALIDATION',
    [ErrorCode.MISSING_DEPENDENCY]: 'VALIDATION',
    [ErrorCode.MALFORMED_CONTRACT]: 'VALIDATION',
    [ErrorCode.TYPE_MISMATCH]: 'VALIDATION',
    [ErrorCode.MANIFEST_INVALID]: 'VALIDATION',
    [ErrorCode.ILLEGAL_TRANSITION]: 'VALIDATION',
    [ErrorCode.SIGNATURE_INVALID]: 'VALIDATION',
    [ErrorCode.MALFORMED_PAYLOAD]: 'RUNTIME',
    [ErrorCode.NETWORK_FAILURE]: 'RUNTIME',
    [ErrorCode.SCHEMA_VIOLATION]: 'RUNTIME',
    [ErrorCode.WEAVE_FAILED]: 'RUNTIME',
    [ErrorCode.EVALUATION_FAILED]: 'RUNTIME',
    [ErrorCode.INVALID_OPERATION]: 'INVALID_OPERATION',
};

/** Diagnostic fields attached as an error travels up through the layers. */
export interface ErrorContext {
    node?: string;
    hash?: string;
    opCode?: number;
    law?: string;
    operation?: string;
}

export class KernelError extends Error {
    public readonly category: ErrorCategory;

    constructor(
        public readonly code: ErrorCode,
        public readonly reason: string,
        public readonly context: ErrorContext = {},
        options?: { cause?: unknown }
    ) {
        super(`[${code}] ${reason}`, options);
        this.name = 'KernelError';
        this.category = CATEGORY[code];
    }
}

export function isKernelError(e: unknown): e is KernelError {
    return e instanceof KernelError;
}

/**
 * Re-raise helper. Keeps the original code and reason, merges context;
 * fields already set by a lower layer win over the caller's.
 * Non-kernel errors take the `fallback` code.
 */
export function withContext(e: unknown, ctx: ErrorContext, fallback: ErrorCode = ErrorCode.STORAGE_FAILURE): KernelError {
    if (e instanceof KernelError) {
        return new KernelError(e.code, e.reason, { ...ctx, ...e.context }, { cause: e });
    }
    const message = e instanceof Error ? e.message : String(e);
    return new KernelError(fallback, message, ctx, { cause: e });
}

export function formatError(e: KernelError): string {
    const parts: string[] = [];
    if (e.context.operation) parts.push(`op=${e.context.operation}`);
    if (e.context.node) parts.push(`node=${e.context.node}`);
    if (e.context.hash) parts.push(`hash=${e.context.hash}`);
    if (e.context.opCode !== undefined) parts.push(`opCode=${e.context.opCode}`);
    if (e.context.law) parts.push(`law=${e.context.law}`);
    const suffix = parts.length > 0 ? ` (${parts.join(', ')})` : '';
    return `${e.category}/${e.code}: ${e.reason}${suffix}`;
}
