// src/kernel-core/L0/Guards.ts
import { isIP } from 'net';
import type { Atom } from './Ontology.js';
import { OpCode } from './Ontology.js';
import { ErrorCode, KernelError } from '../Errors.js';

// --- Guard Pattern ---
export interface GuardResult {
    ok: boolean;
    code?: ErrorCode;
    violation?: string;
    law?: string;
}

export type Guard<T> = (input: T) => GuardResult;

export const OK: GuardResult = { ok: true };
export const FAIL = (code: ErrorCode, msg: string, law?: string): GuardResult =>
    law ? { ok: false, code, violation: msg, law } : { ok: false, code, violation: msg };

export const LAW_INTEREST_FREE = 'INTEREST_FREE';
export const LAW_DATA_SOVEREIGNTY = 'DATA_SOVEREIGNTY';

export interface CompatibilityInput {
    atom: Atom;
    inputs: readonly Atom[];
}

// --- Concrete Guards ---

// 1. Interest-Free Law
// Posed as a satisfiability query: is the observed rate inside the solution
// set of the constraint system? Today the system is the single equation rate == 0.
interface Constraint {
    name: string;
    holds: (rate: number) => boolean;
}

const INTEREST_FREE_CONSTRAINTS: readonly Constraint[] = [
    { name: 'rate == 0', holds: rate => rate === 0 },
];

export const InterestFreeGuard: Guard<{ rate: number }> = ({ rate }) => {
    const unsatisfied = INTEREST_FREE_CONSTRAINTS.find(c => !c.holds(rate));
    if (unsatisfied) {
        return FAIL(
            ErrorCode.POLICY_VIOLATION,
            `Violation of ${LAW_INTEREST_FREE} law: rate ${rate} does not satisfy ${unsatisfied.name}`,
            LAW_INTEREST_FREE
        );
    }
    return OK;
};

// 2. Data Sovereignty Law
export function isSovereignHost(host: string, suffixes: readonly string[]): boolean {
    const h = host.toLowerCase().replace(/^\[|\]$/g, '');
    if (h === 'localhost' || h.endsWith('.localhost')) return true;
    if (isIP(h) === 4) return h.startsWith('127.');
    if (isIP(h) === 6) return h === '::1';
    return suffixes.some(s => {
        const domain = s.toLowerCase().replace(/^\.+/, '');
        return domain.length > 0 && (h === domain || h.endsWith(`.${domain}`));
    });
}

function hostOf(endpoint: string): string | null {
    try {
        return new URL(endpoint).hostname;
    } catch {
        return null;
    }
}

export const SovereigntyGuard = (suffixes: readonly string[]): Guard<{ endpoint: string; sensitivity: number }> =>
    ({ endpoint, sensitivity }) => {
        if (sensitivity < 2) return OK;
        const host = hostOf(endpoint);
        if (host !== null && isSovereignHost(host, suffixes)) return OK;
        return FAIL(
            ErrorCode.POLICY_VIOLATION,
            `Violation of ${LAW_DATA_SOVEREIGNTY} law: sovereign data may not leave to ${endpoint}`,
            LAW_DATA_SOVEREIGNTY
        );
    };

// 3. Structural Compatibility
export const FilterShapeGuard: Guard<CompatibilityInput> = ({ inputs }) => {
    const source = inputs[0];
    if (!source) return FAIL(ErrorCode.MISSING_DEPENDENCY, 'FILTER requires at least one input list');
    if (source.opCode === OpCode.ADD) {
        return FAIL(ErrorCode.TYPE_MISMATCH, 'FILTER cannot consume the scalar output of ADD');
    }
    return OK;
};

export function toKernelError(result: GuardResult, ctx: { opCode?: number; hash?: string } = {}): KernelError {
    return new KernelError(
        result.code ?? ErrorCode.POLICY_VIOLATION,
        result.violation ?? 'Guard rejected atom',
        result.law ? { ...ctx, law: result.law } : ctx
    );
}
