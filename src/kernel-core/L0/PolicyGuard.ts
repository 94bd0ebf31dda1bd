// src/kernel-core/L0/PolicyGuard.ts
import type { Atom } from './Ontology.js';
import type { Guard, GuardResult } from './Guards.js';
import { InterestFreeGuard, SovereigntyGuard, toKernelError } from './Guards.js';
import { GuardRegistry } from './GuardRegistry.js';

export const DEFAULT_SOVEREIGN_SUFFIXES: readonly string[] = ['.local', '.internal'];

/**
 * PolicyGuard. Stateless admission checks; configuration is fixed at
 * construction, so one instance may be shared across concurrent writers.
 */
export class PolicyGuard {
    private readonly sovereignty: Guard<{ endpoint: string; sensitivity: number }>;

    constructor(
        sovereignSuffixes: readonly string[] = DEFAULT_SOVEREIGN_SUFFIXES,
        private readonly compatibility: GuardRegistry = GuardRegistry.withDefaults()
    ) {
        this.sovereignty = SovereigntyGuard([...sovereignSuffixes]);
    }

    public verifyInterestFree(rate: number): boolean {
        return InterestFreeGuard({ rate }).ok;
    }

    public verifySovereignty(endpoint: string, sensitivity: number): boolean {
        return this.sovereignty({ endpoint, sensitivity }).ok;
    }

    public checkInterestFree(rate: number): GuardResult {
        return InterestFreeGuard({ rate });
    }

    public checkSovereignty(endpoint: string, sensitivity: number): GuardResult {
        return this.sovereignty({ endpoint, sensitivity });
    }

    /** Throws the first failing structural rule as a KernelError. */
    public verifyCompatibility(atom: Atom, inputs: readonly Atom[]): void {
        const result = this.compatibility.evaluate(atom.opCode, { atom, inputs });
        if (!result.ok) throw toKernelError(result, { opCode: atom.opCode });
    }
}
