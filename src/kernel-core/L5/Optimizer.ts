import type { Atom, ContextID, Hash } from '../L0/Ontology.js';
import type { ILoom } from '../../Platform/Ports.js';

/**
 * Watches metered executions. When an atom runs slower than the threshold,
 * asks the loom for a faster weave and hands the candidate back; admitting
 * it is the caller's decision.
 */
export class Optimizer {
    constructor(
        private readonly thresholdNs: number,
        private readonly loom: ILoom
    ) { }

    public isSlow(durationNs: number): boolean {
        return durationNs > this.thresholdNs;
    }

    public async optimizeIfNeeded(hash: Hash, durationNs: number, contextId: ContextID): Promise<Atom | null> {
        if (!this.isSlow(durationNs)) return null;

        console.warn(`[Optimizer] Hash ${hash} is slow (${durationNs}ns, threshold ${this.thresholdNs}ns). Requesting evolution.`);
        const intent = `Optimize the logic for the node with hash ${hash}. Goal: Reduce execution time.`;
        try {
            return await this.loom.weave(intent, contextId);
        } catch (e) {
            console.warn(`[Optimizer] Failed to evolve ${hash}: ${e instanceof Error ? e.message : String(e)}`);
            return null;
        }
    }
}
