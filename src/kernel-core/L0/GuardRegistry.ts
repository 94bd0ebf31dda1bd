import type { Guard, GuardResult, CompatibilityInput } from './Guards.js';
import { FilterShapeGuard } from './Guards.js';
import { opKind } from './Ontology.js';
import type { OpKind } from './Ontology.js';

interface RegisteredGuard {
    name: string;
    guard: Guard<CompatibilityInput>;
}

/**
 * Structural rules keyed by operation kind. Kinds with no registered rule
 * are admitted; new producer/consumer constraints attach here.
 */
export class GuardRegistry {
    private guards: Map<OpKind, RegisteredGuard[]> = new Map();

    public static withDefaults(): GuardRegistry {
        const registry = new GuardRegistry();
        registry.register('FILTER', 'filter-shape', FilterShapeGuard);
        return registry;
    }

    public register(kind: OpKind, name: string, guard: Guard<CompatibilityInput>): this {
        const existing = this.guards.get(kind) || [];
        existing.push({ name, guard });
        this.guards.set(kind, existing);
        return this;
    }

    public rulesFor(kind: OpKind): string[] {
        return (this.guards.get(kind) || []).map(g => g.name);
    }

    public evaluate(opCode: number, context: CompatibilityInput): GuardResult {
        const registered = this.guards.get(opKind(opCode));
        if (!registered || registered.length === 0) {
            return { ok: true };
        }

        for (const entry of registered) {
            const result = entry.guard(context);
            if (!result.ok) {
                // Return first failure
                return result;
            }
        }

        return { ok: true };
    }
}
