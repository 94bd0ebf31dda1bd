import type { Atom, ContextID } from '../../kernel-core/L0/Ontology.js';
import { OpCode } from '../../kernel-core/L0/Ontology.js';
import { encodeI32s, encodeJson } from '../../kernel-core/L0/Codec.js';
import type { IBlobStore, ILoom } from '../../Platform/Ports.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';

interface Draft {
    opCode: number;
    payload: Uint8Array;
}

type Rule = (text: string) => Draft | null;

const SENSITIVITY: Record<string, 0 | 1 | 2> = { public: 0, private: 1, sovereign: 2 };

const RULES: readonly Rule[] = [
    // "Add 10 and 20"
    text => {
        const m = /\badd\s+(-?\d+)\s+and\s+(-?\d+)\b/i.exec(text);
        return m ? { opCode: OpCode.ADD, payload: encodeI32s(Number(m[1]), Number(m[2])) } : null;
    },
    // "Calculate Zakat for 5000" -> rate 0, amount
    text => {
        const m = /\bcalculate zakat for\s+(\d+)\b/i.exec(text);
        return m ? { opCode: OpCode.FINANCIAL, payload: encodeI32s(0, Number(m[1])) } : null;
    },
    // "Charge 5% interest"
    text => {
        const m = /\bcharge\s+(\d+)%\s+interest\b/i.exec(text);
        return m ? { opCode: OpCode.FINANCIAL, payload: encodeI32s(Number(m[1])) } : null;
    },
    // "Filter built > 2020"
    text => {
        const m = /^filter\s+(\w+)\s+(>|<|==|!=|not_contains|contains)\s+(.+)$/i.exec(text.trim());
        if (!m) return null;
        const raw = (m[3] ?? '').trim();
        const val = /^-?\d+(\.\d+)?$/.test(raw) ? Number(raw) : raw;
        return { opCode: OpCode.FILTER, payload: encodeJson({ field: m[1], op: m[2], val }) };
    },
    // "Merge"
    text => (/^merge\b/i.test(text.trim()) ? { opCode: OpCode.MERGE, payload: new Uint8Array(0) } : null),
    // "Fetch http://localhost:8080/balance as sovereign"
    text => {
        const m = /^fetch\s+(\S+)(?:\s+as\s+(public|private|sovereign))?\s*$/i.exec(text.trim());
        if (!m) return null;
        const sensitivity = SENSITIVITY[(m[2] ?? 'public').toLowerCase()] ?? 0;
        return { opCode: OpCode.IO_FETCH, payload: encodeJson({ endpoint: m[1], schema: {}, sensitivity }) };
    },
    // "Mask phone, email"
    text => {
        const m = /^mask\s+(.+)$/i.exec(text.trim());
        if (!m) return null;
        const mask = (m[1] ?? '').split(',').map(s => s.trim()).filter(s => s.length > 0);
        return { opCode: OpCode.GATEWAY, payload: encodeJson({ mask }) };
    },
    // "On order_created"
    text => {
        const m = /^on\s+(\S+)\s*$/i.exec(text.trim());
        return m ? { opCode: OpCode.TRIGGER, payload: encodeJson({ event: m[1] }) } : null;
    },
];

/**
 * Rule-based stand-in for a model-backed loom. Intents no rule understands
 * become SYNTHESIS atoms carrying the original text.
 */
export class HeuristicLoom implements ILoom {
    constructor(private readonly blobs: IBlobStore) { }

    async weave(intent: string, contextId: ContextID): Promise<Atom> {
        const text = intent.trim();
        if (text.length === 0) {
            throw new KernelError(ErrorCode.WEAVE_FAILED, 'Intent is empty');
        }

        let draft: Draft | null = null;
        for (const rule of RULES) {
            draft = rule(text);
            if (draft) break;
        }
        const chosen = draft ?? { opCode: OpCode.SYNTHESIS, payload: new Uint8Array(Buffer.from(text, 'utf8')) };

        return {
            opCode: chosen.opCode,
            inputs: [],
            payloadRef: await this.blobs.write(chosen.payload),
            contextId,
        };
    }
}
