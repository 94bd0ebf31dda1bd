// src/kernel-core/L4/Manifest.ts
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { describeIssues } from '../L0/Codec.js';
import { ErrorCode, KernelError } from '../Errors.js';

export const ManifestImportSchema = z.object({
    name: z.string().min(1),
    hash: z.string().min(1),
});

export const ManifestNodeSchema = z.object({
    name: z.string().min(1),
    intent: z.string().optional(),
    use_ref: z.string().optional(),
    dependencies: z.array(z.string()).default([]),
}).refine(n => (n.intent === undefined) !== (n.use_ref === undefined), {
    message: "Node must have exactly one of 'intent' or 'use_ref'",
});

// UI form definition; carried through compile untouched.
export const InputSchemaSchema = z.object({
    name: z.string(),
    label: z.string(),
    input_type: z.string(),
    options: z.array(z.string()).optional(),
});

export const ManifestSchema = z.object({
    app_name: z.string().min(1),
    extends: z.string().optional(),
    inputs: z.array(InputSchemaSchema).default([]),
    imports: z.array(ManifestImportSchema).default([]),
    nodes: z.array(ManifestNodeSchema).default([]),
});

export type ManifestImport = z.infer<typeof ManifestImportSchema>;
export type ManifestNode = z.infer<typeof ManifestNodeSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;

/** YAML or JSON (JSON is a YAML subset). */
export function parseManifest(raw: string, label: string = 'manifest'): Manifest {
    let doc: unknown;
    try {
        doc = parseYaml(raw);
    } catch (e) {
        throw new KernelError(ErrorCode.MANIFEST_INVALID, `Failed to parse ${label}: ${e instanceof Error ? e.message : String(e)}`, { operation: 'parseManifest' }, { cause: e });
    }
    const parsed = ManifestSchema.safeParse(doc);
    if (!parsed.success) {
        throw new KernelError(ErrorCode.MANIFEST_INVALID, `Invalid ${label}: ${describeIssues(parsed.error)}`, { operation: 'parseManifest' });
    }
    return parsed.data;
}

/**
 * Parent first, child second, for both imports and nodes: parent nodes are
 * processed (and so available as dependencies) before any child node, and
 * a child import shadows a same-named parent import.
 */
export function mergeManifests(parent: Manifest, child: Manifest): Manifest {
    return {
        ...child,
        inputs: [...parent.inputs, ...child.inputs],
        imports: [...parent.imports, ...child.imports],
        nodes: [...parent.nodes, ...child.nodes],
    };
}

/** Later entries win on name collision. */
export function importTable(imports: readonly ManifestImport[]): Map<string, string> {
    const table = new Map<string, string>();
    for (const item of imports) table.set(item.name, item.hash);
    return table;
}
