import { ErrorCode, KernelError } from '../kernel-core/Errors.js';

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w]*)\s*\}\}/g;

/**
 * Substitutes {{name}} placeholders in a manifest template.
 * Every placeholder must have a value; the compiler only ever sees final text.
 */
export function renderTemplate(template: string, vars: Readonly<Record<string, string | number>>): string {
    const missing = new Set<string>();
    const out = template.replace(PLACEHOLDER, (whole: string, name: string) => {
        const value = vars[name];
        if (value === undefined) {
            missing.add(name);
            return whole;
        }
        return String(value);
    });
    if (missing.size > 0) {
        throw new KernelError(ErrorCode.MANIFEST_INVALID, `Template variables missing: ${[...missing].join(', ')}`, { operation: 'renderTemplate' });
    }
    return out;
}
