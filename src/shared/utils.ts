import { WorkspaceValidationError } from '../workspace/workspace.errors';

export function now(): string {
    return new Date().toISOString();
}

/** Trims `value` and rejects it when nothing is left. */
export function requireText(value: string | null | undefined, field: string): string {
    const text = typeof value === 'string' ? value.trim() : '';
    if (!text) {
        throw new WorkspaceValidationError(`${field} cannot be empty`);
    }
    return text;
}

/** Trims `value`, mapping blank input to null. */
export function optionalText(value: string | null | undefined): string | null {
    const text = typeof value === 'string' ? value.trim() : '';
    return text || null;
}
