import type { Bindings } from './types.js';

const PLACEHOLDER = /\{\{([^}]+)\}\}/g;

// Unknown placeholders are left as written.
export function interpolateString(template: string, bindings: Bindings): string {
    return template.replace(PLACEHOLDER, (match: string, rawName: string) => {
        const name = rawName.trim();
        return Object.prototype.hasOwnProperty.call(bindings, name) ? bindings[name] : match;
    });
}

export function interpolateValue(value: unknown, bindings: Bindings): unknown {
    if (typeof value === 'string') {
        return interpolateString(value, bindings);
    }
    if (Array.isArray(value)) {
        return value.map((item) => interpolateValue(item, bindings));
    }
    if (value !== null && typeof value === 'object') {
        const result: Record<string, unknown> = {};
        for (const [key, entry] of Object.entries(value)) {
            result[key] = interpolateValue(entry, bindings);
        }
        return result;
    }
    return value;
}
