// src/output_writer/stable_stringify.ts

/**
 * JSON with object keys sorted at every depth. Identical values always produce
 * identical bytes, which the envelope and review artifacts rely on.
 * `undefined` object members are dropped and `undefined` array items become null,
 * as JSON.stringify does.
 */
export function stableStringify(value: unknown, indent = 0): string {
    return render(value, indent, 0);
}

/** Two-space indented variant, newline-terminated, for artifacts meant to be read by people. */
export function stableStringifyPretty(value: unknown): string {
    return stableStringify(value, 2) + "\n";
}

function render(value: unknown, indent: number, depth: number): string {
    if (value === null) return "null";
    const t = typeof value;

    if (t === "number" || t === "boolean" || t === "string") return JSON.stringify(value);

    const pad = indent > 0 ? "\n" + " ".repeat(indent * (depth + 1)) : "";
    const close = indent > 0 ? "\n" + " ".repeat(indent * depth) : "";
    const colon = indent > 0 ? ": " : ":";

    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        const items = value.map((v) => pad + (v === undefined ? "null" : render(v, indent, depth + 1)));
        return "[" + items.join(",") + close + "]";
    }

    if (typeof value === "object" && value !== null) {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)); // UTF-16 code unit order
        if (entries.length === 0) return "{}";
        const members = entries.map(([k, v]) => pad + JSON.stringify(k) + colon + render(v, indent, depth + 1));
        return "{" + members.join(",") + close + "}";
    }

    // undefined, function, symbol, bigint
    throw new Error("UNSUPPORTED_JSON_TYPE");
}
