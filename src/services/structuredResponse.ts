export type StructuredBlock = Record<string, unknown>;

export type ParseOutcome =
    | { kind: 'parsed'; value: StructuredBlock }
    | { kind: 'unparsed'; rawText: string };

export const isRecord = (value: unknown): value is StructuredBlock =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Finds the JSON object embedded in free model output. Model answers often wrap
 * the object in prose or a fenced code block, so the outermost `{ ... }` span is
 * tried first, then each fenced block.
 */
export const parseStructuredBlock = (text: string): ParseOutcome => {
    const candidates: string[] = [];

    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start !== -1 && end > start) {
        candidates.push(text.slice(start, end + 1));
    }

    const fenced = /```(?:json)?\s*([\s\S]*?)```/g;
    let match: RegExpExecArray | null;
    while ((match = fenced.exec(text)) !== null) {
        candidates.push(match[1].trim());
    }

    for (const candidate of candidates) {
        try {
            const value: unknown = JSON.parse(candidate);
            if (isRecord(value)) {
                return { kind: 'parsed', value };
            }
        } catch {
            continue;
        }
    }

    return { kind: 'unparsed', rawText: text };
};

export const clamp01 = (value: number): number => {
    if (!Number.isFinite(value)) {
        return 0;
    }
    return Math.min(1, Math.max(0, value));
};

export const readNumber = (block: StructuredBlock, keys: string[], fallback: number): number => {
    for (const key of keys) {
        const raw = block[key];
        if (typeof raw === 'number' && Number.isFinite(raw)) {
            return clamp01(raw);
        }
        if (typeof raw === 'string' && raw.trim() !== '' && Number.isFinite(Number(raw))) {
            return clamp01(Number(raw));
        }
    }
    return fallback;
};

export const readBoolean = (block: StructuredBlock, keys: string[], fallback: boolean): boolean => {
    for (const key of keys) {
        const raw = block[key];
        if (typeof raw === 'boolean') {
            return raw;
        }
        if (raw === 'true' || raw === 'false') {
            return raw === 'true';
        }
    }
    return fallback;
};

export const readStringList = (block: StructuredBlock, keys: string[]): string[] => {
    for (const key of keys) {
        const raw = block[key];
        if (Array.isArray(raw)) {
            return raw
                .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
                .map(item => String(item).trim())
                .filter(item => item.length > 0);
        }
    }
    return [];
};

export const readString = (block: StructuredBlock, keys: string[], fallback: string): string => {
    for (const key of keys) {
        const raw = block[key];
        if (typeof raw === 'string') {
            return raw;
        }
    }
    return fallback;
};

export const dedupe = (values: Iterable<string>): string[] => [...new Set(values)];
