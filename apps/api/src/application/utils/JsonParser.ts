export class JsonParseError extends Error {
    constructor(message: string, public readonly raw: string) {
        super(message);
        this.name = 'JsonParseError';
    }
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Two-stage parser for model output: a strict parse first, then a parse of
 * the span between the first `{` and the last `}` for JSON wrapped in prose.
 */
export class JsonParser {
    static extractObject(text: string): string | undefined {
        const firstBrace = text.indexOf('{');
        const lastBrace = text.lastIndexOf('}');

        if (firstBrace === -1 || lastBrace <= firstBrace) {
            return undefined;
        }

        return text.substring(firstBrace, lastBrace + 1);
    }

    static parse(text: string): unknown {
        const direct = this.tryParse(text);
        if (direct.ok) return direct.value;

        const extracted = this.extractObject(text);
        if (extracted === undefined) {
            throw new JsonParseError('No JSON object found in model output', text);
        }

        const fallback = this.tryParse(extracted);
        if (fallback.ok) return fallback.value;

        throw new JsonParseError(`Malformed JSON in model output: ${fallback.error}`, text);
    }

    private static tryParse(text: string): ParseAttempt {
        try {
            return { ok: true, value: JSON.parse(text) };
        } catch (error) {
            return { ok: false, error: error instanceof Error ? error.message : 'unknown error' };
        }
    }
}
