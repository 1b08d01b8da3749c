/**
 * Normalizes a user query before it reaches retrieval or a prompt.
 *
 * - Strips HTML tags
 * - Removes control characters
 * - Removes characters used in injection payloads: { } [ ] \
 * - Collapses runs of whitespace to a single space
 */

const HTML_TAG = /<[^>]*>/g;
// \t \n \r are left for the whitespace pass
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g;
const INJECTION_CHARS = /[{}[\]\\]/g;

export function sanitizeInput(content: string): string {
    if (!content || typeof content !== 'string') {
        return '';
    }

    return content
        .replace(HTML_TAG, '')
        .replace(CONTROL_CHARS, '')
        .replace(INJECTION_CHARS, '')
        .replace(/\s+/g, ' ')
        .trim();
}
