/**
 * Sanitizes user-supplied text (questions, chat history) before it is placed
 * in a prompt.
 *
 * - Strips HTML tags
 * - Neutralises common prompt injection phrases
 * - Limits content length
 */

const MAX_CONTENT_LENGTH = 10000;

// Patterns that could be used for prompt injection
const DANGEROUS_PATTERNS = [
    /system:/gi,
    /assistant:/gi,
    /ignore previous/gi,
    /ignore all previous/gi,
    /disregard previous/gi,
    /forget previous/gi,
    /new instructions:/gi,
    /override instructions/gi,
    // Prompt section markers used by PromptBuilder
    /context \(numbered\):/gi,
];


export const BLOCKED_PLACEHOLDER = '[BLOCKED]';

export interface SanitizeOptions {
    maxLength?: number;
    stripHtml?: boolean;
    blockPatterns?: RegExp[];
}

export function sanitizeInput(
    content: string,
    options: SanitizeOptions = {}
): string {
    const {
        maxLength = MAX_CONTENT_LENGTH,
        stripHtml = true,
        blockPatterns = DANGEROUS_PATTERNS,
    } = options;

    if (!content) {
        return '';
    }

    let sanitized = content;

    if (stripHtml) {
        sanitized = sanitized.replace(/<[^>]*>/g, '');
    }

    for (const pattern of blockPatterns) {
        sanitized = sanitized.replace(pattern, BLOCKED_PLACEHOLDER);
    }

    if (sanitized.length > maxLength) {
        sanitized = sanitized.substring(0, maxLength);
    }

    return sanitized.trim();
}
