// Matches "[#2]" as well as lists such as "[#1, #3]" or "[#1,3]".
const CITATION_PATTERN = /\[#\s*(\d+(?:\s*,\s*#?\s*\d+)*)\s*\]/g;

export interface Citation<T> {
    citation: number;
    result: T;
}

/**
 * Citation numbers in the order they first appear in the answer, without duplicates.
 */
export function extractCitationNumbers(answer: string): number[] {
    const seen = new Set<number>();
    const numbers: number[] = [];

    for (const match of answer.matchAll(CITATION_PATTERN)) {
        for (const part of (match[1] ?? '').split(',')) {
            const value = Number.parseInt(part.replace('#', '').trim(), 10);
            if (Number.isInteger(value) && !seen.has(value)) {
                seen.add(value);
                numbers.push(value);
            }
        }
    }

    return numbers;
}

/**
 * Maps the citation markers of an answer back to the numbered context entries.
 * Numbers outside 1..results.length are ignored.
 */
export function extractCitations<T>(answer: string, results: readonly T[]): Citation<T>[] {
    const citations: Citation<T>[] = [];

    for (const citation of extractCitationNumbers(answer)) {
        const result = results[citation - 1];
        if (citation >= 1 && result !== undefined) {
            citations.push({ citation, result });
        }
    }

    return citations;
}
