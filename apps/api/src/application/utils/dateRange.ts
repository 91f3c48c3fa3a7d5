import type { DocumentMetadata } from '@transcript-rag/types';

/**
 * Inclusive range of calendar days, as `YYYY-MM-DD` in local time.
 */
export interface DateRange {
    start: string;
    end: string;
}

const pad = (value: number) => String(value).padStart(2, '0');

export const formatDay = (date: Date): string =>
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

const day = (year: number, month: number, date: number) => new Date(year, month, date);

const addDays = (date: Date, days: number) => day(date.getFullYear(), date.getMonth(), date.getDate() + days);

const range = (start: Date, end: Date): DateRange => ({ start: formatDay(start), end: formatDay(end) });

const monthOf = (date: Date): DateRange =>
    range(day(date.getFullYear(), date.getMonth(), 1), day(date.getFullYear(), date.getMonth() + 1, 0));

const validDay = (year: number, month: number, date: number): Date | undefined => {
    const candidate = day(year, month - 1, date);
    return candidate.getFullYear() === year && candidate.getMonth() === month - 1 && candidate.getDate() === date
        ? candidate
        : undefined;
};

type Rule = [RegExp, (match: RegExpExecArray, today: Date) => DateRange | undefined];

// First match wins; "day before yesterday" must be tried before "yesterday".
const RULES: Rule[] = [
    [/\bday before yesterday\b/i, (_, today) => range(addDays(today, -2), addDays(today, -2))],
    [/\btoday\b/i, (_, today) => range(today, today)],
    [/\byesterday\b/i, (_, today) => range(addDays(today, -1), addDays(today, -1))],
    [/\bthis week\b/i, (_, today) => range(addDays(today, -((today.getDay() + 6) % 7)), today)],
    [/\blast week\b/i, (_, today) => {
        const monday = addDays(today, -((today.getDay() + 6) % 7));
        return range(addDays(monday, -7), addDays(monday, -1));
    }],
    [/\bthis month\b/i, (_, today) => range(day(today.getFullYear(), today.getMonth(), 1), today)],
    [/\blast month\b/i, (_, today) => monthOf(day(today.getFullYear(), today.getMonth() - 1, 1))],
    [/\b(\d{1,4}) days? ago\b/i, (match, today) => {
        const target = addDays(today, -Number(match[1]));
        return range(target, target);
    }],
    [/\b(\d{1,3}) weeks? ago\b/i, (match, today) => {
        const end = addDays(today, -7 * Number(match[1]));
        return range(addDays(end, -6), end);
    }],
    [/\b(\d{1,3}) months? ago\b/i, (match, today) => monthOf(addDays(today, -30 * Number(match[1])))],
    [/\b(\d{4})[-/](\d{1,2})[-/](\d{1,2})\b/, (match) => {
        const date = validDay(Number(match[1]), Number(match[2]), Number(match[3]));
        return date && range(date, date);
    }],
    [/(?<![\d/])(\d{1,2})\/(\d{1,2})(?![\d/])/, (match, today) => {
        const month = Number(match[1]);
        const date = Number(match[2]);
        const thisYear = validDay(today.getFullYear(), month, date);
        // A month/day later than today refers to last year.
        const resolved = thisYear && thisYear.getTime() > today.getTime()
            ? validDay(today.getFullYear() - 1, month, date)
            : thisYear;
        return resolved && range(resolved, resolved);
    }],
];

/**
 * Recognises one recording-date expression in a question ("yesterday",
 * "last week", "3 days ago", "2024-05-02", "5/2"...). Returns undefined
 * when the question names no date.
 */
export function parseDateRange(question: string, now: Date = new Date()): DateRange | undefined {
    const today = day(now.getFullYear(), now.getMonth(), now.getDate());

    for (const [pattern, resolve] of RULES) {
        const match = pattern.exec(question);
        if (match) return resolve(match, today);
    }
    return undefined;
}

const ISO_DAY = /^(\d{4}-\d{2}-\d{2})/;

/**
 * Day a transcript was recorded, from `recordedAt` (or `recorded_at`) metadata.
 */
export function recordedDay(metadata: DocumentMetadata): string | undefined {
    const value = metadata.recordedAt ?? metadata.recorded_at;

    if (typeof value === 'string') {
        const iso = ISO_DAY.exec(value);
        if (iso) return iso[1];
    }
    if (typeof value === 'string' || typeof value === 'number') {
        const parsed = new Date(value);
        return Number.isNaN(parsed.getTime()) ? undefined : formatDay(parsed);
    }
    return undefined;
}

/**
 * Transcripts without a recording date never match a range.
 */
export const isWithinRange = (metadata: DocumentMetadata, { start, end }: DateRange): boolean => {
    const recorded = recordedDay(metadata);
    return recorded !== undefined && recorded >= start && recorded <= end;
};
