import { describe, it, expect } from 'vitest';
import { isWithinRange, parseDateRange, recordedDay } from '../src/application/utils/dateRange';

// Wednesday, 15 May 2024, local time.
const NOW = new Date(2024, 4, 15, 16, 30);

describe('parseDateRange', () => {
    it.each([
        ['What happened today?', '2024-05-15', '2024-05-15'],
        ['Summarise yesterday', '2024-05-14', '2024-05-14'],
        ['And the day before yesterday?', '2024-05-13', '2024-05-13'],
        ['Calls from this week', '2024-05-13', '2024-05-15'],
        ['What was decided last week?', '2024-05-06', '2024-05-12'],
        ['Anything this month?', '2024-05-01', '2024-05-15'],
        ['Topics from last month', '2024-04-01', '2024-04-30'],
        ['The call 3 days ago', '2024-05-12', '2024-05-12'],
        ['Meetings 2 weeks ago', '2024-04-25', '2024-05-01'],
        ['Plans from 2 months ago', '2024-03-01', '2024-03-31'],
        ['Notes of 2024-02-29', '2024-02-29', '2024-02-29'],
        ['Notes of 2023/7/4', '2023-07-04', '2023-07-04'],
        ['What about 4/2?', '2024-04-02', '2024-04-02'],
        ['What about 5/20?', '2023-05-20', '2023-05-20'],
    ])('should read %j', (question, start, end) => {
        expect(parseDateRange(question, NOW)).toEqual({ start, end });
    });

    it.each([
        'What was the budget?',
        'Notes of 2023/02/29',
        'Ratio 13/45',
    ])('should find no date in %j', (question) => {
        expect(parseDateRange(question, NOW)).toBeUndefined();
    });
});

describe('recordedDay', () => {
    it('should take the date part of an ISO timestamp', () => {
        expect(recordedDay({ recordedAt: '2024-05-02T23:59:00Z' })).toBe('2024-05-02');
    });

    it('should accept the snake_case key', () => {
        expect(recordedDay({ recorded_at: '2024-05-02' })).toBe('2024-05-02');
    });

    it('should ignore missing and unparseable values', () => {
        expect(recordedDay({})).toBeUndefined();
        expect(recordedDay({ recordedAt: 'last Tuesday' })).toBeUndefined();
        expect(recordedDay({ recordedAt: { day: 2 } })).toBeUndefined();
    });
});

describe('isWithinRange', () => {
    const range = { start: '2024-05-01', end: '2024-05-03' };

    it('should include both ends of the range', () => {
        expect(isWithinRange({ recordedAt: '2024-05-01T00:00:00Z' }, range)).toBe(true);
        expect(isWithinRange({ recordedAt: '2024-05-03T23:00:00Z' }, range)).toBe(true);
    });

    it('should exclude other days and undated transcripts', () => {
        expect(isWithinRange({ recordedAt: '2024-05-04' }, range)).toBe(false);
        expect(isWithinRange({}, range)).toBe(false);
    });
});
