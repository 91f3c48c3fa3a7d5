import { describe, it, expect } from 'vitest';
import { askRateLimiter } from '../src/infrastructure/http/middleware/rateLimiter';

describe('Ask Rate Limiter', () => {
    it('should be exported as request middleware', () => {
        expect(askRateLimiter).toBeTypeOf('function');
        expect(askRateLimiter.resetKey).toBeTypeOf('function');
    });
});
