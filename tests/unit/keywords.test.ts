import { describe, it, expect, vi } from 'vitest';

vi.hoisted(() => {
    process.env.KEYWORDS = 'side hustle, Side Hustle ,,debt free';
});

vi.mock('../../src/observability/logger.js', async () =>
    (await import('../helpers/logger-mock.js')).createLoggerMock()
);

import { cleanKeywords, loadKeywords } from '../../src/config/keywords.js';

describe('cleanKeywords', () => {
    it('trims, drops empties and keeps the first spelling of duplicates', () => {
        expect(cleanKeywords(['  budgeting ', '', 'Budgeting', 'money saving', '   '])).toEqual([
            'budgeting',
            'money saving',
        ]);
    });
});

describe('loadKeywords', () => {
    it('prefers the KEYWORDS variable over the keyword file', async () => {
        expect(await loadKeywords()).toEqual(['side hustle', 'debt free']);
    });
});
