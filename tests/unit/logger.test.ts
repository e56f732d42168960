/**
 * Logger formatting tests. The logger itself is mocked globally; this file
 * loads the real formatter.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BASE_TIME } from '../mocks/fixtures';

describe('formatMsg', () => {
    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(BASE_TIME);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should prefix a timestamp and level and join the arguments', async () => {
        const { formatMsg } = await vi.importActual<typeof import('../../src/logger')>('../../src/logger');

        expect(formatMsg('INFO', '[FaceQuality] Cluster', { photos: 2 }, 3))
            .toBe('[2024-06-01T12:00:00.000Z] [INFO] [FaceQuality] Cluster {"photos":2} 3\n');
    });

    it('should print errors by their stack', async () => {
        const { formatMsg } = await vi.importActual<typeof import('../../src/logger')>('../../src/logger');
        const error = new Error('boom');
        error.stack = 'Error: boom\n    at analyzePhoto';

        expect(formatMsg('ERROR', 'failed:', error)).toBe('[2024-06-01T12:00:00.000Z] [ERROR] failed: Error: boom\n    at analyzePhoto\n');
    });
});
