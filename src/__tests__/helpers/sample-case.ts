import { fileURLToPath } from 'node:url';
import { importCaseFixture, readCaseFixture } from '../../storage/case-fixture.js';
import { SqliteEntityStore } from '../../storage/database.js';

export const SAMPLE_CASE_PATH = fileURLToPath(new URL('../../../fixtures/sample-case.json', import.meta.url));

/**
 * In-memory store holding the sample parking-garage case (`case-7`).
 */
export function openSampleStore(): SqliteEntityStore {
    const store = new SqliteEntityStore(':memory:');
    importCaseFixture(store, readCaseFixture(SAMPLE_CASE_PATH));
    return store;
}
