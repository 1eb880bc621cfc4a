/**
 * Path Store Tests
 * The same contract runs against the in-memory and SQLite stores
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { PathStore } from '@/lib/tutor-engine/store/types';
import { MemoryPathStore } from '@/lib/tutor-engine/store/memory-store';
import { SqlitePathStore } from '@/lib/tutor-engine/store/sqlite-store';
import { createPathStore } from '@/lib/tutor-engine/store';
import { decodeGoal, decodeProfile } from '@/lib/tutor-engine/store/codec';
import { DEFAULT_ENGINE_CONFIG } from '@/lib/tutor-engine/config';
import { createDefaultProfile, createSnapshot } from '@/lib/tutor-engine/session';
import { ConceptNotFoundError, StoreUnavailableError } from '@/lib/tutor-engine/errors';
import type { Goal } from '@/lib/tutor-engine/types';
import { createTestGoal, createTestPath, createTestSession } from '../../utils/test-data';

function testGoal(): Goal {
    return { ...createTestGoal(), path: createTestPath(['K1', 'active'], ['K2', 'open']) };
}

const stores: Array<[string, () => PathStore]> = [
    ['MemoryPathStore', () => new MemoryPathStore()],
    ['SqlitePathStore', () => new SqlitePathStore(':memory:')],
];

describe.each(stores)('%s', (_name, createStore) => {
    let store: PathStore;

    beforeEach(() => {
        store = createStore();
    });

    afterEach(() => {
        store.close?.();
    });

    describe('goals', () => {
        it('should return null for an unknown goal', async () => {
            expect(await store.getGoal('missing')).toBeNull();
        });

        it('should round-trip a goal and upsert on save', async () => {
            const goal = testGoal();
            await store.saveGoal(goal);
            await store.saveGoal({ ...goal, status: 'completed' });

            expect(await store.getGoal('goal-1')).toEqual({ ...goal, status: 'completed' });
        });

        it('should not share references with the caller', async () => {
            const goal = testGoal();
            await store.saveGoal(goal);
            goal.path[0].status = 'mastered';

            expect((await store.getGoal('goal-1'))?.path[0].status).toBe('active');
        });

        it('should update one concept status and be idempotent', async () => {
            await store.saveGoal(testGoal());

            await store.updateConceptStatus('goal-1', 'K1', 'mastered');
            await store.updateConceptStatus('goal-1', 'K1', 'mastered');

            expect((await store.getGoal('goal-1'))?.path.map(c => c.status)).toEqual(['mastered', 'open']);
        });

        it('should raise ConceptNotFoundError for an unknown goal or concept', async () => {
            await expect(store.updateConceptStatus('missing', 'K1', 'active')).rejects.toBeInstanceOf(ConceptNotFoundError);

            await store.saveGoal(testGoal());
            await expect(store.updateConceptStatus('goal-1', 'K9', 'active')).rejects.toBeInstanceOf(ConceptNotFoundError);
        });
    });

    describe('commit', () => {
        it('should apply a batch of writes in order', async () => {
            await store.commit([
                { kind: 'saveGoal', goal: testGoal() },
                { kind: 'updateConceptStatus', goalId: 'goal-1', conceptId: 'K1', status: 'mastered' },
                { kind: 'updateConceptStatus', goalId: 'goal-1', conceptId: 'K2', status: 'active' },
                { kind: 'saveUserProfile', profile: createDefaultProfile('learner-1') },
            ]);

            expect((await store.getGoal('goal-1'))?.path.map(c => c.status)).toEqual(['mastered', 'active']);
            expect(await store.getUserProfile('learner-1')).toEqual(createDefaultProfile('learner-1'));
        });

        it('should keep none of the batch when its second write fails', async () => {
            await expect(store.commit([
                { kind: 'saveUserProfile', profile: { ...createDefaultProfile('learner-1'), lastTestScore: 90 } },
                { kind: 'updateConceptStatus', goalId: 'missing', conceptId: 'K1', status: 'mastered' },
            ])).rejects.toBeInstanceOf(ConceptNotFoundError);

            expect(await store.getUserProfile('learner-1')).toBeNull();
        });

        it('should roll back earlier updates to the same goal', async () => {
            await store.saveGoal(testGoal());

            await expect(store.commit([
                { kind: 'updateConceptStatus', goalId: 'goal-1', conceptId: 'K1', status: 'mastered' },
                { kind: 'updateConceptStatus', goalId: 'goal-1', conceptId: 'K9', status: 'active' },
            ])).rejects.toBeInstanceOf(ConceptNotFoundError);

            expect((await store.getGoal('goal-1'))?.path.map(c => c.status)).toEqual(['active', 'open']);
        });
    });

    describe('profiles', () => {
        it('should save and load a learner profile', async () => {
            const profile = { ...createDefaultProfile('learner-1'), lastTestScore: 85, errorPatterns: ['sign_errors'] };
            await store.saveUserProfile(profile);

            expect(await store.getUserProfile('learner-1')).toEqual(profile);
            expect(await store.getUserProfile('learner-2')).toBeNull();
        });
    });

    describe('sessions', () => {
        const state = createTestSession(createTestPath(['K1', 'active']), 'K1');

        it('should list sessions newest first and load the latest by default', async () => {
            const older = createSnapshot(state, 'chat_with_tutor', { savedAt: new Date('2025-01-14T09:00:00.000Z') });
            const newer = createSnapshot({ ...state, goalId: 'goal-2' }, 'test_evaluation', {
                sessionName: 'Second goal',
                savedAt: new Date('2025-01-15T09:00:00.000Z'),
            });
            if (!older || !newer) throw new Error('snapshot fixtures need a goal');

            await store.saveSession(older);
            await store.saveSession(newer);

            expect((await store.listSessions('learner-1')).map(s => s.sessionName)).toEqual(['Second goal', 'Linear algebra']);
            expect((await store.loadSession('learner-1'))?.goalId).toBe('goal-2');
            expect((await store.loadSession('learner-1', 'goal-1'))?.state).toEqual(state);
            expect(await store.listSessions('learner-2')).toEqual([]);
        });

        it('should replace the snapshot for the same learner and goal', async () => {
            const first = createSnapshot(state, 'chat_with_tutor', { savedAt: new Date('2025-01-14T09:00:00.000Z') });
            const second = createSnapshot(state, 'test_generation', { savedAt: new Date('2025-01-15T09:00:00.000Z') });
            if (!first || !second) throw new Error('snapshot fixtures need a goal');

            await store.saveSession(first);
            await store.saveSession(second);

            const sessions = await store.listSessions('learner-1');
            expect(sessions).toHaveLength(1);
            expect(sessions[0].phase).toBe('test_generation');
        });

        it('should report whether a delete removed anything', async () => {
            const snapshot = createSnapshot(state, null);
            if (!snapshot) throw new Error('snapshot fixture needs a goal');
            await store.saveSession(snapshot);

            expect(await store.deleteSession('learner-1', 'goal-1')).toBe(true);
            expect(await store.deleteSession('learner-1', 'goal-1')).toBe(false);
            expect(await store.loadSession('learner-1')).toBeNull();
        });
    });
});

describe('SqlitePathStore on disk', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tutor-store-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should create the parent directory and persist across reopen', async () => {
        const file = path.join(dir, 'nested', 'tutor.db');

        const first = new SqlitePathStore(file);
        await first.saveGoal(testGoal());
        first.close();

        const second = new SqlitePathStore(file);
        expect((await second.getGoal('goal-1'))?.name).toBe('Linear algebra');
        second.close();
    });
});

describe('decodeGoal', () => {
    it('should reject a corrupted document', () => {
        expect(() => decodeGoal('{"goalId": "goal-1"}')).toThrow(StoreUnavailableError);
        expect(() => decodeGoal('not json')).toThrow('Store operation failed: decode goal');
    });
});

describe('decodeProfile', () => {
    it('should default the language of a profile stored without one', () => {
        const profile = decodeProfile(JSON.stringify({
            userId: 'learner-1',
            stylePreference: 'analogy-based',
            complexityLevel: 3,
            paceWPM: 180,
            lastTestScore: null,
            errorPatterns: [],
        }));

        expect(profile.language).toBe('en');
    });
});

describe('createPathStore', () => {
    it('should use the in-memory store without a database path', () => {
        expect(createPathStore(DEFAULT_ENGINE_CONFIG)).toBeInstanceOf(MemoryPathStore);
    });

    it('should use SQLite when a database path is configured', () => {
        const store = createPathStore({ ...DEFAULT_ENGINE_CONFIG, store: { databasePath: ':memory:' } });
        expect(store).toBeInstanceOf(SqlitePathStore);
        store.close?.();
    });
});
