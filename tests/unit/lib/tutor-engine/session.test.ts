/**
 * Session Helper and Envelope Tests
 */

import { describe, it, expect } from 'vitest';
import { createSessionState, createSnapshot, goalFromState } from '@/lib/tutor-engine/session';
import { toEnvelope } from '@/lib/tutor-engine/envelope';
import { PhaseFailedError, ParseError } from '@/lib/tutor-engine/errors';
import type { RunResult } from '@/lib/tutor-engine/phase-engine';
import { FIXED_NOW, createTestPath, createTestSession } from '../../utils/test-data';

describe('createSessionState', () => {
    it('should start empty with the default profile', () => {
        const state = createSessionState('learner-1');

        expect(state.goalId).toBeNull();
        expect(state.path).toEqual([]);
        expect(state.testPassed).toBeNull();
        expect(state.profile.stylePreference).toBe('analogy-based');
        expect(state.profile.errorPatterns).toEqual([]);
    });
});

describe('goalFromState', () => {
    it('should join the contract with a copy of the path', () => {
        const state = createTestSession(createTestPath(['K1', 'active']), 'K1');
        const goal = goalFromState(state);

        expect(goal?.goalId).toBe('goal-1');
        expect(goal?.path).toEqual(state.path);
        expect(goal?.path[0]).not.toBe(state.path[0]);
    });

    it('should return null without a contract', () => {
        expect(goalFromState(createSessionState('learner-1'))).toBeNull();
    });
});

describe('createSnapshot', () => {
    const state = createTestSession(createTestPath(['K1', 'active']), 'K1');

    it('should name the snapshot after the goal by default', () => {
        const snapshot = createSnapshot(state, 'chat_with_tutor', { savedAt: FIXED_NOW });

        expect(snapshot?.sessionName).toBe('Linear algebra');
        expect(snapshot?.savedAt).toBe('2025-01-15T10:00:00.000Z');
        expect(snapshot?.state).toEqual(state);
        expect(snapshot?.state).not.toBe(state);
    });

    it('should prefer an explicit name and fall back to the goal id', () => {
        expect(createSnapshot(state, null, { sessionName: 'Evening study' })?.sessionName).toBe('Evening study');
        expect(createSnapshot({ ...state, goal: null }, null)?.sessionName).toBe('goal-1');
    });

    it('should return null for a session without a goal', () => {
        expect(createSnapshot(createSessionState('learner-1'), null)).toBeNull();
    });
});

describe('toEnvelope', () => {
    const state = createSessionState('learner-1');

    it('should wrap a successful run as data', () => {
        const result: RunResult = { status: 'goal_complete', state, phase: 'test_evaluation', trace: ['test_evaluation'], steps: 1 };
        expect(toEnvelope(result)).toEqual({ status: 'success', data: result });
    });

    it('should surface only the user message of a failed run', () => {
        const error = new PhaseFailedError('test_generation', new ParseError('bad json', 'test_questions'));
        const result: RunResult = {
            status: 'failed',
            state,
            phase: 'test_generation',
            trace: [],
            steps: 1,
            error,
            message: error.getUserMessage(),
        };

        expect(toEnvelope(result)).toEqual({
            status: 'error',
            message: 'The tutor returned an answer we could not read. Please try again.',
        });
    });
});
