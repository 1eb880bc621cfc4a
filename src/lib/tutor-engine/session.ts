/**
 * Session state helpers
 */

import type { Goal, Phase, SessionSnapshot, SessionState, UserProfile } from './types';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config';

export function createDefaultProfile(
    userId: string,
    defaults: EngineConfig['defaultProfile'] = DEFAULT_ENGINE_CONFIG.defaultProfile
): UserProfile {
    return {
        userId,
        language: defaults.language,
        stylePreference: defaults.stylePreference,
        complexityLevel: defaults.complexityLevel,
        paceWPM: defaults.paceWPM,
        lastTestScore: null,
        errorPatterns: [],
    };
}

/**
 * Fresh session for a learner, optionally seeded with a stored profile or
 * other fields
 */
export function createSessionState(userId: string, overrides: Partial<SessionState> = {}): SessionState {
    return {
        userId,
        goalId: null,
        goal: null,
        path: [],
        currentConcept: null,
        lastOutput: '',
        lastInput: '',
        remediationPending: false,
        testPassed: null,
        profile: createDefaultProfile(userId),
        affect: null,
        failureFeedback: null,
        testQuestions: [],
        testAnswers: {},
        lastTestResult: null,
        ...overrides,
    };
}

/**
 * Goal document for the store, built from the session's contract and path
 */
export function goalFromState(state: SessionState): Goal | null {
    if (!state.goal) return null;
    return { ...state.goal, path: state.path.map(c => ({ ...c })) };
}

/**
 * Snapshot of a session with a goal. Name defaults to the goal name, then
 * the goal id.
 */
export function createSnapshot(
    state: SessionState,
    phase: Phase | null,
    options: { sessionName?: string; savedAt?: Date } = {}
): SessionSnapshot | null {
    if (!state.goalId) return null;
    return {
        userId: state.userId,
        goalId: state.goalId,
        sessionName: options.sessionName || state.goal?.name || state.goalId,
        phase,
        savedAt: (options.savedAt ?? new Date()).toISOString(),
        state: structuredClone(state),
    };
}
