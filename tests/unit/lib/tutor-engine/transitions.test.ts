/**
 * Phase Transition Tests
 * Pure readiness checks and next-phase decisions
 */

import { describe, it, expect } from 'vitest';
import { awaitingInputFor, decideNextPhase, resumePhaseFor } from '@/lib/tutor-engine/transitions';
import { PHASES } from '@/lib/tutor-engine/types';
import { createTestPath, createTestSession } from '../../utils/test-data';

const path = createTestPath(['K1', 'active'], ['K2', 'open']);

describe('decideNextPhase', () => {
    it('should move from goal creation to material when a concept is current', () => {
        expect(decideNextPhase('goal_creation', createTestSession(path, 'K1')))
            .toEqual({ type: 'advance', next: 'material_generation' });
    });

    it('should complete the goal when goal creation leaves nothing open', () => {
        expect(decideNextPhase('goal_creation', createTestSession(path, null)))
            .toEqual({ type: 'goal_complete' });
    });

    it('should route chat to diagnosis only when remediation is pending', () => {
        const pending = createTestSession(path, 'K1', { remediationPending: true });
        const calm = createTestSession(path, 'K1');
        expect(decideNextPhase('chat_with_tutor', pending)).toEqual({ type: 'advance', next: 'gap_diagnosis' });
        expect(decideNextPhase('chat_with_tutor', calm)).toEqual({ type: 'advance', next: 'test_generation' });
    });

    it('should chain diagnosis -> remediation -> material', () => {
        const state = createTestSession(path, 'K1');
        expect(decideNextPhase('gap_diagnosis', state)).toEqual({ type: 'advance', next: 'remediation_execution' });
        expect(decideNextPhase('remediation_execution', state)).toEqual({ type: 'advance', next: 'material_generation' });
        expect(decideNextPhase('material_generation', state)).toEqual({ type: 'advance', next: 'chat_with_tutor' });
    });

    it('should await answers after generating a test', () => {
        expect(decideNextPhase('test_generation', createTestSession(path, 'K1')))
            .toEqual({ type: 'await', awaiting: 'test_answers' });
    });

    it('should decide test evaluation outcomes from testPassed and the current concept', () => {
        expect(decideNextPhase('test_evaluation', createTestSession(path, 'K2', { testPassed: true })))
            .toEqual({ type: 'advance', next: 'material_generation' });
        expect(decideNextPhase('test_evaluation', createTestSession(path, 'K1', { testPassed: false })))
            .toEqual({ type: 'advance', next: 'material_generation' });
        expect(decideNextPhase('test_evaluation', createTestSession(path, null, { testPassed: true })))
            .toEqual({ type: 'goal_complete' });
        expect(decideNextPhase('test_evaluation', createTestSession(path, 'K1', { testPassed: null })))
            .toEqual({ type: 'await', awaiting: 'test_answers' });
    });

    it('should await assessment answers after the prior-knowledge test', () => {
        expect(decideNextPhase('prior_knowledge_test', createTestSession(path, null)))
            .toEqual({ type: 'await', awaiting: 'assessment_answers' });
    });

    it('should be total over every phase', () => {
        const state = createTestSession(path, 'K1');
        for (const phase of PHASES) {
            expect(decideNextPhase(phase, state)).toHaveProperty('type');
        }
    });
});

describe('awaitingInputFor', () => {
    it('should require a goal text for goal creation', () => {
        expect(awaitingInputFor('goal_creation', createTestSession([], null))).toBe('goal_text');
        expect(awaitingInputFor('goal_creation', createTestSession([], null, { lastInput: 'Learn SQL' }))).toBeNull();
    });

    it('should treat whitespace-only input as missing', () => {
        expect(awaitingInputFor('chat_with_tutor', createTestSession(path, 'K1', { lastInput: '   ' }))).toBe('learner_message');
        expect(awaitingInputFor('remediation_execution', createTestSession(path, 'K1', { lastInput: '' }))).toBe('missing_concept');
    });

    it('should require questions and answers before an evaluation', () => {
        const questions = [{ id: 'q1', questionText: 'Why?', type: 'free_text' as const }];
        expect(awaitingInputFor('test_evaluation', createTestSession(path, 'K1', { testQuestions: questions }))).toBe('test_answers');
        expect(awaitingInputFor('test_evaluation', createTestSession(path, 'K1', {
            testQuestions: questions,
            testAnswers: { q1: 'Because' },
        }))).toBeNull();
        expect(awaitingInputFor('prior_knowledge_evaluation', createTestSession(path, null))).toBe('assessment_answers');
    });

    it('should never block phases without learner input', () => {
        const state = createTestSession(path, 'K1');
        expect(awaitingInputFor('material_generation', state)).toBeNull();
        expect(awaitingInputFor('gap_diagnosis', state)).toBeNull();
        expect(awaitingInputFor('test_generation', state)).toBeNull();
        expect(awaitingInputFor('prior_knowledge_test', state)).toBeNull();
    });
});

describe('resumePhaseFor', () => {
    it('should map each awaited input to the phase that consumes it', () => {
        expect(resumePhaseFor('goal_text')).toBe('goal_creation');
        expect(resumePhaseFor('learner_message')).toBe('chat_with_tutor');
        expect(resumePhaseFor('missing_concept')).toBe('remediation_execution');
        expect(resumePhaseFor('test_answers')).toBe('test_evaluation');
        expect(resumePhaseFor('assessment_answers')).toBe('prior_knowledge_evaluation');
    });
});
