/**
 * Pathwise Tutor Engine - Phase Transitions
 *
 * Pure, total functions over SessionState. They never call the oracle or
 * the store; the engine applies whatever they decide.
 */

import type { AwaitingInput, Phase, SessionState, Transition } from './types';

function hasText(value: string): boolean {
    return value.trim().length > 0;
}

/**
 * Learner input a phase needs before it can run, or null when it is ready
 */
export function awaitingInputFor(phase: Phase, state: SessionState): AwaitingInput | null {
    switch (phase) {
        case 'goal_creation':
            return hasText(state.lastInput) ? null : 'goal_text';
        case 'chat_with_tutor':
            return hasText(state.lastInput) ? null : 'learner_message';
        case 'remediation_execution':
            return hasText(state.lastInput) ? null : 'missing_concept';
        case 'test_evaluation':
            return state.testQuestions.length > 0 && Object.keys(state.testAnswers).length > 0
                ? null
                : 'test_answers';
        case 'prior_knowledge_evaluation':
            return state.testQuestions.length > 0 && Object.keys(state.testAnswers).length > 0
                ? null
                : 'assessment_answers';
        case 'material_generation':
        case 'gap_diagnosis':
        case 'test_generation':
        case 'prior_knowledge_test':
            return null;
    }
}

/**
 * Phase to run once the awaited input has been supplied
 */
export function resumePhaseFor(awaiting: AwaitingInput): Phase {
    switch (awaiting) {
        case 'goal_text':
            return 'goal_creation';
        case 'learner_message':
            return 'chat_with_tutor';
        case 'missing_concept':
            return 'remediation_execution';
        case 'test_answers':
            return 'test_evaluation';
        case 'assessment_answers':
            return 'prior_knowledge_evaluation';
    }
}

/**
 * What follows once `phase` has completed on `state`
 */
export function decideNextPhase(phase: Phase, state: SessionState): Transition {
    switch (phase) {
        case 'goal_creation':
        case 'prior_knowledge_evaluation':
            return state.currentConcept
                ? { type: 'advance', next: 'material_generation' }
                : { type: 'goal_complete' };

        case 'material_generation':
            return { type: 'advance', next: 'chat_with_tutor' };

        case 'chat_with_tutor':
            return state.remediationPending
                ? { type: 'advance', next: 'gap_diagnosis' }
                : { type: 'advance', next: 'test_generation' };

        case 'gap_diagnosis':
            return { type: 'advance', next: 'remediation_execution' };

        case 'remediation_execution':
            return { type: 'advance', next: 'material_generation' };

        case 'test_generation':
            return { type: 'await', awaiting: 'test_answers' };

        case 'test_evaluation':
            if (state.testPassed === null) {
                // Evaluation could not be read; ask for the answers again
                return { type: 'await', awaiting: 'test_answers' };
            }
            if (state.testPassed && !state.currentConcept) {
                return { type: 'goal_complete' };
            }
            return { type: 'advance', next: 'material_generation' };

        case 'prior_knowledge_test':
            return { type: 'await', awaiting: 'assessment_answers' };
    }
}
