/**
 * Pathwise Tutor Engine - Core Types
 *
 * Shared data plane for the path model, the phase engine and the
 * remediation protocol. Everything here is plain JSON-compatible data so a
 * session can be snapshotted, persisted and passed by value between phases.
 */

// =============================================================================
// CONCEPT & PATH
// =============================================================================

export type ConceptStatus =
    | 'open'           // Not started, reachable by traversal
    | 'active'         // Currently being studied
    | 'skipped'        // Learner already knows it (assessment / expertise)
    | 'reactivated'    // Was skipped, needed again after remediation
    | 'mastered'       // Passed its test
    | 'review';        // Failed its test, re-study pending

export const CONCEPT_STATUSES: readonly ConceptStatus[] = [
    'open',
    'active',
    'skipped',
    'reactivated',
    'mastered',
    'review',
];

export type BloomLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface Concept {
    id: string;                   // Unique within a path, never reused
    name: string;
    status: ConceptStatus;
    expertiseSource?: string;     // Provenance tag, e.g. "remediation", "assessment"
    requiredBloomLevel: BloomLevel;
    estimatedTime?: number;       // Minutes
}

/** Ordered sequence of concepts; order is traversal order */
export type LearningPath = Concept[];

// =============================================================================
// GOAL
// =============================================================================

export type GoalStatus = 'in_progress' | 'completed';

export interface GoalContract {
    goalId: string;
    name: string;
    subjectArea: string;
    targetDate: string;
    bloomLevel: BloomLevel;
    successMetric: string;
    status: GoalStatus;
}

export interface Goal extends GoalContract {
    path: LearningPath;
}

// =============================================================================
// LEARNER
// =============================================================================

export type Language = 'de' | 'en';

export const LANGUAGES: readonly Language[] = ['de', 'en'];

export interface UserProfile {
    userId: string;
    language: Language;             // Language of every generated text
    stylePreference: string;
    complexityLevel: number;
    paceWPM: number;
    lastTestScore: number | null;   // 0-100
    errorPatterns: string[];        // Set semantics, kept deduplicated
}

// =============================================================================
// TESTS
// =============================================================================

export type QuestionType = 'multiple_choice' | 'free_text';

export interface TestQuestion {
    id: string;
    questionText: string;
    type: QuestionType;
    options?: string[];
}

export interface QuestionResult {
    id: string;
    correct: boolean;
    explanation: string;
}

export interface TestResult {
    score: number;                // 0-100
    passed: boolean;              // score > pass threshold
    feedback: string;
    recommendation: string;
    perQuestion: QuestionResult[];
    errorPatterns?: string[];
}

/** Answers keyed by question id */
export type TestAnswers = Record<string, string>;

// =============================================================================
// SESSION STATE (threaded through the engine by value)
// =============================================================================

export interface SessionState {
    userId: string;
    goalId: string | null;
    goal: GoalContract | null;
    path: LearningPath;
    currentConcept: Concept | null;
    lastOutput: string;
    lastInput: string;
    remediationPending: boolean;
    testPassed: boolean | null;
    profile: UserProfile;

    // Supplementary conversation/test context
    affect: string | null;
    failureFeedback: string | null;
    testQuestions: TestQuestion[];
    testAnswers: TestAnswers;
    lastTestResult: TestResult | null;
}

// =============================================================================
// PHASES
// =============================================================================

export type Phase =
    | 'goal_creation'
    | 'material_generation'
    | 'chat_with_tutor'
    | 'gap_diagnosis'
    | 'remediation_execution'
    | 'test_generation'
    | 'test_evaluation'
    | 'prior_knowledge_test'
    | 'prior_knowledge_evaluation';

export const PHASES: readonly Phase[] = [
    'goal_creation',
    'material_generation',
    'chat_with_tutor',
    'gap_diagnosis',
    'remediation_execution',
    'test_generation',
    'test_evaluation',
    'prior_knowledge_test',
    'prior_knowledge_evaluation',
];

export type AwaitingInput =
    | 'goal_text'
    | 'learner_message'
    | 'missing_concept'
    | 'test_answers'
    | 'assessment_answers';

export type Transition =
    | { type: 'advance'; next: Phase }
    | { type: 'await'; awaiting: AwaitingInput }
    | { type: 'goal_complete' };

// =============================================================================
// LEARNING EVENTS (recorded by the event log)
// =============================================================================

export type LearningEventType =
    | 'goal_created'
    | 'material_generated'
    | 'chat_input'
    | 'chat_reply'
    | 'gap_diagnosis'
    | 'remediation'
    | 'remediation_fallback'
    | 'test_generated'
    | 'test_evaluated'
    | 'goal_completed'
    | 'assessment_generated'
    | 'assessment_evaluated'
    | 'phase_failed';

export interface LearningEvent {
    eventType: LearningEventType;
    timestamp: string;
    userId?: string;
    goalId?: string | null;
    conceptId: string | null;
    text: string;
    affect?: string;
    score?: number;
}

// =============================================================================
// SESSION SNAPSHOTS
// =============================================================================

export interface SessionSnapshot {
    userId: string;
    goalId: string;
    sessionName: string;
    phase: Phase | null;
    savedAt: string;
    state: SessionState;
}

export interface SessionSummary {
    goalId: string;
    sessionName: string;
    goalName: string;
    savedAt: string;
    phase: Phase | null;
    currentConceptName: string | null;
}
