/**
 * Content Oracle Types and Interfaces
 *
 * The oracle produces every piece of natural-language or structured content
 * the engine needs. Structured calls throw ParseError when the response does
 * not decode; the engine decides per call site whether a fallback exists.
 */

import type {
    Concept,
    GoalContract,
    LearningPath,
    TestAnswers,
    TestQuestion,
    TestResult,
    UserProfile,
} from '../types';

export interface GoalPlan {
    goalContract: Omit<GoalContract, 'goalId' | 'status'>;
    path: LearningPath;
    message?: string;
}

export interface ChatReply {
    reply: string;
    affect: string;
    gapDetected?: boolean;
}

export interface SurgeryPlan {
    message?: string;
    newConcept: Concept;
    path?: LearningPath;
    supersedes: string[];
}

export interface AssessmentResult {
    knownConceptIds: string[];
    feedback: string;
}

export interface ContentOracle {
    name: string;

    generateGoalAndPath(goalText: string, profile: UserProfile): Promise<GoalPlan>;

    generateMaterial(concept: Concept, profile: UserProfile, failureFeedback?: string): Promise<string>;

    generateTest(concept: Concept, profile: UserProfile, count: number): Promise<TestQuestion[]>;

    evaluateTest(
        concept: Concept,
        questions: TestQuestion[],
        answers: TestAnswers,
        profile: UserProfile
    ): Promise<TestResult>;

    chat(concept: Concept, message: string, profile: UserProfile): Promise<ChatReply>;

    diagnoseGap(concept: Concept, profile: UserProfile): Promise<string>;

    performSurgery(
        missingConceptName: string,
        path: LearningPath,
        currentConcept: Concept | null,
        profile: UserProfile
    ): Promise<SurgeryPlan>;

    generatePriorKnowledgeTest(path: LearningPath, profile: UserProfile): Promise<TestQuestion[]>;

    evaluatePriorKnowledgeTest(
        path: LearningPath,
        questions: TestQuestion[],
        answers: TestAnswers,
        profile: UserProfile
    ): Promise<AssessmentResult>;
}
