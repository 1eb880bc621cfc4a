/**
 * Stored document codec
 *
 * Documents read back from a store are decoded with zod so a corrupted or
 * foreign row never reaches the engine as a typed value.
 */

import { z } from 'zod';
import type { Goal, SessionSnapshot, SessionSummary, UserProfile } from '../types';
import { CONCEPT_STATUSES, PHASES } from '../types';
import { StoreUnavailableError } from '../errors';

const BloomLevelSchema = z.union([
    z.literal(1),
    z.literal(2),
    z.literal(3),
    z.literal(4),
    z.literal(5),
    z.literal(6),
]);

const ConceptStatusSchema = z.custom<(typeof CONCEPT_STATUSES)[number]>(
    value => typeof value === 'string' && CONCEPT_STATUSES.some(status => status === value)
);

const PhaseSchema = z.custom<(typeof PHASES)[number]>(
    value => typeof value === 'string' && PHASES.some(phase => phase === value)
);

const StoredConceptSchema = z.object({
    id: z.string(),
    name: z.string(),
    status: ConceptStatusSchema,
    expertiseSource: z.string().optional(),
    requiredBloomLevel: BloomLevelSchema,
    estimatedTime: z.number().optional(),
});

const GoalContractSchema = z.object({
    goalId: z.string(),
    name: z.string(),
    subjectArea: z.string(),
    targetDate: z.string(),
    bloomLevel: BloomLevelSchema,
    successMetric: z.string(),
    status: z.enum(['in_progress', 'completed']),
});

export const StoredGoalSchema = GoalContractSchema.extend({
    path: z.array(StoredConceptSchema),
});

export const StoredProfileSchema = z.object({
    userId: z.string(),
    language: z.enum(['de', 'en']).default('en'),
    stylePreference: z.string(),
    complexityLevel: z.number(),
    paceWPM: z.number(),
    lastTestScore: z.number().nullable(),
    errorPatterns: z.array(z.string()),
});

const StoredQuestionSchema = z.object({
    id: z.string(),
    questionText: z.string(),
    type: z.enum(['multiple_choice', 'free_text']),
    options: z.array(z.string()).optional(),
});

const StoredTestResultSchema = z.object({
    score: z.number(),
    passed: z.boolean(),
    feedback: z.string(),
    recommendation: z.string(),
    perQuestion: z.array(z.object({
        id: z.string(),
        correct: z.boolean(),
        explanation: z.string(),
    })),
    errorPatterns: z.array(z.string()).optional(),
});

const StoredSessionStateSchema = z.object({
    userId: z.string(),
    goalId: z.string().nullable(),
    goal: GoalContractSchema.nullable(),
    path: z.array(StoredConceptSchema),
    currentConcept: StoredConceptSchema.nullable(),
    lastOutput: z.string(),
    lastInput: z.string(),
    remediationPending: z.boolean(),
    testPassed: z.boolean().nullable(),
    profile: StoredProfileSchema,
    affect: z.string().nullable(),
    failureFeedback: z.string().nullable(),
    testQuestions: z.array(StoredQuestionSchema),
    testAnswers: z.record(z.string()),
    lastTestResult: StoredTestResultSchema.nullable(),
});

export const StoredSnapshotSchema = z.object({
    userId: z.string(),
    goalId: z.string(),
    sessionName: z.string(),
    phase: PhaseSchema.nullable(),
    savedAt: z.string(),
    state: StoredSessionStateSchema,
});

function decodeDocument<T extends z.ZodTypeAny>(schema: T, json: string, kind: string): z.output<T> {
    let value: unknown;
    try {
        value = JSON.parse(json);
    } catch (error) {
        throw new StoreUnavailableError(`decode ${kind}`, error instanceof Error ? error : undefined);
    }
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new StoreUnavailableError(`decode ${kind}`, new Error(result.error.issues[0]?.message ?? 'invalid document'));
    }
    return result.data;
}

export function decodeGoal(json: string): Goal {
    return decodeDocument(StoredGoalSchema, json, 'goal');
}

export function decodeProfile(json: string): UserProfile {
    return decodeDocument(StoredProfileSchema, json, 'user_profile');
}

export function decodeSnapshot(json: string): SessionSnapshot {
    return decodeDocument(StoredSnapshotSchema, json, 'session');
}

export function summarize(snapshot: SessionSnapshot): SessionSummary {
    return {
        goalId: snapshot.goalId,
        sessionName: snapshot.sessionName,
        goalName: snapshot.state.goal?.name ?? snapshot.sessionName,
        savedAt: snapshot.savedAt,
        phase: snapshot.phase,
        currentConceptName: snapshot.state.currentConcept?.name ?? null,
    };
}
