/**
 * Oracle response schemas
 *
 * Strict zod decoders for every structured oracle response. Decoding never
 * invents a concept id; anything that does not match throws ParseError.
 */

import { z } from 'zod';
import { ParseError } from '../errors';
import type { AssessmentResult, ChatReply, GoalPlan, SurgeryPlan } from './types';
import type { BloomLevel, TestQuestion } from '../types';

// =============================================================================
// BUILDING BLOCKS
// =============================================================================

const BloomLiteralSchema = z.union([
    z.literal(1),
    z.literal(2),
    z.literal(3),
    z.literal(4),
    z.literal(5),
    z.literal(6),
]);

const BloomLevelSchema = z.coerce.number().int().pipe(BloomLiteralSchema);

const ConceptStatusSchema = z.preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['open', 'active', 'skipped', 'reactivated', 'mastered', 'review'])
);

function conceptSchema(defaultBloom: BloomLevel) {
    return z.object({
        id: z.string().trim().min(1),
        name: z.string().trim().min(1),
        status: ConceptStatusSchema.default('open'),
        expertiseSource: z.string().optional(),
        requiredBloomLevel: BloomLevelSchema.default(defaultBloom),
        estimatedTime: z.number().int().positive().optional(),
    });
}

export const ConceptSchema = conceptSchema(3);

const QuestionSchema = z.object({
    id: z.string().trim().min(1),
    questionText: z.string().trim().min(1),
    type: z.enum(['multiple_choice', 'free_text']).default('free_text'),
    options: z.array(z.string()).optional(),
});

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

export const GoalPlanSchema = z.object({
    goalContract: z.object({
        name: z.string().trim().min(1),
        subjectArea: z.string().default(''),
        targetDate: z.string().default(''),
        bloomLevel: BloomLevelSchema.default(3),
        successMetric: z.string().default(''),
    }),
    path: z.array(ConceptSchema).min(1),
    message: z.string().optional(),
});

export const QuestionListSchema = z.object({
    questions: z.array(QuestionSchema).min(1),
});

export const TestEvaluationSchema = z.object({
    score: z.number().min(0).max(100),
    feedback: z.string().default(''),
    recommendation: z.string().default(''),
    perQuestion: z.array(z.object({
        id: z.string(),
        correct: z.boolean(),
        explanation: z.string().default(''),
    })).default([]),
    errorPatterns: z.array(z.string()).optional(),
});

export const ChatReplySchema = z.object({
    reply: z.string().min(1),
    affect: z.string().default('neutral'),
    gapDetected: z.boolean().optional(),
});

export const SurgeryPlanSchema = z.object({
    message: z.string().optional(),
    newConcept: conceptSchema(1),
    path: z.array(ConceptSchema).optional(),
    supersedes: z.array(z.string()).default([]),
});

export const AssessmentResultSchema = z.object({
    knownConceptIds: z.array(z.string()).default([]),
    feedback: z.string().default(''),
});

export type TestEvaluation = z.infer<typeof TestEvaluationSchema>;

// =============================================================================
// DECODING
// =============================================================================

/**
 * Pull the JSON object out of a response that may wrap it in prose or a
 * ```json fence. Returns the parsed value and the prose around it.
 */
export function extractJson(raw: string, source: string): { value: unknown; prose: string } {
    const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/);
    let jsonText: string | null = null;
    let prose = raw;

    if (fenced) {
        jsonText = fenced[1];
        prose = raw.replace(fenced[0], '');
    } else {
        const start = raw.indexOf('{');
        const end = raw.lastIndexOf('}');
        if (start !== -1 && end > start) {
            jsonText = raw.slice(start, end + 1);
            prose = raw.slice(0, start) + raw.slice(end + 1);
        }
    }

    if (jsonText === null) {
        throw new ParseError(`No JSON object in ${source} response`, source, raw);
    }

    try {
        return { value: JSON.parse(jsonText), prose: prose.trim() };
    } catch (error) {
        throw new ParseError(
            `Malformed JSON in ${source} response`,
            source,
            raw,
            error instanceof Error ? error : undefined
        );
    }
}

function decode<T extends z.ZodTypeAny>(schema: T, value: unknown, source: string, raw: string): z.output<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ParseError(`Invalid ${source} response: ${issues}`, source, raw);
    }
    return result.data;
}

export function decodeGoalPlan(raw: string): GoalPlan {
    const { value, prose } = extractJson(raw, 'goal_plan');
    const plan = decode(GoalPlanSchema, value, 'goal_plan', raw);
    return { ...plan, message: plan.message ?? (prose || undefined) };
}

export function decodeQuestions(raw: string, source = 'test_questions'): TestQuestion[] {
    const { value } = extractJson(raw, source);
    return decode(QuestionListSchema, value, source, raw).questions;
}

export function decodeTestEvaluation(raw: string): TestEvaluation {
    const { value } = extractJson(raw, 'test_evaluation');
    return decode(TestEvaluationSchema, value, 'test_evaluation', raw);
}

export function decodeChatReply(raw: string): ChatReply {
    const { value } = extractJson(raw, 'chat_reply');
    return decode(ChatReplySchema, value, 'chat_reply', raw);
}

export function decodeSurgeryPlan(raw: string): SurgeryPlan {
    const { value, prose } = extractJson(raw, 'path_surgery');
    const plan = decode(SurgeryPlanSchema, value, 'path_surgery', raw);
    return { ...plan, message: plan.message ?? (prose || undefined) };
}

export function decodeAssessmentResult(raw: string): AssessmentResult {
    const { value } = extractJson(raw, 'assessment_evaluation');
    return decode(AssessmentResultSchema, value, 'assessment_evaluation', raw);
}
