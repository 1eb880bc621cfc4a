/**
 * Anthropic Content Oracle
 *
 * Calls the Messages API over fetch and decodes structured responses with
 * the zod schemas in ./schemas. HTTP and network failures surface as
 * OracleUnavailableError; undecodable bodies as ParseError.
 */

import { z } from 'zod';
import type { AssessmentResult, ChatReply, ContentOracle, GoalPlan, SurgeryPlan } from './types';
import type {
    Concept,
    LearningPath,
    TestAnswers,
    TestQuestion,
    TestResult,
    UserProfile,
} from '../types';
import {
    decodeAssessmentResult,
    decodeChatReply,
    decodeGoalPlan,
    decodeQuestions,
    decodeSurgeryPlan,
    decodeTestEvaluation,
} from './schemas';
import {
    ARCHITECT_PROMPT,
    CURATOR_PROMPT,
    TUTOR_PROMPT,
    assessmentEvaluationPrompt,
    assessmentPrompt,
    chatPrompt,
    diagnosisPrompt,
    evaluationPrompt,
    goalPlanPrompt,
    materialPrompt,
    surgeryPrompt,
    testPrompt,
    withLanguage,
} from './prompts';
import { OracleUnavailableError, ParseError, toError } from '../errors';
import { createLogger, type Logger } from '@/lib/debug';

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
export const ANTHROPIC_VERSION = '2023-06-01';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface AnthropicOracleOptions {
    apiKey: string;
    model: string;
    maxTokens: number;
    temperature: number;
    passThreshold: number;
    fetchFn?: FetchFn;
    logger?: Logger;
}

const MessagesResponseSchema = z.object({
    content: z.array(z.object({
        type: z.string(),
        text: z.string().optional(),
    })),
});

export class AnthropicContentOracle implements ContentOracle {
    name = 'anthropic';

    private readonly fetchFn: FetchFn;
    private readonly logger: Logger;

    constructor(private readonly options: AnthropicOracleOptions) {
        this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
        this.logger = options.logger ?? createLogger('AnthropicOracle');
    }

    /**
     * Single Messages API round trip, returns the concatenated text blocks
     */
    private async call(system: string, user: string, temperature = this.options.temperature): Promise<string> {
        const started = Date.now();
        let response: Response;
        try {
            response = await this.fetchFn(ANTHROPIC_MESSAGES_URL, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'x-api-key': this.options.apiKey,
                    'anthropic-version': ANTHROPIC_VERSION,
                },
                body: JSON.stringify({
                    model: this.options.model,
                    max_tokens: this.options.maxTokens,
                    temperature,
                    system,
                    messages: [
                        { role: 'user', content: user },
                    ],
                }),
            });
        } catch (error) {
            const cause = toError(error);
            this.logger.error('Anthropic request failed', { type: 'oracle', error: cause.message });
            throw new OracleUnavailableError(`Anthropic request failed: ${cause.message}`, undefined, cause);
        }

        if (!response.ok) {
            this.logger.error('Anthropic API error', { type: 'oracle', status: response.status });
            throw new OracleUnavailableError(`Anthropic API error: ${response.status}`, response.status);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            const cause = toError(error);
            this.logger.error('Anthropic response is not JSON', { type: 'oracle', error: cause.message });
            throw new ParseError('Anthropic response is not JSON', 'anthropic_messages', undefined, cause);
        }

        const parsed = MessagesResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new ParseError('Unexpected Anthropic response shape', 'anthropic_messages', JSON.stringify(body));
        }

        const text = parsed.data.content
            .map(block => block.text ?? '')
            .join('')
            .trim();

        if (!text) {
            throw new ParseError('Empty Anthropic response', 'anthropic_messages');
        }

        this.logger.debug('Anthropic call completed', {
            type: 'oracle',
            model: this.options.model,
            duration_ms: Date.now() - started,
        });
        return text;
    }

    async generateGoalAndPath(goalText: string, profile: UserProfile): Promise<GoalPlan> {
        const raw = await this.call(withLanguage(ARCHITECT_PROMPT, profile.language), goalPlanPrompt(goalText, profile), 0.2);
        return decodeGoalPlan(raw);
    }

    async generateMaterial(concept: Concept, profile: UserProfile, failureFeedback?: string): Promise<string> {
        return this.call(withLanguage(CURATOR_PROMPT, profile.language), materialPrompt(concept, profile, failureFeedback));
    }

    async generateTest(concept: Concept, profile: UserProfile, count: number): Promise<TestQuestion[]> {
        const raw = await this.call(withLanguage(CURATOR_PROMPT, profile.language), testPrompt(concept, profile, count), 0.3);
        return decodeQuestions(raw);
    }

    async evaluateTest(
        concept: Concept,
        questions: TestQuestion[],
        answers: TestAnswers,
        profile: UserProfile
    ): Promise<TestResult> {
        const raw = await this.call(
            withLanguage(CURATOR_PROMPT, profile.language),
            evaluationPrompt(concept, questions, answers, profile),
            0
        );
        const evaluation = decodeTestEvaluation(raw);
        return {
            ...evaluation,
            passed: evaluation.score > this.options.passThreshold,
        };
    }

    /**
     * Chat replies are free text at heart; a reply without usable JSON is
     * passed through as-is with a neutral affect
     */
    async chat(concept: Concept, message: string, profile: UserProfile): Promise<ChatReply> {
        const raw = await this.call(withLanguage(TUTOR_PROMPT, profile.language), chatPrompt(concept, message, profile));
        try {
            return decodeChatReply(raw);
        } catch (error) {
            if (!(error instanceof ParseError)) throw error;
            this.logger.warn('Chat reply was not structured, using raw text', { type: 'oracle', error: error.message });
            return { reply: raw, affect: 'neutral' };
        }
    }

    async diagnoseGap(concept: Concept, profile: UserProfile): Promise<string> {
        return this.call(withLanguage(TUTOR_PROMPT, profile.language), diagnosisPrompt(concept, profile));
    }

    async performSurgery(
        missingConceptName: string,
        path: LearningPath,
        currentConcept: Concept | null,
        profile: UserProfile
    ): Promise<SurgeryPlan> {
        const raw = await this.call(
            withLanguage(ARCHITECT_PROMPT, profile.language),
            surgeryPrompt(missingConceptName, path, currentConcept),
            0.2
        );
        return decodeSurgeryPlan(raw);
    }

    async generatePriorKnowledgeTest(path: LearningPath, profile: UserProfile): Promise<TestQuestion[]> {
        const raw = await this.call(withLanguage(CURATOR_PROMPT, profile.language), assessmentPrompt(path, profile), 0.3);
        return decodeQuestions(raw, 'assessment_questions');
    }

    async evaluatePriorKnowledgeTest(
        path: LearningPath,
        questions: TestQuestion[],
        answers: TestAnswers,
        profile: UserProfile
    ): Promise<AssessmentResult> {
        const raw = await this.call(
            withLanguage(CURATOR_PROMPT, profile.language),
            assessmentEvaluationPrompt(path, questions, answers),
            0
        );
        return decodeAssessmentResult(raw);
    }
}
