/**
 * Simulated Content Oracle
 *
 * Deterministic canned content for development and tests. Used whenever no
 * LLM key is configured.
 */

import type { ChatReply, ContentOracle, GoalPlan, SurgeryPlan, AssessmentResult } from './types';
import type {
    Concept,
    LearningPath,
    TestAnswers,
    TestQuestion,
    TestResult,
    UserProfile,
} from '../types';
import { DEFAULT_ENGINE_CONFIG } from '../config';

const SIMULATED_FULL_SCORE = 85;
const GAP_PATTERN = /\b(gap|missing|don't understand|do not understand|no idea)\b/i;
const FRUSTRATION_PATTERN = /\b(frustrat\w*|confus\w*|stuck|lost)\b/i;
const KNOWN_ANSWER_MIN_WORDS = 5;

export interface SimulatedOracleOptions {
    passThreshold?: number;
    now?: () => Date;
}

function slug(text: string): string {
    const words = text
        .trim()
        .split(/[^A-Za-z0-9]+/)
        .filter(Boolean)
        .map(w => w[0].toUpperCase() + w.slice(1).toLowerCase());
    return words.join('') || 'Foundation';
}

function isAnswered(answer: string | undefined): boolean {
    return answer !== undefined && answer.trim().length > 0;
}

export class SimulatedContentOracle implements ContentOracle {
    name = 'simulated';

    private readonly passThreshold: number;
    private readonly now: () => Date;

    constructor(options: SimulatedOracleOptions = {}) {
        this.passThreshold = options.passThreshold ?? DEFAULT_ENGINE_CONFIG.tests.passThreshold;
        this.now = options.now ?? (() => new Date());
    }

    async generateGoalAndPath(goalText: string, profile: UserProfile): Promise<GoalPlan> {
        const target = new Date(this.now().getTime() + 90 * 24 * 60 * 60 * 1000);
        const topic = goalText.trim();

        return {
            goalContract: {
                name: topic,
                subjectArea: 'General',
                targetDate: target.toISOString().slice(0, 10),
                bloomLevel: 3,
                successMetric: `Pass every concept test on "${topic}" with more than ${this.passThreshold}%`,
            },
            path: [
                { id: 'K1-Foundations', name: `Foundations of ${topic}`, status: 'open', requiredBloomLevel: 2, estimatedTime: 30 },
                { id: 'K2-Core', name: `Core concepts of ${topic}`, status: 'open', requiredBloomLevel: 3, estimatedTime: 45 },
                { id: 'K3-Application', name: `Applying ${topic}`, status: 'open', requiredBloomLevel: 5, estimatedTime: 60 },
            ],
            message: `Your learning contract for "${topic}" is ready (${profile.stylePreference} style).`,
        };
    }

    async generateMaterial(concept: Concept, profile: UserProfile, failureFeedback?: string): Promise<string> {
        const lines = [
            `### MATERIAL: ${concept.name}`,
            '',
            `**${profile.stylePreference} explanation (level ${profile.complexityLevel}):**`,
            `Think of "${concept.name}" as one piece of a larger puzzle. Start with what it is, then how it connects to what you already know.`,
        ];
        if (failureFeedback) {
            lines.push('', `**Focus for this round:** ${failureFeedback}`);
        }
        lines.push('', '### RESOURCES', `- Overview: ${concept.name}`);
        return lines.join('\n');
    }

    async generateTest(concept: Concept, _profile: UserProfile, count: number): Promise<TestQuestion[]> {
        const questions: TestQuestion[] = [];
        for (let i = 1; i <= count; i++) {
            if (i === 1) {
                questions.push({
                    id: 'q1',
                    questionText: `Which statement best describes "${concept.name}"?`,
                    type: 'multiple_choice',
                    options: ['A definition', 'An unrelated fact', 'A common misconception', 'None of these'],
                });
            } else {
                questions.push({
                    id: `q${i}`,
                    questionText: `Explain an example of "${concept.name}" in your own words (${i}).`,
                    type: 'free_text',
                });
            }
        }
        return questions;
    }

    /**
     * Full simulated score when every question is answered, proportionally
     * less otherwise
     */
    async evaluateTest(
        _concept: Concept,
        questions: TestQuestion[],
        answers: TestAnswers,
        _profile: UserProfile
    ): Promise<TestResult> {
        const perQuestion = questions.map(q => {
            const correct = isAnswered(answers[q.id]);
            return {
                id: q.id,
                correct,
                explanation: correct ? 'Answer received.' : 'No answer given.',
            };
        });
        const answered = perQuestion.filter(q => q.correct).length;
        const score = questions.length === 0 ? 0 : Math.round((SIMULATED_FULL_SCORE * answered) / questions.length);
        const passed = score > this.passThreshold;

        return {
            score,
            passed,
            feedback: passed
                ? 'Well done! You have understood the concept.'
                : 'Several answers were missing. Review the material and try again.',
            recommendation: passed ? 'Continue with the next concept.' : 'Repeat this concept.',
            perQuestion,
            errorPatterns: answered < questions.length ? ['incomplete_answers'] : [],
        };
    }

    /**
     * A gap is only reported outside remediation concepts, so the message
     * that triggered a remediation does not trigger another one
     */
    async chat(concept: Concept, message: string, _profile: UserProfile): Promise<ChatReply> {
        const gapDetected = GAP_PATTERN.test(message) && concept.expertiseSource !== 'remediation';
        const affect = FRUSTRATION_PATTERN.test(message) ? 'frustrated' : gapDetected ? 'confused' : 'curious';
        return {
            reply: gapDetected
                ? `It sounds like something underneath "${concept.name}" is missing. Let's find out what.`
                : `Good question about "${concept.name}". Let's look at it step by step.`,
            affect,
            gapDetected,
        };
    }

    async diagnoseGap(concept: Concept, _profile: UserProfile): Promise<string> {
        return `Getting stuck on "${concept.name}" is completely normal. Which foundation feels missing? Name the concept you would like to revisit.`;
    }

    /**
     * New concept for the missing foundation; skipped low-level concepts are
     * flagged for reactivation
     */
    async performSurgery(
        missingConceptName: string,
        path: LearningPath,
        _currentConcept: Concept | null,
        _profile: UserProfile
    ): Promise<SurgeryPlan> {
        const name = missingConceptName.trim();
        return {
            message: `I added "${name}" to the start of your path.`,
            newConcept: {
                id: `R-${slug(name)}`,
                name,
                status: 'open',
                expertiseSource: 'remediation',
                requiredBloomLevel: 1,
            },
            supersedes: path
                .filter(c => c.status === 'skipped' && c.requiredBloomLevel <= 2)
                .map(c => c.id),
        };
    }

    async generatePriorKnowledgeTest(path: LearningPath, _profile: UserProfile): Promise<TestQuestion[]> {
        return path
            .filter(c => c.status === 'open')
            .map(c => ({
                id: `${c.id}-q1`,
                questionText: `Briefly explain what you already know about "${c.name}".`,
                type: 'free_text' as const,
            }));
    }

    /**
     * A concept counts as known when its answer has at least five words
     */
    async evaluatePriorKnowledgeTest(
        path: LearningPath,
        _questions: TestQuestion[],
        answers: TestAnswers,
        _profile: UserProfile
    ): Promise<AssessmentResult> {
        const knownConceptIds = path
            .filter(c => {
                const answer = answers[`${c.id}-q1`];
                return answer !== undefined && answer.trim().split(/\s+/).length >= KNOWN_ANSWER_MIN_WORDS;
            })
            .map(c => c.id);

        return {
            knownConceptIds,
            feedback: knownConceptIds.length > 0
                ? `You already know ${knownConceptIds.length} concept(s); they will be skipped.`
                : 'We will start from the beginning.',
        };
    }
}
