/**
 * Pathwise Tutor Engine - Phase Engine
 *
 * Drives one learning session through its phases:
 *
 *   goal_creation -> material_generation -> chat_with_tutor
 *     chat_with_tutor -> gap_diagnosis -> remediation_execution -> material_generation
 *     chat_with_tutor -> test_generation -> (answers) -> test_evaluation
 *     test_evaluation -> material_generation (next concept or re-study) | goal complete
 *
 *   prior_knowledge_test -> (answers) -> prior_knowledge_evaluation -> material_generation
 *
 * A run starts at an entry phase and keeps advancing until a phase needs
 * learner input, the caller's halt point is reached, the goal completes, or
 * something fails. Each phase returns a new SessionState; store writes are
 * buffered and only reach the store when the run succeeds.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
    AwaitingInput,
    Concept,
    GoalContract,
    LearningEventType,
    Phase,
    SessionSnapshot,
    SessionState,
    SessionSummary,
    TestQuestion,
    TestResult,
    Transition,
} from './types';
import type { ContentOracle } from './oracle/types';
import type { PathStore } from './store/types';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config';
import {
    MissingSessionDataError,
    ParseError,
    PhaseFailedError,
    StepLimitExceededError,
    toError,
} from './errors';
import {
    asPlannedPath,
    clonePath,
    findById,
    nextOpen,
    resolveConcept,
    validate,
    withConceptStatus,
} from './path-model';
import { awaitingInputFor, decideNextPhase, resumePhaseFor } from './transitions';
import { RemediationProtocol } from './remediation';
import { EventLogger } from './event-log';
import { WriteBuffer } from './write-buffer';
import { createSessionState, createSnapshot, goalFromState } from './session';
import { createLogger, engineLog, type Logger } from '@/lib/debug';

// =============================================================================
// RUN RESULT
// =============================================================================

interface RunBase {
    state: SessionState;
    phase: Phase;           // Last phase entered
    trace: Phase[];         // Phases completed in this run, in order
    steps: number;
}

export type RunResult =
    | (RunBase & { status: 'awaiting_input'; awaiting: AwaitingInput; nextPhase: Phase })
    | (RunBase & { status: 'halted'; next: Transition })
    | (RunBase & { status: 'goal_complete' })
    | (RunBase & { status: 'failed'; error: PhaseFailedError; message: string });

export type RunStatus = RunResult['status'];

export interface RunOptions {
    /** Stop once this phase has completed */
    haltAfter?: Phase;
}

export interface PhaseEngineDeps {
    oracle: ContentOracle;
    store: PathStore;
    config?: EngineConfig;
    events?: EventLogger;
    logger?: Logger;
    now?: () => Date;
    generateId?: () => string;
}

// =============================================================================
// ENGINE
// =============================================================================

export class PhaseEngine {
    private readonly oracle: ContentOracle;
    private readonly store: PathStore;
    private readonly config: EngineConfig;
    private readonly logger: Logger;
    private readonly now: () => Date;
    private readonly generateId: () => string;
    private readonly remediation: RemediationProtocol;

    readonly events: EventLogger;

    constructor(deps: PhaseEngineDeps) {
        this.oracle = deps.oracle;
        this.store = deps.store;
        this.config = deps.config ?? DEFAULT_ENGINE_CONFIG;
        this.logger = deps.logger ?? createLogger('PhaseEngine');
        this.now = deps.now ?? (() => new Date());
        this.generateId = deps.generateId ?? uuidv4;
        this.events = deps.events ?? new EventLogger({ now: this.now });
        this.remediation = new RemediationProtocol({
            oracle: this.oracle,
            config: this.config.remediation,
            now: this.now,
            logger: this.logger,
        });
    }

    /**
     * New session for a learner, with their stored profile when one exists
     */
    async startSession(userId: string): Promise<SessionState> {
        const profile = await this.store.getUserProfile(userId);
        const state = createSessionState(userId);
        if (profile) {
            return { ...state, profile };
        }
        return {
            ...state,
            profile: { ...state.profile, ...this.config.defaultProfile },
        };
    }

    /**
     * Run from `entry` until input is needed, the halt point is reached,
     * the goal completes or a phase fails
     */
    async run(entry: Phase, input: SessionState, options: RunOptions = {}): Promise<RunResult> {
        const started = Date.now();
        const writes = new WriteBuffer();
        const trace: Phase[] = [];
        let state = structuredClone(input);
        let phase = entry;
        let steps = 0;

        const finish = (result: RunResult): RunResult => {
            engineLog.runFinished(result.status, result.steps, Date.now() - started, input.userId);
            return result;
        };

        try {
            for (;;) {
                steps++;
                if (steps > this.config.maxSteps) {
                    throw new StepLimitExceededError(this.config.maxSteps, phase);
                }

                const awaiting = awaitingInputFor(phase, state);
                if (awaiting) {
                    await writes.flush(this.store);
                    return finish({ status: 'awaiting_input', state, phase, trace, steps, awaiting, nextPhase: phase });
                }

                engineLog.phaseStarted(phase, steps, state.userId);
                state = await this.executePhase(phase, state, writes);
                trace.push(phase);

                const transition = decideNextPhase(phase, state);

                if (options.haltAfter === phase) {
                    await writes.flush(this.store);
                    return finish({ status: 'halted', state, phase, trace, steps, next: transition });
                }

                switch (transition.type) {
                    case 'advance':
                        phase = transition.next;
                        break;
                    case 'await':
                        await writes.flush(this.store);
                        return finish({
                            status: 'awaiting_input',
                            state,
                            phase,
                            trace,
                            steps,
                            awaiting: transition.awaiting,
                            nextPhase: resumePhaseFor(transition.awaiting),
                        });
                    case 'goal_complete':
                        await writes.flush(this.store);
                        return finish({ status: 'goal_complete', state, phase, trace, steps });
                }
            }
        } catch (error) {
            writes.discard();
            const failure = new PhaseFailedError(phase, toError(error));
            engineLog.phaseFailed(phase, input.userId, failure.message);
            this.events.record({
                eventType: 'phase_failed',
                userId: input.userId,
                goalId: input.goalId,
                conceptId: input.currentConcept?.id ?? null,
                text: failure.message,
            });
            return finish({
                status: 'failed',
                state: structuredClone(input),
                phase,
                trace,
                steps,
                error: failure,
                message: failure.getUserMessage(),
            });
        }
    }

    // =========================================================================
    // SESSION SNAPSHOTS
    // =========================================================================

    async saveSession(state: SessionState, phase: Phase | null, sessionName?: string): Promise<SessionSnapshot> {
        const snapshot = createSnapshot(state, phase, { sessionName, savedAt: this.now() });
        if (!snapshot) {
            throw new MissingSessionDataError('goalId');
        }
        await this.store.saveSession(snapshot);
        return snapshot;
    }

    async loadSession(userId: string, goalId?: string): Promise<SessionSnapshot | null> {
        return this.store.loadSession(userId, goalId);
    }

    async listSessions(userId: string): Promise<SessionSummary[]> {
        return this.store.listSessions(userId);
    }

    async deleteSession(userId: string, goalId: string): Promise<boolean> {
        return this.store.deleteSession(userId, goalId);
    }

    // =========================================================================
    // PHASES
    // =========================================================================

    private executePhase(phase: Phase, state: SessionState, writes: WriteBuffer): Promise<SessionState> {
        switch (phase) {
            case 'goal_creation':
                return this.createGoal(state, writes);
            case 'material_generation':
                return this.generateMaterial(state, writes);
            case 'chat_with_tutor':
                return this.chatWithTutor(state);
            case 'gap_diagnosis':
                return this.diagnoseGap(state);
            case 'remediation_execution':
                return this.executeRemediation(state, writes);
            case 'test_generation':
                return this.generateTest(state);
            case 'test_evaluation':
                return this.evaluateTest(state, writes);
            case 'prior_knowledge_test':
                return this.generatePriorKnowledgeTest(state);
            case 'prior_knowledge_evaluation':
                return this.evaluatePriorKnowledgeTest(state, writes);
        }
    }

    private async createGoal(state: SessionState, writes: WriteBuffer): Promise<SessionState> {
        const goalText = state.lastInput.trim();
        const plan = await this.oracle.generateGoalAndPath(goalText, state.profile);
        const path = asPlannedPath(plan.path);
        validate(path);

        const goal: GoalContract = {
            ...plan.goalContract,
            goalId: this.generateId(),
            status: 'in_progress',
        };
        const current = nextOpen(path, -1);

        let next: SessionState = {
            ...state,
            goalId: goal.goalId,
            goal,
            path,
            currentConcept: current ? { ...current } : null,
            lastInput: '',
            lastOutput: plan.message ?? `Learning contract "${goal.name}" created with ${path.length} concepts.`,
            remediationPending: false,
            testPassed: null,
            failureFeedback: null,
            testQuestions: [],
            testAnswers: {},
            lastTestResult: null,
        };

        writes.saveGoal({ ...goal, path });
        this.record(next, 'goal_created', goalText, null);

        if (!current) {
            next = this.completeGoal(next, writes);
        }
        return next;
    }

    private async generateMaterial(state: SessionState, writes: WriteBuffer): Promise<SessionState> {
        const concept = this.requireCurrent(state);
        const material = await this.oracle.generateMaterial(concept, state.profile, state.failureFeedback ?? undefined);

        const index = findById(state.path, concept.id);
        const path = state.path[index].status === 'active'
            ? state.path
            : withConceptStatus(state.path, concept.id, 'active');
        validate(path);

        if (state.goalId) {
            writes.updateConceptStatus(state.goalId, concept.id, 'active');
        }

        const next: SessionState = {
            ...state,
            path,
            currentConcept: resolveConcept(path, concept),
            lastOutput: material,
            failureFeedback: null,
        };
        this.record(next, 'material_generated', material, concept.id);
        return next;
    }

    private async chatWithTutor(state: SessionState): Promise<SessionState> {
        const concept = this.requireCurrent(state);
        this.record(state, 'chat_input', state.lastInput, concept.id);

        const reply = await this.oracle.chat(concept, state.lastInput, state.profile);

        const next: SessionState = {
            ...state,
            lastOutput: reply.reply,
            affect: reply.affect,
            remediationPending: state.remediationPending || reply.gapDetected === true,
        };
        this.record(next, 'chat_reply', reply.reply, concept.id, { affect: reply.affect });
        return next;
    }

    private async diagnoseGap(state: SessionState): Promise<SessionState> {
        const concept = this.requireCurrent(state);
        const dialogue = await this.oracle.diagnoseGap(concept, state.profile);

        const next: SessionState = {
            ...state,
            lastOutput: dialogue,
            remediationPending: true,
        };
        this.record(next, 'gap_diagnosis', dialogue, concept.id);
        return next;
    }

    private async executeRemediation(state: SessionState, writes: WriteBuffer): Promise<SessionState> {
        const outcome = await this.remediation.apply({
            missingConceptName: state.lastInput,
            path: state.path,
            currentConcept: state.currentConcept,
            profile: state.profile,
        });

        const next: SessionState = {
            ...state,
            path: outcome.path,
            currentConcept: { ...outcome.newConcept },
            lastOutput: outcome.message,
            remediationPending: false,
            testPassed: null,
            testQuestions: [],
            testAnswers: {},
        };

        const goal = goalFromState(next);
        if (goal) {
            writes.saveGoal(goal);
        }

        this.record(
            next,
            outcome.usedFallback ? 'remediation_fallback' : 'remediation',
            outcome.reactivatedIds.length > 0
                ? `${outcome.message} (reactivated: ${outcome.reactivatedIds.join(', ')})`
                : outcome.message,
            outcome.newConcept.id
        );
        return next;
    }

    private async generateTest(state: SessionState): Promise<SessionState> {
        const concept = this.requireCurrent(state);

        let questions: TestQuestion[];
        try {
            questions = await this.oracle.generateTest(concept, state.profile, this.config.tests.questionCount);
        } catch (error) {
            if (!(error instanceof ParseError)) throw error;
            this.logger.warn('Test questions unreadable, using a single open question', {
                type: 'engine',
                concept_id: concept.id,
                error: error.message,
            });
            questions = [{
                id: 'q1',
                questionText: `Explain "${concept.name}" in your own words and give an example.`,
                type: 'free_text',
            }];
        }

        const next: SessionState = {
            ...state,
            testQuestions: questions,
            testAnswers: {},
            testPassed: null,
            lastOutput: formatQuestions(concept, questions),
        };
        this.record(next, 'test_generated', `${questions.length} question(s)`, concept.id);
        return next;
    }

    private async evaluateTest(state: SessionState, writes: WriteBuffer): Promise<SessionState> {
        const concept = this.requireCurrent(state);

        let evaluation: TestResult;
        try {
            evaluation = await this.oracle.evaluateTest(concept, state.testQuestions, state.testAnswers, state.profile);
        } catch (error) {
            if (!(error instanceof ParseError)) throw error;
            this.logger.warn('Test evaluation unreadable, asking for resubmission', {
                type: 'engine',
                concept_id: concept.id,
                error: error.message,
            });
            return {
                ...state,
                testPassed: null,
                testAnswers: {},
                lastInput: '',
                lastOutput: 'Your answers could not be evaluated. Please submit them again.',
            };
        }

        const passed = evaluation.score > this.config.tests.passThreshold;
        const result: TestResult = { ...evaluation, passed };

        const profile = {
            ...state.profile,
            lastTestScore: evaluation.score,
            errorPatterns: Array.from(new Set([...state.profile.errorPatterns, ...(evaluation.errorPatterns ?? [])])),
        };
        writes.saveUserProfile(profile);

        const index = findById(state.path, concept.id);
        const status = passed ? 'mastered' : 'review';
        const path = withConceptStatus(state.path, concept.id, status);
        if (state.goalId) {
            writes.updateConceptStatus(state.goalId, concept.id, status);
        }

        let currentConcept: Concept | null;
        if (passed) {
            const following = nextOpen(path, index);
            currentConcept = following ? { ...following } : null;
        } else {
            currentConcept = resolveConcept(path, concept);
        }

        let next: SessionState = {
            ...state,
            path,
            profile,
            currentConcept,
            testPassed: passed,
            failureFeedback: passed ? null : evaluation.feedback,
            lastTestResult: result,
            testQuestions: [],
            testAnswers: {},
            lastInput: '',
            lastOutput: [evaluation.feedback, evaluation.recommendation].filter(Boolean).join('\n\n'),
        };

        this.record(next, 'test_evaluated', evaluation.feedback, concept.id, { score: evaluation.score });

        if (passed && !currentConcept) {
            next = this.completeGoal(next, writes);
        }
        return next;
    }

    private async generatePriorKnowledgeTest(state: SessionState): Promise<SessionState> {
        if (state.path.length === 0) {
            throw new MissingSessionDataError('path');
        }
        const questions = await this.oracle.generatePriorKnowledgeTest(clonePath(state.path), state.profile);

        const next: SessionState = {
            ...state,
            testQuestions: questions,
            testAnswers: {},
            lastOutput: formatQuestions(null, questions),
        };
        this.record(next, 'assessment_generated', `${questions.length} question(s)`, null);
        return next;
    }

    private async evaluatePriorKnowledgeTest(state: SessionState, writes: WriteBuffer): Promise<SessionState> {
        const assessment = await this.oracle.evaluatePriorKnowledgeTest(
            clonePath(state.path),
            state.testQuestions,
            state.testAnswers,
            state.profile
        );

        const known = new Set(assessment.knownConceptIds);
        let path = state.path;
        for (const concept of state.path) {
            if (concept.status === 'open' && known.has(concept.id)) {
                path = withConceptStatus(path, concept.id, 'skipped', { expertiseSource: 'assessment' });
            }
        }

        const current = path.find(c => c.status === 'active') ?? nextOpen(path, -1);

        let next: SessionState = {
            ...state,
            path,
            currentConcept: current ? { ...current } : null,
            testQuestions: [],
            testAnswers: {},
            lastInput: '',
            lastOutput: assessment.feedback,
        };

        const goal = goalFromState(next);
        if (goal) {
            writes.saveGoal(goal);
        }
        this.record(next, 'assessment_evaluated', assessment.feedback, null);

        if (!current) {
            next = this.completeGoal(next, writes);
        }
        return next;
    }

    // =========================================================================
    // HELPERS
    // =========================================================================

    private completeGoal(state: SessionState, writes: WriteBuffer): SessionState {
        const next: SessionState = {
            ...state,
            goal: state.goal ? { ...state.goal, status: 'completed' } : null,
            currentConcept: null,
        };

        const goal = goalFromState(next);
        if (goal) {
            writes.saveGoal(goal);
        }
        this.record(next, 'goal_completed', state.goal ? `Goal "${state.goal.name}" completed` : 'Goal completed', null);
        return next;
    }

    private requireCurrent(state: SessionState): Concept {
        if (!state.currentConcept) {
            throw new MissingSessionDataError('currentConcept');
        }
        return state.currentConcept;
    }

    private record(
        state: SessionState,
        eventType: LearningEventType,
        text: string,
        conceptId: string | null,
        extra: { affect?: string; score?: number } = {}
    ): void {
        this.events.record({
            eventType,
            userId: state.userId,
            goalId: state.goalId,
            conceptId,
            text,
            ...extra,
        });
    }
}

function formatQuestions(concept: Concept | null, questions: TestQuestion[]): string {
    const header = concept ? `### Test: ${concept.name}` : '### Prior-knowledge test';
    const lines = questions.map((q, i) => {
        const options = q.options && q.options.length > 0
            ? '\n' + q.options.map(o => `   - ${o}`).join('\n')
            : '';
        return `${i + 1}. [${q.id}] ${q.questionText}${options}`;
    });
    return [header, '', ...lines].join('\n');
}
