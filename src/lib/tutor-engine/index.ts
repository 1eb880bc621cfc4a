/**
 * Pathwise Tutor Engine
 *
 * Adaptive learning-path engine: goal contracts, concept traversal, path
 * surgery for knowledge gaps and comprehension tests.
 *
 * @example
 * const config = loadEngineConfig();
 * const engine = new PhaseEngine({
 *     oracle: createContentOracle(config),
 *     store: createPathStore(config),
 *     config,
 * });
 * const state = await engine.startSession('learner-1');
 * const result = await engine.run('goal_creation', { ...state, lastInput: 'Learn linear algebra' });
 */

export * from './types';
export * from './errors';
export * from './path-model';
export * from './transitions';
export * from './config';
export * from './session';
export { PhaseEngine } from './phase-engine';
export type { RunResult, RunStatus, RunOptions, PhaseEngineDeps } from './phase-engine';
export { RemediationProtocol } from './remediation';
export type { RemediationInput, RemediationOutcome, RemediationDeps } from './remediation';
export { EventLogger } from './event-log';
export type { LearningEventHandler, LearningEventInput, EventLoggerOptions } from './event-log';
export { WriteBuffer } from './write-buffer';
export { toEnvelope } from './envelope';
export type { Envelope } from './envelope';
export { createContentOracle, AnthropicContentOracle, SimulatedContentOracle } from './oracle';
export type { ContentOracle, GoalPlan, ChatReply, SurgeryPlan, AssessmentResult } from './oracle';
export { createPathStore, MemoryPathStore, SqlitePathStore } from './store';
export type { PathStore, PendingWrite } from './store';
