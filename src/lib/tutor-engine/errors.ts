/**
 * Tutor Engine Error Hierarchy
 *
 * Typed error classes for the failure modes of the path model, the phase
 * engine and its collaborators. Every error carries a user-facing message so
 * a failed step never produces a blank response.
 */

import type { ConceptStatus, Phase } from './types';

/**
 * Base error class for all engine errors
 */
export abstract class TutorEngineError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly recoverable: boolean = false,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = this.constructor.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * Get user-friendly error message
     */
    abstract getUserMessage(): string;
}

/**
 * Oracle output did not match the expected structured shape
 */
export class ParseError extends TutorEngineError {
    constructor(
        message: string,
        public readonly source: string,
        public readonly raw?: string,
        cause?: Error
    ) {
        super(message, 'PARSE_ERROR', true, cause);
    }

    getUserMessage(): string {
        return 'The tutor returned an answer we could not read. Please try again.';
    }
}

/**
 * Two concepts in one path share an id
 */
export class DuplicateConceptIdError extends TutorEngineError {
    constructor(public readonly conceptId: string) {
        super(`Duplicate concept id in path: ${conceptId}`, 'DUPLICATE_CONCEPT_ID');
    }

    getUserMessage(): string {
        return 'The learning path is inconsistent (duplicate concept). No changes were saved.';
    }
}

/**
 * A status change broke the reactivated-only-from-skipped rule
 */
export class InvalidStatusTransitionError extends TutorEngineError {
    constructor(
        public readonly conceptId: string,
        public readonly from: ConceptStatus,
        public readonly to: ConceptStatus
    ) {
        super(`Invalid status transition for ${conceptId}: ${from} -> ${to}`, 'INVALID_STATUS_TRANSITION');
    }

    getUserMessage(): string {
        return 'The learning path could not be updated. No changes were saved.';
    }
}

/**
 * Structural path problem other than duplicate ids
 */
export class InvalidPathError extends TutorEngineError {
    constructor(message: string) {
        super(message, 'INVALID_PATH');
    }

    getUserMessage(): string {
        return 'The learning path is invalid. No changes were saved.';
    }
}

export class ConceptNotFoundError extends TutorEngineError {
    constructor(public readonly conceptId: string) {
        super(`Concept not found: ${conceptId}`, 'CONCEPT_NOT_FOUND');
    }

    getUserMessage(): string {
        return 'The requested concept is not part of this learning path.';
    }
}

/**
 * A phase was entered without the session data it needs
 */
export class MissingSessionDataError extends TutorEngineError {
    constructor(public readonly field: string) {
        super(`Session is missing required data: ${field}`, 'MISSING_SESSION_DATA');
    }

    getUserMessage(): string {
        return 'This step cannot run yet because the session is incomplete.';
    }
}

/**
 * Loop guard tripped
 */
export class StepLimitExceededError extends TutorEngineError {
    constructor(
        public readonly limit: number,
        public readonly phase: Phase
    ) {
        super(`Step limit of ${limit} exceeded at phase ${phase}`, 'STEP_LIMIT_EXCEEDED');
    }

    getUserMessage(): string {
        return 'The tutor got stuck in a loop and stopped. Please try again.';
    }
}

/**
 * Persistence collaborator failed
 */
export class StoreUnavailableError extends TutorEngineError {
    constructor(
        public readonly operation: string,
        cause?: Error
    ) {
        super(`Store operation failed: ${operation}${cause ? ` (${cause.message})` : ''}`, 'STORE_UNAVAILABLE', true, cause);
    }

    getUserMessage(): string {
        return 'Your progress could not be saved right now. Please try again later.';
    }
}

/**
 * Content oracle collaborator failed (network, HTTP status)
 */
export class OracleUnavailableError extends TutorEngineError {
    constructor(
        message: string,
        public readonly statusCode?: number,
        cause?: Error
    ) {
        super(message, 'ORACLE_UNAVAILABLE', true, cause);
    }

    getUserMessage(): string {
        if (this.statusCode && this.statusCode >= 500) {
            return 'The tutor service is temporarily unavailable. Please try again later.';
        }
        return 'The tutor could not be reached. Please try again.';
    }
}

/**
 * Phase-level failure surfaced to the caller
 */
export class PhaseFailedError extends TutorEngineError {
    constructor(
        public readonly phase: Phase,
        cause: Error
    ) {
        super(`Phase ${phase} failed: ${cause.message}`, 'PHASE_FAILED', false, cause);
    }

    getUserMessage(): string {
        if (this.cause instanceof TutorEngineError) {
            return this.cause.getUserMessage();
        }
        return 'Something went wrong in this step. Your session was not changed.';
    }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) return value;
    return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
