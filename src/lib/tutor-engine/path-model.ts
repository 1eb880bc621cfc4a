/**
 * Pathwise Tutor Engine - Path Model
 *
 * Pure functions over an ordered concept sequence. Nothing in here touches
 * the oracle or the store; every mutation returns a new path.
 */

import type { Concept, ConceptStatus, LearningPath } from './types';
import {
    ConceptNotFoundError,
    DuplicateConceptIdError,
    InvalidPathError,
    InvalidStatusTransitionError,
} from './errors';

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Throws unless `to` is a legal status for a concept currently in `from`.
 * `reactivated` is only reachable from `skipped` (or is kept as-is).
 */
export function assertStatusTransition(
    conceptId: string,
    from: ConceptStatus,
    to: ConceptStatus
): void {
    if (to === 'reactivated' && from !== 'skipped' && from !== 'reactivated') {
        throw new InvalidStatusTransitionError(conceptId, from, to);
    }
}

/**
 * Validate path invariants.
 *
 * When `previous` is given, every concept that also existed there is checked
 * against the status transition rule.
 */
export function validate(path: LearningPath, previous?: LearningPath): void {
    const seen = new Set<string>();
    let activeCount = 0;

    for (const concept of path) {
        if (!concept.id) {
            throw new InvalidPathError('Concept without id');
        }
        if (seen.has(concept.id)) {
            throw new DuplicateConceptIdError(concept.id);
        }
        seen.add(concept.id);

        if (!Number.isInteger(concept.requiredBloomLevel) || concept.requiredBloomLevel < 1 || concept.requiredBloomLevel > 6) {
            throw new InvalidPathError(`Bloom level out of range for ${concept.id}: ${concept.requiredBloomLevel}`);
        }
        if (concept.status === 'active') {
            activeCount++;
        }
    }

    if (activeCount > 1) {
        throw new InvalidPathError(`Path has ${activeCount} active concepts`);
    }

    if (previous) {
        const before = new Map(previous.map(c => [c.id, c.status]));
        for (const concept of path) {
            const prior = before.get(concept.id);
            if (prior === undefined) {
                // New concepts may not claim to be reactivated
                if (concept.status === 'reactivated') {
                    throw new InvalidStatusTransitionError(concept.id, 'open', 'reactivated');
                }
                continue;
            }
            assertStatusTransition(concept.id, prior, concept.status);
        }
    }
}

// =============================================================================
// LOOKUP & TRAVERSAL
// =============================================================================

export function findById(path: LearningPath, id: string): number {
    const index = path.findIndex(c => c.id === id);
    if (index === -1) {
        throw new ConceptNotFoundError(id);
    }
    return index;
}

export function isTraversable(concept: Concept): boolean {
    return concept.status === 'open' || concept.status === 'reactivated';
}

/**
 * First open/reactivated concept strictly after `fromIndex`, or null.
 * `nextOpen(path, -1)` scans from the head.
 */
export function nextOpen(path: LearningPath, fromIndex: number): Concept | null {
    const start = Math.max(0, Math.floor(fromIndex) + 1);
    for (let i = start; i < path.length; i++) {
        if (isTraversable(path[i])) {
            return path[i];
        }
    }
    return null;
}

// =============================================================================
// IMMUTABLE UPDATES
// =============================================================================

/**
 * Return a copy of the path with one concept's status changed
 */
export function withConceptStatus(
    path: LearningPath,
    conceptId: string,
    status: ConceptStatus,
    patch: Partial<Pick<Concept, 'expertiseSource'>> = {}
): LearningPath {
    const index = findById(path, conceptId);
    const concept = path[index];
    assertStatusTransition(concept.id, concept.status, status);

    const next = path.slice();
    next[index] = { ...concept, ...patch, status };
    return next;
}

/**
 * Make `candidate` unique among the path's ids by appending -2, -3, ...
 */
export function uniqueConceptId(path: LearningPath, candidate: string): string {
    const ids = new Set(path.map(c => c.id));
    if (!ids.has(candidate)) return candidate;

    let suffix = 2;
    while (ids.has(`${candidate}-${suffix}`)) {
        suffix++;
    }
    return `${candidate}-${suffix}`;
}

/**
 * Look the current concept up again so it reflects the path's copy
 */
export function resolveConcept(path: LearningPath, concept: Concept | null): Concept | null {
    if (!concept) return null;
    const match = path.find(c => c.id === concept.id);
    return match ? { ...match } : null;
}

export function clonePath(path: LearningPath): LearningPath {
    return path.map(c => ({ ...c }));
}

/**
 * Copy of a freshly planned path. A new goal starts with every concept
 * open, except those the planner marked as skipped.
 */
export function asPlannedPath(path: LearningPath): LearningPath {
    return path.map((c): Concept => ({ ...c, status: c.status === 'skipped' ? 'skipped' : 'open' }));
}
