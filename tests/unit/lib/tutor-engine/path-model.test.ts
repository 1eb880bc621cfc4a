/**
 * Path Model Tests
 * Validation, traversal and immutable status updates
 */

import { describe, it, expect } from 'vitest';
import {
    asPlannedPath,
    assertStatusTransition,
    findById,
    nextOpen,
    uniqueConceptId,
    validate,
    withConceptStatus,
    resolveConcept,
} from '@/lib/tutor-engine/path-model';
import {
    ConceptNotFoundError,
    DuplicateConceptIdError,
    InvalidPathError,
    InvalidStatusTransitionError,
} from '@/lib/tutor-engine/errors';
import { createTestConcept, createTestPath } from '../../utils/test-data';

describe('validate', () => {
    it('should accept a well-formed path', () => {
        const path = createTestPath(['K1', 'mastered'], ['K2', 'active'], ['K3', 'open']);
        expect(() => validate(path)).not.toThrow();
    });

    it('should reject two concepts sharing an id', () => {
        const path = createTestPath(['K1', 'open'], ['K2', 'open'], ['K1', 'skipped']);
        expect(() => validate(path)).toThrow(DuplicateConceptIdError);
    });

    it('should reject a concept without id', () => {
        const path = [createTestConcept('')];
        expect(() => validate(path)).toThrow(InvalidPathError);
    });

    it('should reject more than one active concept', () => {
        const path = createTestPath(['K1', 'active'], ['K2', 'active']);
        expect(() => validate(path)).toThrow('Path has 2 active concepts');
    });

    it('should reject a reactivated concept that was not skipped before', () => {
        const previous = createTestPath(['K1', 'mastered']);
        const path = createTestPath(['K1', 'reactivated']);
        expect(() => validate(path, previous)).toThrow(InvalidStatusTransitionError);
    });

    it('should accept skipped -> reactivated against the previous path', () => {
        const previous = createTestPath(['K1', 'skipped']);
        const path = createTestPath(['K1', 'reactivated']);
        expect(() => validate(path, previous)).not.toThrow();
    });

    it('should reject a new concept that claims to be reactivated', () => {
        const previous = createTestPath(['K1', 'open']);
        const path = createTestPath(['N1', 'reactivated'], ['K1', 'open']);
        expect(() => validate(path, previous)).toThrow('Invalid status transition for N1: open -> reactivated');
    });
});

describe('assertStatusTransition', () => {
    it('should allow every status except reactivated from any status', () => {
        expect(() => assertStatusTransition('K1', 'mastered', 'review')).not.toThrow();
        expect(() => assertStatusTransition('K1', 'review', 'active')).not.toThrow();
        expect(() => assertStatusTransition('K1', 'active', 'open')).not.toThrow();
    });

    it('should only allow reactivated from skipped or reactivated', () => {
        expect(() => assertStatusTransition('K1', 'skipped', 'reactivated')).not.toThrow();
        expect(() => assertStatusTransition('K1', 'reactivated', 'reactivated')).not.toThrow();
        expect(() => assertStatusTransition('K1', 'open', 'reactivated')).toThrow(InvalidStatusTransitionError);
    });
});

describe('nextOpen', () => {
    const path = createTestPath(
        ['K1', 'mastered'],
        ['K2', 'skipped'],
        ['K3', 'open'],
        ['K4', 'reactivated'],
        ['K5', 'review'],
    );

    it('should scan from the head when fromIndex is -1', () => {
        expect(nextOpen(path, -1)?.id).toBe('K3');
    });

    it('should only return concepts strictly after fromIndex', () => {
        expect(nextOpen(path, 2)?.id).toBe('K4');
    });

    it('should bypass skipped, mastered and review concepts', () => {
        expect(nextOpen(path, 3)).toBeNull();
    });

    it('should never return an index at or before fromIndex', () => {
        for (let i = -1; i < path.length; i++) {
            const found = nextOpen(path, i);
            if (found) {
                expect(path.indexOf(found)).toBeGreaterThan(i);
            }
        }
    });

    it('should return null for an empty path', () => {
        expect(nextOpen([], -1)).toBeNull();
    });
});

describe('asPlannedPath', () => {
    it('should open every concept the plan does not skip', () => {
        const planned = createTestPath(['K1', 'active'], ['K2', 'reactivated'], ['K3', 'skipped'], ['K4', 'review']);

        expect(asPlannedPath(planned).map(c => c.status)).toEqual(['open', 'open', 'skipped', 'open']);
        expect(planned[0].status).toBe('active');
    });
});

describe('withConceptStatus', () => {
    it('should return a new path and leave the input untouched', () => {
        const path = createTestPath(['K1', 'open'], ['K2', 'open']);
        const updated = withConceptStatus(path, 'K1', 'mastered');

        expect(updated).not.toBe(path);
        expect(updated[0].status).toBe('mastered');
        expect(path[0].status).toBe('open');
        expect(updated[1]).toBe(path[1]);
    });

    it('should apply the provenance patch', () => {
        const path = createTestPath(['K1', 'open']);
        const updated = withConceptStatus(path, 'K1', 'skipped', { expertiseSource: 'assessment' });
        expect(updated[0]).toEqual({ id: 'K1', name: 'Concept K1', status: 'skipped', requiredBloomLevel: 2, expertiseSource: 'assessment' });
    });

    it('should throw for an unknown concept', () => {
        expect(() => withConceptStatus([], 'K9', 'open')).toThrow(ConceptNotFoundError);
    });
});

describe('findById / resolveConcept', () => {
    const path = createTestPath(['K1', 'open'], ['K2', 'active']);

    it('should return the index of a concept', () => {
        expect(findById(path, 'K2')).toBe(1);
    });

    it('should resolve the current concept to the path copy', () => {
        const stale = createTestConcept('K2', 'open');
        expect(resolveConcept(path, stale)?.status).toBe('active');
        expect(resolveConcept(path, null)).toBeNull();
        expect(resolveConcept(path, createTestConcept('K9'))).toBeNull();
    });
});

describe('uniqueConceptId', () => {
    it('should keep an unused id', () => {
        expect(uniqueConceptId(createTestPath(['K1', 'open']), 'N-1')).toBe('N-1');
    });

    it('should append the first free numeric suffix', () => {
        const path = createTestPath(['N-1', 'open'], ['N-1-2', 'open']);
        expect(uniqueConceptId(path, 'N-1')).toBe('N-1-3');
    });
});
