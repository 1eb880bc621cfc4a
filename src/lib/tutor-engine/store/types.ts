/**
 * Path Store Types
 *
 * Durable persistence for goals, learner profiles and session snapshots.
 * Adapter failures surface as StoreUnavailableError.
 */

import type {
    ConceptStatus,
    Goal,
    SessionSnapshot,
    SessionSummary,
    UserProfile,
} from '../types';

export type PendingWrite =
    | { kind: 'saveGoal'; goal: Goal }
    | { kind: 'updateConceptStatus'; goalId: string; conceptId: string; status: ConceptStatus }
    | { kind: 'saveUserProfile'; profile: UserProfile };

export interface PathStore {
    getGoal(goalId: string): Promise<Goal | null>;

    /** Upsert by goal id */
    saveGoal(goal: Goal): Promise<void>;

    /**
     * Set one concept's status inside a stored goal. Idempotent; throws
     * ConceptNotFoundError when the goal or the concept does not exist.
     */
    updateConceptStatus(goalId: string, conceptId: string, status: ConceptStatus): Promise<void>;

    /**
     * Apply a batch of writes in order, all or nothing. When one write
     * fails, none of the batch is visible afterwards and its error is
     * rethrown.
     */
    commit(writes: readonly PendingWrite[]): Promise<void>;

    getUserProfile(userId: string): Promise<UserProfile | null>;

    saveUserProfile(profile: UserProfile): Promise<void>;

    /** Upsert the snapshot for (userId, goalId) */
    saveSession(snapshot: SessionSnapshot): Promise<void>;

    /** Snapshot for the goal, or the most recently saved one when goalId is omitted */
    loadSession(userId: string, goalId?: string): Promise<SessionSnapshot | null>;

    /** Newest first */
    listSessions(userId: string): Promise<SessionSummary[]>;

    deleteSession(userId: string, goalId: string): Promise<boolean>;

    close?(): void;
}
