/**
 * Pathwise Tutor Engine - Run Write Buffer
 *
 * Store writes issued during a run are queued here and committed as one
 * batch once the run has succeeded. A failed run discards the queue, so
 * nothing it did reaches the store.
 */

import type { PathStore, PendingWrite } from './store/types';
import type { ConceptStatus, Goal, UserProfile } from './types';

export class WriteBuffer {
    private pending: PendingWrite[] = [];

    saveGoal(goal: Goal): void {
        this.pending.push({ kind: 'saveGoal', goal: structuredClone(goal) });
    }

    updateConceptStatus(goalId: string, conceptId: string, status: ConceptStatus): void {
        this.pending.push({ kind: 'updateConceptStatus', goalId, conceptId, status });
    }

    saveUserProfile(profile: UserProfile): void {
        this.pending.push({ kind: 'saveUserProfile', profile: structuredClone(profile) });
    }

    get size(): number {
        return this.pending.length;
    }

    /** Queued writes, oldest first */
    peek(): readonly PendingWrite[] {
        return this.pending;
    }

    discard(): void {
        this.pending = [];
    }

    /**
     * Commit every queued write as one batch, then empty the queue.
     * The store applies all of them or none.
     */
    async flush(store: PathStore): Promise<number> {
        const writes = this.pending;
        this.pending = [];

        if (writes.length > 0) {
            await store.commit(writes);
        }
        return writes.length;
    }
}
