/**
 * In-memory PathStore
 *
 * Keeps deep copies so callers never share references with stored documents.
 */

import type { PathStore, PendingWrite } from './types';
import type { ConceptStatus, Goal, SessionSnapshot, SessionSummary, UserProfile } from '../types';
import { ConceptNotFoundError } from '../errors';
import { withConceptStatus } from '../path-model';
import { summarize } from './codec';

function sessionKey(userId: string, goalId: string): string {
    return `${userId}::${goalId}`;
}

export class MemoryPathStore implements PathStore {
    private goals = new Map<string, Goal>();
    private profiles = new Map<string, UserProfile>();
    private sessions = new Map<string, SessionSnapshot>();

    /**
     * Stages the batch on copies of the maps and swaps them in only when
     * every write went through
     */
    async commit(writes: readonly PendingWrite[]): Promise<void> {
        const goals = new Map(this.goals);
        const profiles = new Map(this.profiles);

        for (const write of writes) {
            switch (write.kind) {
                case 'saveGoal':
                    goals.set(write.goal.goalId, structuredClone(write.goal));
                    break;
                case 'updateConceptStatus': {
                    const goal = goals.get(write.goalId);
                    if (!goal) {
                        throw new ConceptNotFoundError(write.conceptId);
                    }
                    goals.set(write.goalId, { ...goal, path: withConceptStatus(goal.path, write.conceptId, write.status) });
                    break;
                }
                case 'saveUserProfile':
                    profiles.set(write.profile.userId, structuredClone(write.profile));
                    break;
            }
        }

        this.goals = goals;
        this.profiles = profiles;
    }

    async getGoal(goalId: string): Promise<Goal | null> {
        const goal = this.goals.get(goalId);
        return goal ? structuredClone(goal) : null;
    }

    async saveGoal(goal: Goal): Promise<void> {
        return this.commit([{ kind: 'saveGoal', goal }]);
    }

    async updateConceptStatus(goalId: string, conceptId: string, status: ConceptStatus): Promise<void> {
        return this.commit([{ kind: 'updateConceptStatus', goalId, conceptId, status }]);
    }

    async getUserProfile(userId: string): Promise<UserProfile | null> {
        const profile = this.profiles.get(userId);
        return profile ? structuredClone(profile) : null;
    }

    async saveUserProfile(profile: UserProfile): Promise<void> {
        return this.commit([{ kind: 'saveUserProfile', profile }]);
    }

    async saveSession(snapshot: SessionSnapshot): Promise<void> {
        this.sessions.set(sessionKey(snapshot.userId, snapshot.goalId), structuredClone(snapshot));
    }

    async loadSession(userId: string, goalId?: string): Promise<SessionSnapshot | null> {
        if (goalId !== undefined) {
            const snapshot = this.sessions.get(sessionKey(userId, goalId));
            return snapshot ? structuredClone(snapshot) : null;
        }
        const latest = this.userSessions(userId)[0];
        return latest ? structuredClone(latest) : null;
    }

    async listSessions(userId: string): Promise<SessionSummary[]> {
        return this.userSessions(userId).map(summarize);
    }

    async deleteSession(userId: string, goalId: string): Promise<boolean> {
        return this.sessions.delete(sessionKey(userId, goalId));
    }

    private userSessions(userId: string): SessionSnapshot[] {
        return Array.from(this.sessions.values())
            .filter(s => s.userId === userId)
            .sort((a, b) => b.savedAt.localeCompare(a.savedAt));
    }
}
