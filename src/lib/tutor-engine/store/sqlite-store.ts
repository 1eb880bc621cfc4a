/**
 * SQLite PathStore
 *
 * JSON documents in three tables (goals, user_profiles, sessions) on
 * better-sqlite3. Every adapter failure is wrapped in StoreUnavailableError.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { PathStore, PendingWrite } from './types';
import type { ConceptStatus, Goal, SessionSnapshot, SessionSummary, UserProfile } from '../types';
import { ConceptNotFoundError, StoreUnavailableError, TutorEngineError, toError } from '../errors';
import { withConceptStatus } from '../path-model';
import { decodeGoal, decodeProfile, decodeSnapshot, summarize } from './codec';
import { createLogger } from '@/lib/debug';

const logger = createLogger('SqliteStore');

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS goals (
        goal_id TEXT PRIMARY KEY,
        data TEXT NOT NULL,
        updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS user_profiles (
        user_id TEXT PRIMARY KEY,
        data TEXT NOT NULL,
        updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS sessions (
        user_id TEXT NOT NULL,
        goal_id TEXT NOT NULL,
        session_name TEXT NOT NULL,
        saved_at TEXT NOT NULL,
        data TEXT NOT NULL,
        PRIMARY KEY (user_id, goal_id)
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_user_saved ON sessions(user_id, saved_at);
`;

interface DataRow {
    data: string;
}

function openDatabase(databasePath: string): Database.Database {
    try {
        if (databasePath !== ':memory:') {
            // Ensure the parent directory exists before opening the database
            const dbDir = path.dirname(databasePath);
            if (!fs.existsSync(dbDir)) {
                fs.mkdirSync(dbDir, { recursive: true });
                logger.info('Created database directory', { type: 'store', path: dbDir });
            }
        }

        const db = new Database(databasePath);
        db.pragma('journal_mode = WAL');
        db.exec(SCHEMA);
        return db;
    } catch (error) {
        throw new StoreUnavailableError('open', toError(error));
    }
}

export class SqlitePathStore implements PathStore {
    private readonly db: Database.Database;

    constructor(databasePath: string) {
        this.db = openDatabase(databasePath);
        logger.info('Opened database', { type: 'store', path: databasePath });
    }

    /**
     * Run a synchronous adapter call, keeping engine errors and wrapping the rest
     */
    private guard<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            if (error instanceof TutorEngineError) throw error;
            const cause = toError(error);
            logger.error('Store operation failed', { type: 'store', action: operation, error: cause.message });
            throw new StoreUnavailableError(operation, cause);
        }
    }

    // =========================================================================
    // SYNCHRONOUS WRITES
    // =========================================================================

    private writeGoal(goal: Goal): void {
        this.db
            .prepare<[string, string, string]>(`
                INSERT INTO goals (goal_id, data, updated_at) VALUES (?, ?, ?)
                ON CONFLICT(goal_id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at
            `)
            .run(goal.goalId, JSON.stringify(goal), new Date().toISOString());
    }

    private writeConceptStatus(goalId: string, conceptId: string, status: ConceptStatus): void {
        const row = this.db
            .prepare<[string], DataRow>('SELECT data FROM goals WHERE goal_id = ?')
            .get(goalId);
        if (!row) {
            throw new ConceptNotFoundError(conceptId);
        }
        const goal = decodeGoal(row.data);
        const updated: Goal = { ...goal, path: withConceptStatus(goal.path, conceptId, status) };
        this.db
            .prepare<[string, string, string]>('UPDATE goals SET data = ?, updated_at = ? WHERE goal_id = ?')
            .run(JSON.stringify(updated), new Date().toISOString(), goalId);
    }

    private writeProfile(profile: UserProfile): void {
        this.db
            .prepare<[string, string, string]>(`
                INSERT INTO user_profiles (user_id, data, updated_at) VALUES (?, ?, ?)
                ON CONFLICT(user_id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at
            `)
            .run(profile.userId, JSON.stringify(profile), new Date().toISOString());
    }

    private applyWrite(write: PendingWrite): void {
        switch (write.kind) {
            case 'saveGoal':
                this.writeGoal(write.goal);
                break;
            case 'updateConceptStatus':
                this.writeConceptStatus(write.goalId, write.conceptId, write.status);
                break;
            case 'saveUserProfile':
                this.writeProfile(write.profile);
                break;
        }
    }

    /**
     * One transaction for the whole batch; a throwing write rolls back the
     * ones before it
     */
    async commit(writes: readonly PendingWrite[]): Promise<void> {
        this.guard('commit', () => {
            const apply = this.db.transaction((batch: readonly PendingWrite[]) => {
                for (const write of batch) {
                    this.applyWrite(write);
                }
            });
            apply(writes);
        });
    }

    async getGoal(goalId: string): Promise<Goal | null> {
        return this.guard('getGoal', () => {
            const row = this.db
                .prepare<[string], DataRow>('SELECT data FROM goals WHERE goal_id = ?')
                .get(goalId);
            return row ? decodeGoal(row.data) : null;
        });
    }

    async saveGoal(goal: Goal): Promise<void> {
        this.guard('saveGoal', () => this.writeGoal(goal));
    }

    async updateConceptStatus(goalId: string, conceptId: string, status: ConceptStatus): Promise<void> {
        this.guard('updateConceptStatus', () => {
            const update = this.db.transaction(() => this.writeConceptStatus(goalId, conceptId, status));
            update();
        });
    }

    async getUserProfile(userId: string): Promise<UserProfile | null> {
        return this.guard('getUserProfile', () => {
            const row = this.db
                .prepare<[string], DataRow>('SELECT data FROM user_profiles WHERE user_id = ?')
                .get(userId);
            return row ? decodeProfile(row.data) : null;
        });
    }

    async saveUserProfile(profile: UserProfile): Promise<void> {
        this.guard('saveUserProfile', () => this.writeProfile(profile));
    }

    async saveSession(snapshot: SessionSnapshot): Promise<void> {
        this.guard('saveSession', () => {
            this.db
                .prepare<[string, string, string, string, string]>(`
                    INSERT INTO sessions (user_id, goal_id, session_name, saved_at, data) VALUES (?, ?, ?, ?, ?)
                    ON CONFLICT(user_id, goal_id) DO UPDATE SET
                        session_name = excluded.session_name,
                        saved_at = excluded.saved_at,
                        data = excluded.data
                `)
                .run(snapshot.userId, snapshot.goalId, snapshot.sessionName, snapshot.savedAt, JSON.stringify(snapshot));
        });
    }

    async loadSession(userId: string, goalId?: string): Promise<SessionSnapshot | null> {
        return this.guard('loadSession', () => {
            const row = goalId !== undefined
                ? this.db
                    .prepare<[string, string], DataRow>('SELECT data FROM sessions WHERE user_id = ? AND goal_id = ?')
                    .get(userId, goalId)
                : this.db
                    .prepare<[string], DataRow>('SELECT data FROM sessions WHERE user_id = ? ORDER BY saved_at DESC LIMIT 1')
                    .get(userId);
            return row ? decodeSnapshot(row.data) : null;
        });
    }

    async listSessions(userId: string): Promise<SessionSummary[]> {
        return this.guard('listSessions', () => {
            const rows = this.db
                .prepare<[string], DataRow>('SELECT data FROM sessions WHERE user_id = ? ORDER BY saved_at DESC')
                .all(userId);
            return rows.map(row => summarize(decodeSnapshot(row.data)));
        });
    }

    async deleteSession(userId: string, goalId: string): Promise<boolean> {
        return this.guard('deleteSession', () => {
            const result = this.db
                .prepare<[string, string]>('DELETE FROM sessions WHERE user_id = ? AND goal_id = ?')
                .run(userId, goalId);
            return result.changes > 0;
        });
    }

    close(): void {
        this.db.close();
    }
}
