/**
 * Pathwise Tutor Engine - Learning Event Log
 *
 * Append-only record of the learning journey. Every entry is written to the
 * structured logger and delivered to subscribers. Recording never throws:
 * a failing subscriber is logged and skipped.
 */

import { v4 as uuidv4 } from 'uuid';
import type { LearningEvent, LearningEventType } from './types';
import { learningLog } from '@/lib/debug';
import { toError } from './errors';

// =============================================================================
// EVENT LOG
// =============================================================================

export type LearningEventHandler = (event: LearningEvent) => void | Promise<void>;

export type LearningEventInput = Omit<LearningEvent, 'timestamp'> & { timestamp?: string };

interface EventSubscription {
    id: string;
    eventType: LearningEventType | null;    // null = all events
    handler: LearningEventHandler;
}

export interface EventLoggerOptions {
    maxHistorySize?: number;
    now?: () => Date;
}

export class EventLogger {
    private subscriptions: EventSubscription[] = [];
    private eventHistory: LearningEvent[] = [];
    private readonly maxHistorySize: number;
    private readonly now: () => Date;

    constructor(options: EventLoggerOptions = {}) {
        this.maxHistorySize = options.maxHistorySize ?? 500;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Subscribe to one event type, or to every event when eventType is omitted
     */
    subscribe(handler: LearningEventHandler, eventType?: LearningEventType): string {
        const id = uuidv4();
        this.subscriptions.push({ id, eventType: eventType ?? null, handler });
        return id;
    }

    unsubscribe(subscriptionId: string): void {
        this.subscriptions = this.subscriptions.filter(s => s.id !== subscriptionId);
    }

    /**
     * Record an event. Subscribers run without being awaited.
     */
    record(input: LearningEventInput): LearningEvent {
        const event: LearningEvent = {
            ...input,
            timestamp: input.timestamp ?? this.now().toISOString(),
        };

        this.eventHistory.push(event);
        if (this.eventHistory.length > this.maxHistorySize) {
            this.eventHistory.shift();
        }

        learningLog.event(event.eventType, event.userId, event.conceptId, event.text, {
            goal_id: event.goalId,
            affect: event.affect,
            score: event.score,
        });

        for (const subscription of this.subscriptions) {
            if (subscription.eventType !== null && subscription.eventType !== event.eventType) continue;
            this.deliver(subscription, event);
        }

        return event;
    }

    private deliver(subscription: EventSubscription, event: LearningEvent): void {
        try {
            const result = subscription.handler(event);
            if (result instanceof Promise) {
                result.catch(error => learningLog.subscriberFailed(event.eventType, toError(error).message));
            }
        } catch (error) {
            learningLog.subscriberFailed(event.eventType, toError(error).message);
        }
    }

    /**
     * Recorded events, oldest first, optionally filtered by type
     */
    getHistory(eventType?: LearningEventType, limit?: number): LearningEvent[] {
        const events = eventType
            ? this.eventHistory.filter(e => e.eventType === eventType)
            : this.eventHistory.slice();
        return limit === undefined ? events : events.slice(-limit);
    }

    clearSubscriptions(): void {
        this.subscriptions = [];
    }

    clearHistory(): void {
        this.eventHistory = [];
    }
}
