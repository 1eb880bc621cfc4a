/**
 * Learning Event Log Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventLogger } from '@/lib/tutor-engine/event-log';
import { learningLog } from '@/lib/debug';
import { FIXED_NOW, fixedNow } from '../../utils/test-data';

describe('EventLogger', () => {
    let events: EventLogger;

    beforeEach(() => {
        events = new EventLogger({ now: fixedNow });
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    it('should stamp recorded events with the current time', () => {
        const event = events.record({ eventType: 'chat_input', userId: 'learner-1', conceptId: 'K1', text: 'Hello' });

        expect(event).toEqual({
            eventType: 'chat_input',
            userId: 'learner-1',
            conceptId: 'K1',
            text: 'Hello',
            timestamp: FIXED_NOW.toISOString(),
        });
        expect(events.getHistory()).toEqual([event]);
    });

    it('should keep a caller-supplied timestamp', () => {
        const event = events.record({ eventType: 'chat_input', conceptId: null, text: 'x', timestamp: '2024-01-01T00:00:00.000Z' });
        expect(event.timestamp).toBe('2024-01-01T00:00:00.000Z');
    });

    it('should deliver events to matching subscribers only', () => {
        const all = vi.fn();
        const replies = vi.fn();
        events.subscribe(all);
        events.subscribe(replies, 'chat_reply');

        events.record({ eventType: 'chat_input', conceptId: 'K1', text: 'Q' });
        events.record({ eventType: 'chat_reply', conceptId: 'K1', text: 'A', affect: 'curious' });

        expect(all).toHaveBeenCalledTimes(2);
        expect(replies).toHaveBeenCalledTimes(1);
        expect(replies).toHaveBeenCalledWith(expect.objectContaining({ text: 'A', affect: 'curious' }));
    });

    it('should stop delivering after unsubscribe', () => {
        const handler = vi.fn();
        const id = events.subscribe(handler);
        events.unsubscribe(id);

        events.record({ eventType: 'chat_input', conceptId: null, text: 'Q' });
        expect(handler).not.toHaveBeenCalled();
    });

    it('should log a throwing subscriber and keep delivering', () => {
        const failed = vi.spyOn(learningLog, 'subscriberFailed');
        const after = vi.fn();
        events.subscribe(() => {
            throw new Error('boom');
        });
        events.subscribe(after);

        expect(() => events.record({ eventType: 'goal_created', conceptId: null, text: 'SQL' })).not.toThrow();
        expect(after).toHaveBeenCalledTimes(1);
        expect(failed).toHaveBeenCalledWith('goal_created', 'boom');
    });

    it('should log a rejecting async subscriber', async () => {
        const failed = vi.spyOn(learningLog, 'subscriberFailed');
        events.subscribe(async () => {
            throw new Error('async boom');
        });

        events.record({ eventType: 'goal_created', conceptId: null, text: 'SQL' });
        await vi.waitFor(() => expect(failed).toHaveBeenCalledWith('goal_created', 'async boom'));
    });

    it('should cap the history and drop the oldest entries', () => {
        const capped = new EventLogger({ maxHistorySize: 2, now: fixedNow });
        capped.record({ eventType: 'chat_input', conceptId: null, text: '1' });
        capped.record({ eventType: 'chat_input', conceptId: null, text: '2' });
        capped.record({ eventType: 'chat_input', conceptId: null, text: '3' });

        expect(capped.getHistory().map(e => e.text)).toEqual(['2', '3']);
    });

    it('should filter history by type and limit to the most recent', () => {
        events.record({ eventType: 'chat_input', conceptId: null, text: '1' });
        events.record({ eventType: 'chat_reply', conceptId: null, text: '2' });
        events.record({ eventType: 'chat_input', conceptId: null, text: '3' });

        expect(events.getHistory('chat_input').map(e => e.text)).toEqual(['1', '3']);
        expect(events.getHistory(undefined, 1).map(e => e.text)).toEqual(['3']);
    });

    it('should clear history and subscriptions', () => {
        const handler = vi.fn();
        events.subscribe(handler);
        events.record({ eventType: 'chat_input', conceptId: null, text: '1' });

        events.clearHistory();
        events.clearSubscriptions();
        events.record({ eventType: 'chat_input', conceptId: null, text: '2' });

        expect(handler).toHaveBeenCalledTimes(1);
        expect(events.getHistory().map(e => e.text)).toEqual(['2']);
    });
});
