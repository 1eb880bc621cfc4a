/**
 * Transport envelope for run results
 */

import type { RunResult } from './phase-engine';

export type Envelope<T> =
    | { status: 'success'; data: T }
    | { status: 'error'; message: string };

export function toEnvelope(result: RunResult): Envelope<RunResult> {
    if (result.status === 'failed') {
        return { status: 'error', message: result.message };
    }
    return { status: 'success', data: result };
}
