/**
 * Content Oracle Factory
 * Picks the oracle implementation from the engine configuration
 */

import type { ContentOracle } from './types';
import type { EngineConfig } from '../config';
import { AnthropicContentOracle, type FetchFn } from './anthropic-oracle';
import { SimulatedContentOracle } from './simulated-oracle';
import { createLogger } from '@/lib/debug';

const logger = createLogger('ContentOracle');

export interface CreateOracleOptions {
    fetchFn?: FetchFn;
    now?: () => Date;
}

/**
 * Anthropic when a key is configured and LLM use is on, simulated otherwise
 */
export function createContentOracle(config: EngineConfig, options: CreateOracleOptions = {}): ContentOracle {
    const { oracle } = config;

    if (oracle.provider === 'anthropic' && oracle.useLLM && oracle.apiKey) {
        logger.info('Using Anthropic oracle', { type: 'oracle', model: oracle.model });
        return new AnthropicContentOracle({
            apiKey: oracle.apiKey,
            model: oracle.model,
            maxTokens: oracle.maxTokens,
            temperature: oracle.temperature,
            passThreshold: config.tests.passThreshold,
            fetchFn: options.fetchFn,
        });
    }

    logger.info('Using simulated oracle (no LLM configured)', { type: 'oracle' });
    return new SimulatedContentOracle({
        passThreshold: config.tests.passThreshold,
        now: options.now,
    });
}

export { AnthropicContentOracle } from './anthropic-oracle';
export { SimulatedContentOracle } from './simulated-oracle';
export * from './schemas';
export type { ContentOracle, GoalPlan, ChatReply, SurgeryPlan, AssessmentResult } from './types';
export type { FetchFn, AnthropicOracleOptions } from './anthropic-oracle';
