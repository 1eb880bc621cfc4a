/**
 * Pathwise Tutor Engine - Configuration
 *
 * Defaults live in DEFAULT_ENGINE_CONFIG; loadEngineConfig() overlays
 * whatever the environment provides.
 */

import type { BloomLevel, Language } from './types';
import { LANGUAGES } from './types';

export interface EngineConfig {
    // Loop guard
    maxSteps: number;                        // Default: 50

    // Comprehension tests
    tests: {
        questionCount: number;               // Default: 3
        passThreshold: number;               // Default: 70 (passed = score > threshold)
    };

    // Path surgery
    remediation: {
        fallbackIdPrefix: string;            // Default: "N-"
        expertiseSource: string;             // Default: "remediation"
        requiredBloomLevel: BloomLevel;      // Default: 1
    };

    // Content oracle
    oracle: {
        useLLM: boolean;                     // Default: true (needs an API key)
        provider: 'anthropic' | 'simulated';
        apiKey: string | null;
        model: string;
        maxTokens: number;                   // Default: 2048
        temperature: number;                 // Default: 0.7
    };

    // Persistence
    store: {
        databasePath: string | null;         // null = in-memory store
    };

    // Default learner profile for new sessions
    defaultProfile: {
        language: Language;                  // Default: "en"
        stylePreference: string;
        complexityLevel: number;
        paceWPM: number;
    };
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
    maxSteps: 50,
    tests: {
        questionCount: 3,
        passThreshold: 70,
    },
    remediation: {
        fallbackIdPrefix: 'N-',
        expertiseSource: 'remediation',
        requiredBloomLevel: 1,
    },
    oracle: {
        useLLM: true,
        provider: 'anthropic',
        apiKey: null,
        model: 'claude-3-haiku-20240307',
        maxTokens: 2048,
        temperature: 0.7,
    },
    store: {
        databasePath: null,
    },
    defaultProfile: {
        language: 'en',
        stylePreference: 'analogy-based',
        complexityLevel: 3,
        paceWPM: 180,
    },
};

type Env = Record<string, string | undefined>;

function readInt(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) return fallback;
    return value.toLowerCase() === 'true' || value === '1';
}

function readLanguage(value: string | undefined, fallback: Language): Language {
    const code = value?.trim().toLowerCase();
    return LANGUAGES.find(language => language === code) ?? fallback;
}

/**
 * Build the engine configuration from environment variables
 */
export function loadEngineConfig(
    env: Env = process.env,
    base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
    const apiKey = env.ANTHROPIC_API_KEY || null;
    const useLLM = readBool(env.TUTOR_USE_LLM, base.oracle.useLLM);

    return {
        ...base,
        maxSteps: Math.max(1, readInt(env.TUTOR_MAX_STEPS, base.maxSteps)),
        tests: {
            questionCount: Math.max(1, readInt(env.TUTOR_TEST_QUESTIONS, base.tests.questionCount)),
            passThreshold: readInt(env.TUTOR_PASS_THRESHOLD, base.tests.passThreshold),
        },
        remediation: { ...base.remediation },
        oracle: {
            ...base.oracle,
            useLLM,
            provider: apiKey && useLLM ? 'anthropic' : 'simulated',
            apiKey,
            model: env.TUTOR_LLM_MODEL || base.oracle.model,
            maxTokens: readInt(env.TUTOR_LLM_MAX_TOKENS, base.oracle.maxTokens),
        },
        store: {
            databasePath: env.DATABASE_PATH || base.store.databasePath,
        },
        defaultProfile: {
            ...base.defaultProfile,
            language: readLanguage(env.TUTOR_LANGUAGE, base.defaultProfile.language),
        },
    };
}
