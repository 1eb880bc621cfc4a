/**
 * Prompt builders for the LLM-backed oracle.
 *
 * Each role gets a system prompt; user prompts carry the structured context
 * and the exact JSON shape the decoder in ./schemas expects.
 */

import type { Concept, Language, LearningPath, TestAnswers, TestQuestion, UserProfile } from '../types';

export const ARCHITECT_PROMPT = `You are the ARCHITECT of an adaptive tutoring system.
You turn a learner's goal into a SMART learning contract and an ordered path of concepts,
and you repair that path when the learner is missing a prerequisite.
Concept ids are short, stable and unique within the path. Bloom levels are integers 1-6.
Always answer with a single JSON object in the requested shape. Keys stay in English.`;

export const CURATOR_PROMPT = `You are the CURATOR of an adaptive tutoring system.
You write study material and comprehension tests for one concept at a time,
matched to the learner's style, complexity level and reading pace.
Tests target the concept's required Bloom level.`;

export const TUTOR_PROMPT = `You are the TUTOR of an adaptive tutoring system.
You answer the learner's questions warmly and precisely, notice frustration or confusion,
and when the learner reports a knowledge gap you ask which foundation is missing.`;

export const LANGUAGE_INSTRUCTIONS: Record<Language, string> = {
    de: `IMPORTANT - LANGUAGE: Always answer in German.
All explanations, feedback and materials are written in German.
JSON keys stay in English; every text value is in German.`,
    en: `IMPORTANT - LANGUAGE: Always answer in English.
All explanations, feedback and materials are written in English.
JSON keys stay in English; every text value is in English.`,
};

/**
 * System prompt with the learner's language instruction appended
 */
export function withLanguage(systemPrompt: string, language: Language): string {
    return `${systemPrompt}\n\n${LANGUAGE_INSTRUCTIONS[language]}`;
}

function profileContext(profile: UserProfile): string {
    return JSON.stringify({
        stylePreference: profile.stylePreference,
        complexityLevel: profile.complexityLevel,
        paceWPM: profile.paceWPM,
        lastTestScore: profile.lastTestScore,
        errorPatterns: profile.errorPatterns,
    });
}

function pathContext(path: LearningPath): string {
    return JSON.stringify(path.map(c => ({
        id: c.id,
        name: c.name,
        status: c.status,
        requiredBloomLevel: c.requiredBloomLevel,
    })));
}

export function goalPlanPrompt(goalText: string, profile: UserProfile): string {
    return `Create a SMART learning contract and the initial learning path for this goal: "${goalText}".
Learner profile: ${profileContext(profile)}

Respond with JSON:
{"goalContract": {"name": string, "subjectArea": string, "targetDate": "YYYY-MM-DD", "bloomLevel": 1-6, "successMetric": string},
 "path": [{"id": string, "name": string, "status": "open", "requiredBloomLevel": 1-6, "estimatedTime": minutes}]}`;
}

export function materialPrompt(concept: Concept, profile: UserProfile, failureFeedback?: string): string {
    const remedial = failureFeedback
        ? `\nThe learner failed the last test on this concept. Address this feedback directly: "${failureFeedback}"`
        : '';
    return `Write study material for the concept "${concept.name}" (Bloom level ${concept.requiredBloomLevel}).
Learner profile: ${profileContext(profile)}${remedial}
Use Markdown. End with a short list of external resources.`;
}

export function testPrompt(concept: Concept, profile: UserProfile, count: number): string {
    return `Write ${count} test questions for the concept "${concept.name}" at Bloom level ${concept.requiredBloomLevel}.
Learner profile: ${profileContext(profile)}

Respond with JSON:
{"questions": [{"id": "q1", "questionText": string, "type": "multiple_choice" | "free_text", "options": [string]}]}`;
}

export function evaluationPrompt(
    concept: Concept,
    questions: TestQuestion[],
    answers: TestAnswers,
    profile: UserProfile
): string {
    return `Grade the learner's answers on the concept "${concept.name}" (Bloom level ${concept.requiredBloomLevel}).
Questions: ${JSON.stringify(questions)}
Answers: ${JSON.stringify(answers)}
Learner profile: ${profileContext(profile)}

Respond with JSON:
{"score": 0-100, "feedback": string, "recommendation": string,
 "perQuestion": [{"id": string, "correct": boolean, "explanation": string}],
 "errorPatterns": [string]}`;
}

export function chatPrompt(concept: Concept, message: string, profile: UserProfile): string {
    return `The learner asks: "${message}". The current topic is "${concept.name}".
Learner profile: ${profileContext(profile)}
Respond empathetically and helpfully. Detect the learner's affect, and set gapDetected when the
learner is clearly missing a prerequisite for this topic.

Respond with JSON:
{"reply": string, "affect": string, "gapDetected": boolean}`;
}

export function diagnosisPrompt(concept: Concept, profile: UserProfile): string {
    return `The learner reported a knowledge gap while studying "${concept.name}".
Learner profile: ${profileContext(profile)}
Start the diagnosis: ask which foundational concept is missing and offer two or three likely candidates.`;
}

export function surgeryPrompt(missingConceptName: string, path: LearningPath, currentConcept: Concept | null): string {
    return `Perform path surgery. The missing foundation is: "${missingConceptName}".
Current path: ${pathContext(path)}
Current concept: ${currentConcept ? currentConcept.id : 'none'}
Create one new concept for the missing foundation with an id not used in the path.
List in "supersedes" the ids of skipped concepts that must be studied again because of this gap.

Respond with a short message for the learner followed by JSON:
{"message": string, "newConcept": {"id": string, "name": string, "status": "open", "requiredBloomLevel": 1-6},
 "supersedes": [string]}`;
}

export function assessmentPrompt(path: LearningPath, profile: UserProfile): string {
    return `Write a short prior-knowledge test that reveals which of these concepts the learner already masters.
Path: ${pathContext(path)}
Learner profile: ${profileContext(profile)}
Use question ids that start with the concept id, e.g. "K1-q1".

Respond with JSON:
{"questions": [{"id": string, "questionText": string, "type": "multiple_choice" | "free_text", "options": [string]}]}`;
}

export function assessmentEvaluationPrompt(path: LearningPath, questions: TestQuestion[], answers: TestAnswers): string {
    return `Evaluate the prior-knowledge test and list the concept ids the learner already masters.
Path: ${pathContext(path)}
Questions: ${JSON.stringify(questions)}
Answers: ${JSON.stringify(answers)}

Respond with JSON:
{"knownConceptIds": [string], "feedback": string}`;
}
