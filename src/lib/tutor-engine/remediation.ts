/**
 * Pathwise Tutor Engine - Remediation Protocol
 *
 * Path surgery for a learner-reported knowledge gap: a new concept for the
 * missing foundation goes in front of everything still open, superseded
 * skipped concepts are reactivated, and the concept that was being studied
 * drops back to open. The protocol only computes the new path; the engine
 * commits it.
 */

import type { Concept, LearningPath, UserProfile } from './types';
import type { ContentOracle, SurgeryPlan } from './oracle/types';
import type { EngineConfig } from './config';
import { ParseError } from './errors';
import { clonePath, nextOpen, uniqueConceptId, validate } from './path-model';
import { createLogger, type Logger } from '@/lib/debug';

export interface RemediationInput {
    missingConceptName: string;
    path: LearningPath;
    currentConcept: Concept | null;
    profile: UserProfile;
}

export interface RemediationOutcome {
    path: LearningPath;
    newConcept: Concept;
    message: string;
    reactivatedIds: string[];
    demotedConceptId: string | null;
    usedFallback: boolean;
    usedOraclePath: boolean;
}

export interface RemediationDeps {
    oracle: ContentOracle;
    config: EngineConfig['remediation'];
    now?: () => Date;
    logger?: Logger;
}

/**
 * Status of a prior concept after surgery: the active one drops back to
 * open, superseded skipped ones are reactivated
 */
function afterSurgery(concept: Concept, supersedes: Set<string>): Concept {
    if (concept.status === 'active') {
        return { ...concept, status: 'open' };
    }
    if (concept.status === 'skipped' && supersedes.has(concept.id)) {
        return { ...concept, status: 'reactivated' };
    }
    return { ...concept };
}

export class RemediationProtocol {
    private readonly oracle: ContentOracle;
    private readonly config: EngineConfig['remediation'];
    private readonly now: () => Date;
    private readonly logger: Logger;

    constructor(deps: RemediationDeps) {
        this.oracle = deps.oracle;
        this.config = deps.config;
        this.now = deps.now ?? (() => new Date());
        this.logger = deps.logger ?? createLogger('Remediation');
    }

    async apply(input: RemediationInput): Promise<RemediationOutcome> {
        const prior = input.path;
        const name = input.missingConceptName.trim();

        let plan: SurgeryPlan | null = null;
        try {
            plan = await this.oracle.performSurgery(name, clonePath(prior), input.currentConcept, input.profile);
        } catch (error) {
            if (!(error instanceof ParseError)) throw error;
            this.logger.warn('Surgery response unusable, using fallback concept', {
                type: 'engine',
                action: 'remediation_fallback',
                error: error.message,
            });
        }

        const newConcept = plan ? this.conceptFromPlan(plan, prior) : this.fallbackConcept(name, prior);
        const supersedes = new Set(plan ? plan.supersedes : []);

        const demotedConceptId = prior.find(c => c.status === 'active')?.id ?? null;
        const oracleOrder = plan ? this.acceptedOrder(plan, prior, newConcept, supersedes) : null;

        let path: LearningPath;
        if (oracleOrder) {
            const byId = new Map(prior.map(c => [c.id, c]));
            path = oracleOrder.map(id => {
                const concept = byId.get(id);
                return concept ? afterSurgery(concept, supersedes) : { ...newConcept };
            });
        } else {
            path = [{ ...newConcept }, ...prior.map(c => afterSurgery(c, supersedes))];
        }

        const priorStatus = new Map(prior.map(c => [c.id, c.status]));
        const reactivatedIds = path
            .filter(c => c.status === 'reactivated' && priorStatus.get(c.id) === 'skipped')
            .map(c => c.id);

        validate(path, prior);

        const message = plan
            ? plan.message ?? `"${newConcept.name}" was added to the start of your learning path.`
            : `Path surgery failed, so "${newConcept.name}" was added as a new first concept. Please retry if this is not the foundation you are missing.`;

        return {
            path,
            newConcept: { ...newConcept },
            message,
            reactivatedIds,
            demotedConceptId,
            usedFallback: plan === null,
            usedOraclePath: oracleOrder !== null,
        };
    }

    private fallbackConcept(name: string, prior: LearningPath): Concept {
        const unixSeconds = Math.floor(this.now().getTime() / 1000);
        return {
            id: uniqueConceptId(prior, `${this.config.fallbackIdPrefix}${unixSeconds}`),
            name: name || 'Missing foundation',
            status: 'open',
            expertiseSource: this.config.expertiseSource,
            requiredBloomLevel: this.config.requiredBloomLevel,
        };
    }

    private conceptFromPlan(plan: SurgeryPlan, prior: LearningPath): Concept {
        return {
            ...plan.newConcept,
            id: uniqueConceptId(prior, plan.newConcept.id),
            status: 'open',
            expertiseSource: plan.newConcept.expertiseSource ?? this.config.expertiseSource,
        };
    }

    /**
     * Concept order from the oracle's revised path, or null when it does not
     * hold exactly the prior concepts plus the new one, or would not put the
     * new concept first in traversal.
     */
    private acceptedOrder(
        plan: SurgeryPlan,
        prior: LearningPath,
        newConcept: Concept,
        supersedes: Set<string>
    ): string[] | null {
        if (!plan.path) return null;

        const order = plan.path.map(c => c.id);
        const expected = new Set([...prior.map(c => c.id), newConcept.id]);
        if (order.length !== expected.size || new Set(order).size !== order.length) return null;
        if (!order.every(id => expected.has(id))) return null;

        // Nothing traversable may precede the new concept once it is in place
        const byId = new Map(prior.map(c => [c.id, c]));
        const preview: LearningPath = order.map(id => {
            const concept = byId.get(id);
            return concept ? afterSurgery(concept, supersedes) : newConcept;
        });

        return nextOpen(preview, -1)?.id === newConcept.id ? order : null;
    }
}
