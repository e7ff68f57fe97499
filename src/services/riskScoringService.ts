import { logger } from '../config/logger';
import { levelForScore, recommendationForScore } from '../config/scoring';
import { TimeoutError, errorMessage } from '../middleware/errorHandler';
import type { ReasoningService } from '../types/collaborators';
import { mergeFactors, type DegradationReason, type RiskAssessment } from '../types/risk';
import type { EnrichedContext } from '../types/transaction';
import { withTimeout } from '../utils/timeout';
import { DEFAULT_LEXICON, parseNarrative, type NarrativeLexicon } from './narrativeParser';
import { buildRiskPrompt } from './promptBuilder';
import type { RuleEngineService, RuleEvaluation } from './ruleEngineService';

export interface RiskScoringOptions {
    reasoningTimeoutMs: number;
    lexicon?: NarrativeLexicon;
}

export const degradedNarrative = (
    context: EnrichedContext,
    evaluation: RuleEvaluation,
    reason: DegradationReason
): string => {
    const rules = evaluation.ruleResults.map(rule => rule.ruleName).join(', ') || 'none';
    const cause = reason === 'TIMEOUT' ? 'timed out' : 'was unavailable';
    return `Rule-based assessment for ${context.transaction.id}. Risk score: ${evaluation.baseScore}. `
        + `The reasoning service ${cause}, so narrative analysis was not performed. `
        + `Triggered rules: ${rules}.`;
};

/**
 * Combines the rule score with the reasoning service narrative. An explicit
 * score in the narrative replaces the rule score; without one the rule score
 * stands and the narrative only contributes factors.
 */
export class RiskScoringService {
    private readonly lexicon: NarrativeLexicon;

    constructor(
        private readonly ruleEngine: RuleEngineService,
        private readonly reasoning: ReasoningService,
        private readonly options: RiskScoringOptions
    ) {
        this.lexicon = options.lexicon ?? DEFAULT_LEXICON;
    }

    async assess(context: EnrichedContext): Promise<RiskAssessment> {
        const evaluation = this.ruleEngine.evaluate(context);
        const transactionId = context.transaction.id;
        const prompt = buildRiskPrompt(context, evaluation);

        let narrative: string;
        try {
            narrative = await withTimeout(
                'reasoning service',
                this.options.reasoningTimeoutMs,
                signal => this.reasoning.run(prompt, { signal })
            );
        } catch (error) {
            const reason: DegradationReason = error instanceof TimeoutError ? 'TIMEOUT' : 'SERVICE_ERROR';
            logger.warn('Reasoning service failed, falling back to rule-based score', {
                transactionId,
                reason,
                error: errorMessage(error)
            });
            return this.buildAssessment(transactionId, evaluation.baseScore, {
                factors: evaluation.baseFactors,
                narrative: degradedNarrative(context, evaluation, reason),
                baseScore: evaluation.baseScore,
                scoreSource: 'RULES',
                degraded: true,
                degradationReason: reason
            });
        }

        const parsed = parseNarrative(narrative, this.lexicon);
        const narrativeScored = parsed.scoreSource === 'EXPLICIT';
        const score = narrativeScored ? parsed.score : evaluation.baseScore;

        logger.debug('Narrative reconciled', {
            transactionId,
            baseScore: evaluation.baseScore,
            narrativeScore: parsed.explicitScore,
            finalScore: score
        });

        return this.buildAssessment(transactionId, score, {
            factors: mergeFactors(evaluation.baseFactors, parsed.factors),
            narrative,
            baseScore: evaluation.baseScore,
            scoreSource: narrativeScored ? 'NARRATIVE' : 'RULES',
            degraded: false
        });
    }

    private buildAssessment(
        transactionId: string,
        score: number,
        details: Pick<RiskAssessment, 'factors' | 'narrative' | 'baseScore' | 'scoreSource' | 'degraded' | 'degradationReason'>
    ): RiskAssessment {
        const assessment: RiskAssessment = {
            transactionId,
            score,
            level: levelForScore(score),
            factors: Object.freeze([...details.factors]),
            narrative: details.narrative,
            recommendation: recommendationForScore(score),
            baseScore: details.baseScore,
            scoreSource: details.scoreSource,
            degraded: details.degraded,
            ...(details.degradationReason ? { degradationReason: details.degradationReason } : {}),
            assessedAt: new Date().toISOString()
        };

        logger.info('Risk assessment completed', {
            transactionId,
            score: assessment.score,
            level: assessment.level,
            recommendation: assessment.recommendation,
            degraded: assessment.degraded
        });

        return Object.freeze(assessment);
    }
}
