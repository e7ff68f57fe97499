import Joi from 'joi';
import lexiconData from '../config/narrativeLexicon.json';
import { clampScore } from '../config/scoring';
import { RISK_FACTORS, mergeFactors, type RiskFactor } from '../types/risk';

export type NarrativeRiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type NarrativeScoreSource = 'EXPLICIT' | 'HEURISTIC';

export interface FactorRule {
    factor: RiskFactor;
    triggers: string[];
    negations: string[];
}

/** Occurrences of `phrases` inside a negating phrase do not count. */
export interface ScoreAdjustment {
    phrases: string[];
    negations: string[];
    floor?: number;
    ceiling?: number;
}

export interface NarrativeLexicon {
    factorRules: FactorRule[];
    signalFactors: RiskFactor[];
    baseline: number;
    signalWeight: number;
    adjustments: ScoreAdjustment[];
}

export interface ParsedNarrative {
    explicitScore: number | null;
    score: number;
    scoreSource: NarrativeScoreSource;
    riskLevel: NarrativeRiskLevel | null;
    referenceId: string | null;
    factors: RiskFactor[];
}

const riskFactorSchema = Joi.string().valid(...RISK_FACTORS);
const phraseList = Joi.array().items(Joi.string().lowercase().min(1)).default([]);

const lexiconSchema = Joi.object<NarrativeLexicon>({
    factorRules: Joi.array().items(Joi.object({
        factor: riskFactorSchema.required(),
        triggers: phraseList.min(1),
        negations: phraseList
    })).required(),
    signalFactors: Joi.array().items(riskFactorSchema).required(),
    baseline: Joi.number().min(0).max(100).required(),
    signalWeight: Joi.number().min(0).required(),
    adjustments: Joi.array().items(Joi.object({
        phrases: phraseList.min(1),
        negations: phraseList,
        floor: Joi.number().min(0).max(100),
        ceiling: Joi.number().min(0).max(100)
    }).xor('floor', 'ceiling')).required()
});

export const loadLexicon = (raw: unknown): NarrativeLexicon => {
    const validation = lexiconSchema.validate(raw);
    if (validation.error) {
        throw new Error(`Invalid narrative lexicon: ${validation.error.message}`);
    }
    return validation.value;
};

export const DEFAULT_LEXICON: NarrativeLexicon = loadLexicon(lexiconData);

const EXPLICIT_SCORE_PATTERN = /risk\s*score[:\s]*(\d+(?:\.\d+)?)/i;
const RISK_LEVEL_PATTERN = /risk\s*level\s*[:\s]\s*([a-z]+)/gi;
const LABELLED_REFERENCE_PATTERN = /\b(?:[Tt]ransaction|[Cc]ustomer)(?:\s+(?:ID|[Ii]d))?\s*[:#]\s*([A-Z0-9_-]*\d[A-Z0-9_-]*)\b/;
const REFERENCE_ID_PATTERN = /\b(?:TX|CUST)[A-Z0-9_-]*\d[A-Z0-9_-]*\b/;
const NARRATIVE_LEVELS: ReadonlyArray<NarrativeRiskLevel> = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

const escapeRegExp = (phrase: string): string => phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Anchored at a word start so "trusted device" does not fire inside "untrusted device".
const phrasePattern = (phrase: string, flags?: string): RegExp =>
    new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase)}`, flags);

const containsPhrase = (text: string, phrase: string): boolean => phrasePattern(phrase).test(text);

const maskPhrases = (text: string, phrases: ReadonlyArray<string>): string =>
    phrases.reduce((masked, phrase) => masked.replace(phrasePattern(phrase, 'g'), '$1 '), text);

const containsAny = (text: string, phrases: ReadonlyArray<string>): boolean =>
    phrases.some(phrase => containsPhrase(text, phrase));

/** A factor fires when a trigger is present and none of its negating phrases occur anywhere in the text. */
export const extractFactors = (text: string, lexicon: NarrativeLexicon = DEFAULT_LEXICON): RiskFactor[] => {
    const lower = text.toLowerCase();
    const found = lexicon.factorRules
        .filter(rule => containsAny(lower, rule.triggers) && !containsAny(lower, rule.negations))
        .map(rule => rule.factor);
    return mergeFactors(found);
};

const isNarrativeLevel = (value: string): value is NarrativeRiskLevel =>
    NARRATIVE_LEVELS.some(level => level === value);

export const extractRiskLevel = (text: string): NarrativeRiskLevel | null => {
    for (const match of text.matchAll(RISK_LEVEL_PATTERN)) {
        const level = match[1].toUpperCase();
        if (isNarrativeLevel(level)) {
            return level;
        }
    }
    return null;
};

/** Prefers a labelled `Transaction: X` or `Customer: X` id over a bare TX/CUST token. */
export const extractReferenceId = (text: string): string | null => {
    const labelled = LABELLED_REFERENCE_PATTERN.exec(text);
    if (labelled) {
        return labelled[1];
    }
    const bare = REFERENCE_ID_PATTERN.exec(text);
    return bare ? bare[0] : null;
};

export const extractExplicitScore = (text: string): number | null => {
    const match = EXPLICIT_SCORE_PATTERN.exec(text);
    return match ? Number.parseFloat(match[1]) : null;
};

export const heuristicScore = (
    text: string,
    factors: ReadonlyArray<RiskFactor>,
    lexicon: NarrativeLexicon = DEFAULT_LEXICON
): number => {
    const lower = text.toLowerCase();
    const signals = lexicon.signalFactors.filter(factor => factors.includes(factor)).length;
    let score = lexicon.baseline + signals * lexicon.signalWeight;

    // First matching adjustment wins; floors only raise, ceilings only lower.
    const adjustment = lexicon.adjustments.find(candidate =>
        containsAny(maskPhrases(lower, candidate.negations), candidate.phrases)
    );
    if (adjustment?.floor !== undefined) {
        score = Math.max(score, adjustment.floor);
    } else if (adjustment?.ceiling !== undefined) {
        score = Math.min(score, adjustment.ceiling);
    }

    return clampScore(score);
};

/**
 * Turns free-form risk prose into a score, level, reference id and factor set.
 * Pure: the same text and lexicon always give the same result, which keeps the
 * scoring and audit stages in agreement.
 */
export const parseNarrative = (text: string, lexicon: NarrativeLexicon = DEFAULT_LEXICON): ParsedNarrative => {
    const factors = extractFactors(text, lexicon);
    const explicitScore = extractExplicitScore(text);

    return {
        explicitScore,
        score: explicitScore !== null ? clampScore(explicitScore) : heuristicScore(text, factors, lexicon),
        scoreSource: explicitScore !== null ? 'EXPLICIT' : 'HEURISTIC',
        riskLevel: extractRiskLevel(text),
        referenceId: extractReferenceId(text),
        factors
    };
};
