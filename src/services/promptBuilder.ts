import type { RiskAssessment } from '../types/risk';
import type { EnrichedContext } from '../types/transaction';
import type { RuleEvaluation } from './ruleEngineService';

const formatFlags = (context: EnrichedContext): string => {
    const flags = context.derivedFlags;
    return [
        `- High amount: ${flags.highAmount}`,
        `- High-risk destination: ${flags.highRiskCountry}`,
        `- Sanctioned destination: ${flags.sanctionedCountry}`,
        `- Cross-border: ${flags.crossBorder}`,
        `- New account: ${flags.newAccount}`,
        `- Low device trust: ${flags.lowDeviceTrust}`,
        `- Past fraud: ${flags.pastFraud}`,
        `- Amount vs customer average: ${flags.amountVsAverage.toFixed(2)}x`
    ].join('\n');
};

export const buildRiskPrompt = (context: EnrichedContext, evaluation: RuleEvaluation): string => {
    const { transaction, customer } = context;
    const triggered = evaluation.ruleResults.map(rule => `- ${rule.ruleName}: ${rule.reason}`).join('\n') || '- none';

    return `Assess the fraud and compliance risk of the transaction below.

Transaction ID: ${transaction.id}
Amount: ${transaction.amount} ${transaction.currency}
Destination country: ${transaction.destinationCountry}
Timestamp: ${transaction.timestamp}

Customer ID: ${customer.customerId}
Customer country: ${customer.country || 'unknown'}
Account age (days): ${customer.accountAgeDays ?? 'unknown'}
Device trust score: ${customer.deviceTrustScore ?? 'unknown'}
Previous fraud: ${customer.pastFraud}
Prior transactions on file: ${context.transactionHistory.length}
Prior transactions to this destination: ${context.destinationHistory.length}

Derived flags:
${formatFlags(context)}

Rule-based score: ${evaluation.baseScore}
Rule-based factors: ${evaluation.baseFactors.join(', ') || 'none'}
Triggered rules:
${triggered}

Respond with a short analysis. Include a line "Risk Score: <0-100>", a line "Risk Level: LOW|MEDIUM|HIGH",
the risk factors you consider present, and a final recommendation of approve, investigate or block.
State explicitly when a factor is absent.`;
};

export const buildAuditPrompt = (assessment: RiskAssessment): string =>
    `Write brief advisory notes for a compliance audit of this risk assessment.

Transaction ID: ${assessment.transactionId}
Risk score: ${assessment.score}
Risk level: ${assessment.level}
Recommendation: ${assessment.recommendation}
Risk factors: ${assessment.factors.join(', ') || 'none'}
Degraded analysis: ${assessment.degraded}

Risk narrative:
${assessment.narrative}

Focus on AML/KYC considerations and any regulatory reporting obligations. Keep it under 150 words.`;
