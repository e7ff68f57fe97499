import axios, { type AxiosInstance } from 'axios';
import Joi from 'joi';
import { logger } from '../config/logger';
import type { AppConfig } from '../config';
import { ExternalServiceError, errorMessage } from '../middleware/errorHandler';
import type { AlertDispatcher, CallOptions } from '../types/collaborators';
import type { AlertAck, AlertRecord } from '../types/report';

interface DispatchReply {
    accepted: boolean;
    reference?: string;
}

const replySchema = Joi.object<DispatchReply>({
    accepted: Joi.boolean().required(),
    reference: Joi.string()
}).unknown(true);

/** Wire format expected by the alerting endpoint. */
export const toAlertPayload = (alert: AlertRecord) => ({
    alert_id: alert.alertId,
    transaction_id: alert.transactionId,
    severity: alert.severity,
    status: alert.status,
    decision_action: alert.decisionAction,
    risk_score: alert.riskScore,
    risk_factors: alert.riskFactors,
    reasoning: alert.reasoning,
    assigned_to: alert.assignedTo,
    created_at: alert.createdAt
});

export class HttpAlertDispatcher implements AlertDispatcher {
    private readonly client: AxiosInstance;

    constructor(private readonly config: AppConfig['alerts']) {
        this.client = axios.create({
            baseURL: config.url,
            timeout: config.timeoutMs,
            headers: {
                'Content-Type': 'application/json',
                ...(config.apiKey ? { 'X-Api-Key': config.apiKey } : {})
            }
        });
    }

    async sendAlert(alert: AlertRecord, options: CallOptions = {}): Promise<AlertAck> {
        let data: unknown;
        try {
            const response = await this.client.post('/alerts', toAlertPayload(alert), { signal: options.signal });
            data = response.data;
        } catch (error) {
            logger.error('Error dispatching alert', {
                alertId: alert.alertId,
                error: errorMessage(error),
                url: this.config.url
            });
            throw new ExternalServiceError('alerts', `Alert dispatch failed: ${errorMessage(error)}`);
        }

        const validation = replySchema.validate(data);
        if (validation.error) {
            throw new ExternalServiceError('alerts', `Malformed dispatch reply: ${validation.error.message}`);
        }
        if (!validation.value.accepted) {
            throw new ExternalServiceError('alerts', `Alert ${alert.alertId} was rejected by the alerting endpoint`);
        }

        return { alertId: alert.alertId, accepted: true, reference: validation.value.reference };
    }
}
