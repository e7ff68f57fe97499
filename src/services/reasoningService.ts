import axios, { type AxiosInstance } from 'axios';
import Joi from 'joi';
import { logger } from '../config/logger';
import type { AppConfig } from '../config';
import { ExternalServiceError, errorMessage } from '../middleware/errorHandler';
import type { CallOptions, ReasoningService } from '../types/collaborators';

interface ReasoningReply {
    success: boolean;
    text?: string;
    error?: string;
}

const replySchema = Joi.object<ReasoningReply>({
    success: Joi.boolean().required(),
    text: Joi.string().allow(''),
    error: Joi.string().allow('')
}).unknown(true);

/** Reasoning backend reached over HTTP: `POST {url}/run` with `{ prompt }`. */
export class HttpReasoningService implements ReasoningService {
    private readonly client: AxiosInstance;

    constructor(private readonly config: AppConfig['reasoning']) {
        this.client = axios.create({
            baseURL: config.url,
            timeout: config.timeoutMs,
            headers: {
                'Content-Type': 'application/json',
                ...(config.apiKey ? { 'X-Api-Key': config.apiKey } : {})
            }
        });
    }

    async run(prompt: string, options: CallOptions = {}): Promise<string> {
        let data: unknown;
        try {
            const response = await this.client.post('/run', { prompt }, { signal: options.signal });
            data = response.data;
        } catch (error) {
            logger.error('Error calling reasoning service', {
                error: errorMessage(error),
                url: this.config.url
            });
            throw new ExternalServiceError('reasoning', `Reasoning service request failed: ${errorMessage(error)}`);
        }

        const validation = replySchema.validate(data);
        if (validation.error) {
            throw new ExternalServiceError('reasoning', `Malformed reasoning reply: ${validation.error.message}`);
        }
        if (!validation.value.success || validation.value.text === undefined) {
            logger.warn('Reasoning service reported failure', { error: validation.value.error });
            throw new ExternalServiceError('reasoning', validation.value.error || 'Reasoning service returned no text');
        }

        logger.debug('Reasoning narrative received', { length: validation.value.text.length });
        return validation.value.text;
    }

    async healthCheck(): Promise<boolean> {
        try {
            const response = await this.client.get('/health', { timeout: 2000 });
            return response.status === 200;
        } catch (error) {
            logger.warn('Reasoning service health check failed', { error: errorMessage(error) });
            return false;
        }
    }
}
