import { Router, type Request, type Response } from 'express';
import Joi from 'joi';
import { ValidationError, asyncHandler } from '../middleware/errorHandler';
import type { ApiResponse } from '../types/api';
import type { BatchSummary, WorkflowResult } from '../types/workflow';
import type { FraudWorkflow } from '../workflow/fraudWorkflow';

export const MAX_BATCH_SIZE = 100;

const transactionIdSchema = Joi.string().trim().min(1).max(64);

const runSchema = Joi.object<{ transactionId: string }>({
    transactionId: transactionIdSchema.required()
});

const batchSchema = Joi.object<{ transactionIds: string[] }>({
    transactionIds: Joi.array().items(transactionIdSchema).min(1).max(MAX_BATCH_SIZE).required()
});

export const createWorkflowRouter = (workflow: FraudWorkflow): Router => {
    const router = Router();

    router.post('/run', asyncHandler(async (req: Request, res: Response) => {
        const validation = runSchema.validate(req.body);
        if (validation.error) {
            throw new ValidationError(`Invalid request data: ${validation.error.details[0].message}`);
        }

        const result = await workflow.runWorkflow(validation.value.transactionId);

        const response: ApiResponse<WorkflowResult> = {
            success: true,
            data: result,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    router.post('/batch', asyncHandler(async (req: Request, res: Response) => {
        const validation = batchSchema.validate(req.body);
        if (validation.error) {
            throw new ValidationError(`Invalid request data: ${validation.error.details[0].message}`);
        }

        const summary = await workflow.runBatch(validation.value.transactionIds);

        const response: ApiResponse<BatchSummary> = {
            success: true,
            data: summary,
            message: `Processed ${summary.total} transactions: ${summary.completed} completed, ${summary.failed} failed`,
            timestamp: new Date().toISOString()
        };
        res.json(response);
    }));

    return router;
};
