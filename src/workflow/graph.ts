import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { StageFailureError, errorMessage } from '../middleware/errorHandler';
import { Tracer } from '../services/telemetry';
import type { BranchResult } from '../types/workflow';
import type { Executor } from './executor';

export interface WorkflowDefinition<I, M, R, A, B> {
    source: Executor<I, M>;
    relay: Executor<M, R>;
    sinks: readonly [Executor<R, A>, Executor<R, B>];
}

export interface GraphRun<R, A, B> {
    runId: string;
    relayOutput: R;
    branches: [BranchResult<A>, BranchResult<B>];
}

const toBranchResult = <T>(stage: string, settled: PromiseSettledResult<T>): BranchResult<T> => {
    if (settled.status === 'fulfilled') {
        return { status: 'fulfilled', value: settled.value };
    }
    const reason: unknown = settled.reason;
    return {
        status: 'rejected',
        error: {
            stage,
            name: reason instanceof Error ? reason.name : 'Error',
            message: errorMessage(reason)
        }
    };
};

/**
 * source → relay → (sinkA ‖ sinkB). Source and relay failures abort the run
 * with a single StageFailureError and no sink starts. Sink failures are
 * captured per branch so one branch never discards the other's result.
 */
export class WorkflowGraph<I, M, R, A, B> {
    constructor(private readonly definition: WorkflowDefinition<I, M, R, A, B>) {}

    get stageIds(): string[] {
        const { source, relay, sinks } = this.definition;
        return [source.id, relay.id, sinks[0].id, sinks[1].id];
    }

    async run(input: I, tracer: Tracer = new Tracer()): Promise<GraphRun<R, A, B>> {
        const runId = uuidv4();
        const { source, relay, sinks } = this.definition;

        const intermediate = await this.runStage(source, input, runId, tracer, 'source');
        const relayOutput = await this.runStage(relay, intermediate, runId, tracer, 'relay');

        const [first, second] = sinks;
        const [firstSettled, secondSettled] = await Promise.allSettled([
            tracer.span(first.id, { runId, kind: 'sink' }, span => first.execute(relayOutput, { runId, span })),
            tracer.span(second.id, { runId, kind: 'sink' }, span => second.execute(relayOutput, { runId, span }))
        ]);

        const branches: [BranchResult<A>, BranchResult<B>] = [
            toBranchResult(first.id, firstSettled),
            toBranchResult(second.id, secondSettled)
        ];

        for (const branch of branches) {
            if (branch.status === 'rejected') {
                logger.error('Workflow branch failed', { runId, ...branch.error });
            }
        }

        return { runId, relayOutput, branches };
    }

    private async runStage<In, Out>(
        executor: Executor<In, Out>,
        input: In,
        runId: string,
        tracer: Tracer,
        kind: 'source' | 'relay'
    ): Promise<Out> {
        try {
            return await tracer.span(executor.id, { runId, kind }, span => executor.execute(input, { runId, span }));
        } catch (error) {
            logger.error('Workflow stage failed', { runId, stage: executor.id, error: errorMessage(error) });
            throw new StageFailureError(executor.id, error);
        }
    }
}
