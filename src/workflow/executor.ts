import type { SpanHandle } from '../services/telemetry';

export interface ExecutionContext {
    runId: string;
    span: SpanHandle;
}

/** One typed node of a workflow graph. */
export interface Executor<I, O> {
    readonly id: string;
    execute(input: I, ctx: ExecutionContext): Promise<O>;
}

export const defineExecutor = <I, O>(
    id: string,
    execute: (input: I, ctx: ExecutionContext) => Promise<O>
): Executor<I, O> => ({ id, execute });
