import { EventEmitter } from 'eventemitter3';
import PQueue from 'p-queue';
import { createLogger, LogLevel } from '@toolrelay/logger';
import { BackoffPolicy, type BackoffOptions } from '../client/backoff';
import { isRetryable, toErrorInfo, type ErrorInfo } from '../errors';
import { createTask, type StepResult, type Task, type TaskInput, type TaskResult, type TaskStatus, type TaskStep } from '../types/task';
import type { CallOptions, ToolCallResult } from '../types/tools';

const log = createLogger('task-manager');

/** The slice of ToolClient the task manager depends on. */
export interface ToolInvoker {
  invoke(serverName: string, tool: string, args: Record<string, unknown>, options?: CallOptions): Promise<ToolCallResult>;
}

export interface TaskManagerOptions {
  /** Upper bound on in-flight steps of a parallel task when the task sets none. */
  maxConcurrency?: number;
  /** Retries per step for retryable failures when the step sets none. */
  defaultRetries?: number;
  /** Per-step deadline when the step sets none; falls back to the client's invocation timeout. */
  defaultTimeoutMs?: number;
  /** Delay between attempts of one step. */
  backoff?: BackoffOptions | BackoffPolicy;
}

export interface TaskManagerEvents {
  'step:start': (taskId: string, step: TaskStep, attempt: number) => void;
  'step:finish': (taskId: string, result: StepResult) => void;
  'task:finish': (result: TaskResult) => void;
}

const DEFAULT_MAX_CONCURRENCY = 4;
const DEFAULT_RETRIES = 1;

const toolErrorMessage = (step: TaskStep, result: ToolCallResult): string => {
  const text = result.content.find(item => item.type === 'text' && typeof item.text === 'string');
  return text && typeof text.text === 'string' ? text.text : `Tool "${step.tool}" on "${step.server}" reported an error`;
};

const summarize = (steps: StepResult[]): TaskStatus => {
  const failed = steps.some(step => step.status === 'failed');
  if (!failed) {
    return 'succeeded';
  }
  return steps.some(step => step.status === 'succeeded') ? 'partial' : 'failed';
};

/**
 * Runs multi-step tasks over a ToolInvoker.
 *
 * Sequential tasks stop at the first failed step and report the rest as
 * skipped. Parallel tasks run every step through a bounded queue; a failing
 * step never cancels its siblings. Step failures are reported in the
 * TaskResult, never thrown.
 */
export class TaskManager extends EventEmitter<TaskManagerEvents> {
  private readonly maxConcurrency: number;
  private readonly defaultRetries: number;
  private readonly defaultTimeoutMs: number | undefined;
  private readonly backoff: BackoffPolicy;

  constructor(
    private readonly invoker: ToolInvoker,
    options: TaskManagerOptions = {}
  ) {
    super();
    this.maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    this.defaultRetries = options.defaultRetries ?? DEFAULT_RETRIES;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.backoff = options.backoff instanceof BackoffPolicy ? options.backoff : new BackoffPolicy(options.backoff);
  }

  createTask(input: TaskInput): Task {
    return createTask(input);
  }

  async runTask(task: Task): Promise<TaskResult> {
    const timer = log.timer('runTask', { taskId: task.id, mode: task.mode, stepCount: task.steps.length });

    const steps = task.mode === 'sequential' ? await this.runSequential(task) : await this.runParallel(task);
    const status = summarize(steps);
    const firstFailure = steps.find(step => step.status === 'failed');

    const result: TaskResult = {
      taskId: task.id,
      mode: task.mode,
      status,
      steps,
      ...(firstFailure && { firstFailure }),
      durationMs: timer.stop(status === 'succeeded' ? LogLevel.INFO : LogLevel.WARN, { status }),
    };
    this.emit('task:finish', result);
    return result;
  }

  private async runSequential(task: Task): Promise<StepResult[]> {
    const results: StepResult[] = [];
    let halted = false;

    for (const [index, step] of task.steps.entries()) {
      if (halted) {
        results.push({
          stepId: step.id,
          index,
          server: step.server,
          tool: step.tool,
          status: 'skipped',
          attempts: 0,
          durationMs: 0,
        });
        continue;
      }

      const outcome = await this.executeStep(task, step, index);
      results.push(outcome);
      halted = outcome.status === 'failed';
    }

    return results;
  }

  private async runParallel(task: Task): Promise<StepResult[]> {
    const concurrency = task.maxConcurrency ?? this.maxConcurrency;
    const queue = new PQueue({ concurrency });
    const outcomes = new Array<StepResult>(task.steps.length);

    await Promise.all(
      task.steps.map((step, index) =>
        queue.add(async () => {
          outcomes[index] = await this.executeStep(task, step, index);
        })
      )
    );

    return outcomes;
  }

  private async executeStep(task: Task, step: TaskStep, index: number): Promise<StepResult> {
    const retries = step.retries ?? this.defaultRetries;
    const timeoutMs = step.timeoutMs ?? this.defaultTimeoutMs;
    const stepLog = log.withContext({ taskId: task.id, stepId: step.id, serverName: step.server, tool: step.tool });
    const started = performance.now();
    const base = { stepId: step.id, index, server: step.server, tool: step.tool };

    const finish = (fields: { status: 'succeeded' | 'failed'; attempts: number; result?: ToolCallResult; error?: ErrorInfo }): StepResult => {
      const outcome: StepResult = { ...base, ...fields, durationMs: Math.round(performance.now() - started) };
      this.emit('step:finish', task.id, outcome);
      return outcome;
    };

    for (let attempt = 1; ; attempt++) {
      this.emit('step:start', task.id, step, attempt);
      stepLog.debug('Running step', { attempt });

      try {
        const result = await this.invoker.invoke(step.server, step.tool, { ...step.args }, { timeoutMs });
        if (result.isError) {
          const error: ErrorInfo = { kind: 'tool_error', message: toolErrorMessage(step, result), retryable: false };
          stepLog.warn('Tool reported an error', undefined, { attempt });
          return finish({ status: 'failed', attempts: attempt, result, error });
        }
        return finish({ status: 'succeeded', attempts: attempt, result });
      } catch (error) {
        if (isRetryable(error) && attempt <= retries) {
          stepLog.warn('Step failed, retrying', error, { attempt, retries });
          await this.backoff.wait(attempt);
          continue;
        }
        stepLog.warn('Step failed', error, { attempt });
        return finish({ status: 'failed', attempts: attempt, error: toErrorInfo(error) });
      }
    }
  }
}
