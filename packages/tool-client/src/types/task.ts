import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { InvalidTaskError, type ErrorInfo } from '../errors';
import { deepFreeze, formatIssues } from '../utils';
import type { ToolCallResult } from './tools';

export const TaskModeSchema = z.enum(['sequential', 'parallel']);
export type TaskMode = z.infer<typeof TaskModeSchema>;

export const TaskStepSchema = z.object({
  id: z.string().min(1).optional(),
  server: z.string().min(1),
  tool: z.string().min(1),
  args: z.record(z.unknown()).default({}),
  timeoutMs: z.number().int().positive().optional(),
  retries: z.number().int().min(0).max(10).optional(),
});

export const TaskInputSchema = z.object({
  id: z.string().min(1).optional(),
  mode: TaskModeSchema,
  steps: z.array(TaskStepSchema).min(1, 'a task needs at least one step'),
  maxConcurrency: z.number().int().positive().optional(),
});

export type TaskStepInput = z.input<typeof TaskStepSchema>;
export type TaskInput = z.input<typeof TaskInputSchema>;

export interface TaskStep {
  readonly id: string;
  readonly server: string;
  readonly tool: string;
  readonly args: Readonly<Record<string, unknown>>;
  readonly timeoutMs?: number;
  readonly retries?: number;
}

export interface Task {
  readonly id: string;
  readonly mode: TaskMode;
  readonly steps: readonly TaskStep[];
  readonly maxConcurrency?: number;
}

export type StepStatus = 'succeeded' | 'failed' | 'skipped';
export type TaskStatus = 'succeeded' | 'failed' | 'partial';

export interface StepResult {
  stepId: string;
  index: number;
  server: string;
  tool: string;
  status: StepStatus;
  attempts: number;
  durationMs: number;
  result?: ToolCallResult;
  error?: ErrorInfo;
}

export interface TaskResult {
  taskId: string;
  mode: TaskMode;
  status: TaskStatus;
  steps: StepResult[];
  firstFailure?: StepResult;
  durationMs: number;
}

/**
 * Validate a task description and return an immutable Task.
 * Step ids default to `step-<n>` (1-based) and the task id to a random uuid.
 */
export function createTask(input: TaskInput): Task {
  const parsed = TaskInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidTaskError(formatIssues(parsed.error));
  }

  const stepIds = new Set<string>();
  const steps = parsed.data.steps.map((step, index): TaskStep => {
    const id = step.id ?? `step-${index + 1}`;
    if (stepIds.has(id)) {
      throw new InvalidTaskError([`steps.${index}.id: duplicate step id "${id}"`]);
    }
    stepIds.add(id);
    return {
      id,
      server: step.server,
      tool: step.tool,
      args: structuredClone(step.args),
      ...(step.timeoutMs !== undefined && { timeoutMs: step.timeoutMs }),
      ...(step.retries !== undefined && { retries: step.retries }),
    };
  });

  return deepFreeze({
    id: parsed.data.id ?? uuidv4(),
    mode: parsed.data.mode,
    steps,
    ...(parsed.data.maxConcurrency !== undefined && { maxConcurrency: parsed.data.maxConcurrency }),
  });
}
