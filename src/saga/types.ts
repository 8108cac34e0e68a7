import type { ErrorCode } from '../errors';

export type SagaState = 'started' | 'running' | 'completed' | 'failed' | 'compensated';

export type StepState = 'pending' | 'running' | 'completed' | 'failed' | 'compensated';

export type SagaId = string;
export type StepId = string;

/** Request record shared by every step of one instance. */
export type SagaData = Record<string, unknown>;

export type StepResult = { success: true; data?: unknown } | { success: false; error: Error };

export interface Step {
  readonly id: StepId;
  execute(data: SagaData, signal: AbortSignal): Promise<StepResult>;
  compensate(data: SagaData): Promise<void>;
}

export interface SagaDefinition {
  readonly name: string;
  readonly steps: readonly Step[];
  readonly timeoutMs: number;
}

export interface StepExecution {
  id: StepId;
  state: StepState;
  startedAt?: Date;
  completedAt?: Date;
  result?: unknown;
  error?: string;
}

export interface SagaError {
  stepId?: StepId;
  code: ErrorCode;
  message: string;
}

export interface SagaInstance {
  id: SagaId;
  definition: string;
  state: SagaState;
  data: SagaData;
  steps: StepExecution[];
  startedAt: Date;
  completedAt?: Date;
  error?: SagaError;
}

export type SagaEventType =
  | 'saga_started'
  | 'saga_completed'
  | 'saga_failed'
  | 'saga_compensated'
  | 'step_started'
  | 'step_completed'
  | 'step_failed'
  | 'step_compensated';

export interface SagaEvent {
  sagaId: SagaId;
  stepId?: StepId;
  type: SagaEventType;
  timestamp: Date;
  data?: unknown;
}

export const TERMINAL_SAGA_STATES: readonly SagaState[] = ['completed', 'compensated'];

export function isTerminalSagaState(state: SagaState): boolean {
  return TERMINAL_SAGA_STATES.includes(state);
}
