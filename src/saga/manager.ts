import { randomUUID } from 'crypto';
import { env } from '../env';
import { StreamError, TimeoutError, ValidationError, errorCodeOf, errorMessageOf } from '../errors';
import { log } from '../log';
import { incSagaEventsDropped, recordSagaOutcome } from '../metrics';
import { BoundedQueue } from '../queue/boundedQueue';
import {
  isTerminalSagaState,
  type SagaData,
  type SagaDefinition,
  type SagaEvent,
  type SagaEventType,
  type SagaId,
  type SagaInstance,
  type Step,
  type StepExecution,
  type StepId,
  type StepResult,
} from './types';

export interface SagaManagerOptions {
  eventQueueSize?: number;
  retentionMs?: number;
  sweepIntervalMs?: number;
  idFactory?: () => SagaId;
}

export interface WaitOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
}

const DEADLINE = Symbol('deadline');

function toError(error: unknown): Error {
  return error instanceof Error ? error : new StreamError(errorMessageOf(error));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function copyStep(step: StepExecution): StepExecution {
  return {
    ...step,
    ...(step.startedAt ? { startedAt: new Date(step.startedAt) } : {}),
    ...(step.completedAt ? { completedAt: new Date(step.completedAt) } : {}),
  };
}

function copyInstance(instance: SagaInstance): SagaInstance {
  return {
    ...instance,
    data: { ...instance.data },
    steps: instance.steps.map(copyStep),
    startedAt: new Date(instance.startedAt),
    ...(instance.completedAt ? { completedAt: new Date(instance.completedAt) } : {}),
    ...(instance.error ? { error: { ...instance.error } } : {}),
  };
}

/**
 * Runs registered step pipelines. Each `start` creates one instance that runs
 * detached from the caller; steps execute in order against the shared `data`
 * record, and a failure compensates the completed steps in reverse.
 *
 * The definition and instance maps are only mutated synchronously, so reads
 * through `get` never observe a half-applied transition.
 */
export class SagaManager {
  private readonly definitions = new Map<string, SagaDefinition>();
  private readonly instances = new Map<SagaId, SagaInstance>();
  private readonly eventQueue: BoundedQueue<SagaEvent>;
  private readonly retentionMs: number;
  private readonly idFactory: () => SagaId;
  private readonly sweepTimer: NodeJS.Timeout;

  constructor(options: SagaManagerOptions = {}) {
    this.eventQueue = new BoundedQueue(options.eventQueueSize ?? env.SAGA_EVENT_QUEUE_SIZE);
    this.retentionMs = options.retentionMs ?? env.SAGA_RETENTION_MS;
    this.idFactory = options.idFactory ?? randomUUID;

    const sweepIntervalMs = options.sweepIntervalMs ?? Math.min(this.retentionMs, 60_000);
    this.sweepTimer = setInterval(() => this.pruneTerminal(), sweepIntervalMs);
    this.sweepTimer.unref();
  }

  public registerDefinition(definition: SagaDefinition): void {
    if (definition.steps.length === 0) {
      throw new ValidationError(`saga ${definition.name} has no steps`);
    }
    const ids = new Set(definition.steps.map((step) => step.id));
    if (ids.size !== definition.steps.length) {
      throw new ValidationError(`saga ${definition.name} has duplicate step ids`);
    }
    if (!Number.isFinite(definition.timeoutMs) || definition.timeoutMs <= 0) {
      throw new ValidationError(`saga ${definition.name} needs a positive timeout`);
    }

    this.definitions.set(definition.name, definition);
    log.info(
      { event: 'saga_definition_registered', definition: definition.name, steps: [...ids] },
      'saga definition registered',
    );
  }

  /** Creates an instance and returns its id; execution continues in the background. */
  public start(name: string, data: SagaData): SagaId {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new ValidationError(`unknown saga definition: ${name}`);
    }

    const instance: SagaInstance = {
      id: this.idFactory(),
      definition: name,
      state: 'started',
      data: { ...data },
      steps: definition.steps.map((step) => ({ id: step.id, state: 'pending' })),
      startedAt: new Date(),
    };
    this.instances.set(instance.id, instance);
    this.emit(instance.id, 'saga_started');

    void this.run(instance, definition).catch((error: unknown) => {
      log.error({ err: error, event: 'saga_run_crashed', saga_id: instance.id }, 'saga run crashed');
    });

    return instance.id;
  }

  public get(id: SagaId): SagaInstance | undefined {
    const instance = this.instances.get(id);
    return instance ? copyInstance(instance) : undefined;
  }

  /**
   * Polls until the instance is terminal. The caller's timeout is independent
   * of the definition deadline; hitting it does not stop the instance.
   */
  public async waitForCompletion(id: SagaId, options: WaitOptions = {}): Promise<SagaInstance> {
    const timeoutMs = options.timeoutMs ?? env.SAGA_WAIT_TIMEOUT_MS;
    const pollIntervalMs = options.pollIntervalMs ?? env.SAGA_POLL_INTERVAL_MS;
    const deadline = Date.now() + timeoutMs;

    while (true) {
      const snapshot = this.get(id);
      if (!snapshot) {
        throw new ValidationError(`saga ${id} not found`);
      }
      if (isTerminalSagaState(snapshot.state)) {
        return snapshot;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError(`saga ${id} did not finish within ${timeoutMs}ms`);
      }
      await sleep(Math.min(pollIntervalMs, remaining));
    }
  }

  /** Next event from the bounded queue, or undefined once `signal` aborts. */
  public nextEvent(signal?: AbortSignal): Promise<SagaEvent | undefined> {
    return this.eventQueue.take(signal);
  }

  public size(): number {
    return this.instances.size;
  }

  public pruneTerminal(now: number = Date.now()): number {
    let pruned = 0;
    for (const [id, instance] of this.instances) {
      if (
        isTerminalSagaState(instance.state) &&
        instance.completedAt &&
        now - instance.completedAt.getTime() >= this.retentionMs
      ) {
        this.instances.delete(id);
        pruned += 1;
      }
    }
    return pruned;
  }

  public stop(): void {
    clearInterval(this.sweepTimer);
  }

  private async run(instance: SagaInstance, definition: SagaDefinition): Promise<void> {
    const controller = new AbortController();
    let expired = false;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof DEADLINE>((resolve) => {
      timer = setTimeout(() => {
        expired = true;
        resolve(DEADLINE);
      }, definition.timeoutMs);
    });

    instance.state = 'running';
    const completed: number[] = [];
    let failure: { index: number; error: Error } | undefined;

    try {
      for (let index = 0; index < definition.steps.length; index += 1) {
        const step = definition.steps[index];
        const execution = instance.steps[index];
        if (!step || !execution) {
          break;
        }

        execution.state = 'running';
        execution.startedAt = new Date();
        this.emit(instance.id, 'step_started', step.id);

        const outcome = expired
          ? DEADLINE
          : await Promise.race([this.executeStep(step, instance.data, controller.signal), deadline]);

        if (outcome === DEADLINE) {
          const error = new TimeoutError(
            `saga deadline of ${definition.timeoutMs}ms exceeded during ${step.id}`,
          );
          controller.abort(error);
          failure = { index, error };
          break;
        }

        if (!outcome.success) {
          failure = { index, error: outcome.error };
          break;
        }

        execution.state = 'completed';
        execution.completedAt = new Date();
        execution.result = outcome.data;
        completed.push(index);
        this.emit(instance.id, 'step_completed', step.id);
      }
    } finally {
      clearTimeout(timer);
    }

    if (!failure) {
      this.finish(instance, 'completed');
      this.emit(instance.id, 'saga_completed');
      log.info(
        { event: 'saga_completed', saga_id: instance.id, definition: instance.definition },
        'saga completed',
      );
      return;
    }

    const failedStep = definition.steps[failure.index];
    const failedExecution = instance.steps[failure.index];
    const stepId = failedStep?.id;
    if (failedExecution) {
      failedExecution.state = 'failed';
      failedExecution.completedAt = new Date();
      failedExecution.error = failure.error.message;
    }
    this.emit(instance.id, 'step_failed', stepId, { error: failure.error.message });

    instance.error = {
      stepId,
      code: errorCodeOf(failure.error),
      message: failure.error.message,
    };
    instance.state = 'failed';
    this.emit(instance.id, 'saga_failed', stepId, { error: failure.error.message });
    log.warn(
      {
        err: failure.error,
        event: 'saga_failed',
        saga_id: instance.id,
        definition: instance.definition,
        step_id: stepId,
        code: instance.error.code,
      },
      'saga failed',
    );

    await this.compensate(instance, definition, completed);

    this.finish(instance, 'compensated');
    this.emit(instance.id, 'saga_compensated');
  }

  private async executeStep(step: Step, data: SagaData, signal: AbortSignal): Promise<StepResult> {
    try {
      return await step.execute(data, signal);
    } catch (error) {
      return { success: false, error: toError(error) };
    }
  }

  private async compensate(instance: SagaInstance, definition: SagaDefinition, completed: number[]): Promise<void> {
    for (const index of [...completed].reverse()) {
      const step = definition.steps[index];
      const execution = instance.steps[index];
      if (!step || !execution) {
        continue;
      }

      try {
        await step.compensate(instance.data);
        execution.state = 'compensated';
        this.emit(instance.id, 'step_compensated', step.id);
      } catch (error) {
        log.error(
          { err: error, event: 'saga_compensation_failed', saga_id: instance.id, step_id: step.id },
          'saga compensation failed',
        );
      }
    }
  }

  private finish(instance: SagaInstance, state: 'completed' | 'compensated'): void {
    instance.state = state;
    instance.completedAt = new Date();
    recordSagaOutcome(
      instance.definition,
      state,
      instance.completedAt.getTime() - instance.startedAt.getTime(),
    );
  }

  private emit(sagaId: SagaId, type: SagaEventType, stepId?: StepId, data?: unknown): void {
    const event: SagaEvent = {
      sagaId,
      type,
      timestamp: new Date(),
      ...(stepId ? { stepId } : {}),
      ...(data === undefined ? {} : { data }),
    };

    if (!this.eventQueue.offer(event)) {
      incSagaEventsDropped();
      log.warn({ event: 'saga_event_dropped', saga_id: sagaId, type, step_id: stepId }, 'saga event dropped');
    }
  }
}
