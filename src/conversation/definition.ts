import { env } from '../env';
import type { SagaDefinition } from '../saga/types';
import { createConversationSteps, type ConversationStepDeps } from './steps';

export const CONVERSATION_SAGA = 'conversation_processing';

export function createConversationDefinition(
  deps: ConversationStepDeps,
  timeoutMs: number = env.SAGA_TIMEOUT_MS,
): SagaDefinition {
  return {
    name: CONVERSATION_SAGA,
    steps: createConversationSteps(deps),
    timeoutMs,
  };
}
