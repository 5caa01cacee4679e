import { z } from 'zod';
import { AgentId, OrchestratorEvent, SharedState, StateUpdate } from '@forgeloop/shared';
import { LLMGateway } from '../gateway';
import { Agent } from '../scheduler';

export interface AgentContext {
  gateway: LLMGateway;
  emit: (event: OrchestratorEvent) => void;
}

/**
 * Common shape of the pipeline agents: a global kill-switch on
 * `goal_reached`, the agent's own precondition, and schema-checked model
 * calls that fall back to a static value.
 */
export abstract class LLMBackedAgent implements Agent {
  abstract readonly id: AgentId;

  constructor(protected context: AgentContext) {}

  canRun(state: SharedState): boolean {
    if (state.goal_reached) {
      return false;
    }
    return this.isReady(state);
  }

  protected abstract isReady(state: SharedState): boolean;

  abstract run(state: SharedState): Promise<StateUpdate>;

  /**
   * Ask the model for a JSON object matching `schema`. Missing keys are
   * filled from the fallback; anything that still fails validation yields
   * the fallback itself.
   */
  protected async llmJson<S extends z.ZodTypeAny>(
    schema: S,
    systemPrompt: string,
    userPrompt: string,
    fallback: z.infer<S>,
    caller: string = this.id
  ): Promise<z.infer<S>> {
    const response = await this.context.gateway.extractStructured(systemPrompt, userPrompt, caller);
    if (!response) {
      return fallback;
    }

    const base: unknown = fallback;
    const candidate = isRecord(base) ? { ...base, ...response } : response;
    const parsed = schema.safeParse(candidate);
    if (!parsed.success) {
      this.context.emit({
        type: 'llm_fallback',
        caller,
        error: `response did not match schema: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      });
      return fallback;
    }
    return parsed.data;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** One-line rendering of a stack for prompts. */
export function describeStack(state: SharedState): string {
  const stack = state.tech_stack ?? [];
  if (stack.length === 0) return '(none chosen)';
  return stack.map((t) => `- ${t.role}: ${t.name}${t.reasoning ? ` (${t.reasoning})` : ''}`).join('\n');
}
