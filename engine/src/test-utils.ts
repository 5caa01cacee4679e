import { Config, ConfigSchema, OrchestratorEvent, SharedState } from '@forgeloop/shared';
import { LLMGateway, StructuredResponse } from './gateway';
import { createInitialState } from './state';

type Reply = StructuredResponse | null | ((call: number) => StructuredResponse | null);

/**
 * In-process gateway. Replies are keyed by caller id; callers without a
 * scripted reply get null, which sends the agent to its fallback.
 */
export class StubGateway implements LLMGateway {
  readonly calls: Array<{ caller: string; systemPrompt: string; userPrompt: string }> = [];
  private counts = new Map<string, number>();

  constructor(private replies: Record<string, Reply> = {}) {}

  async extractStructured(
    systemPrompt: string,
    userPrompt: string,
    caller = 'llm'
  ): Promise<StructuredResponse | null> {
    this.calls.push({ caller, systemPrompt, userPrompt });
    const count = (this.counts.get(caller) ?? 0) + 1;
    this.counts.set(caller, count);

    const reply = this.replies[caller];
    if (typeof reply === 'function') {
      return reply(count);
    }
    return reply ?? null;
  }

  callsFor(caller: string): number {
    return this.counts.get(caller) ?? 0;
  }
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return { ...ConfigSchema.parse({}), ...overrides };
}

export function testState(overrides: Partial<SharedState> = {}): SharedState {
  return { ...createInitialState('build a task tracker', testConfig(), []), ...overrides };
}

export function collectEvents(): { events: OrchestratorEvent[]; emit: (event: OrchestratorEvent) => void } {
  const events: OrchestratorEvent[] = [];
  return { events, emit: (event) => events.push(event) };
}
