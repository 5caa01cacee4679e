import { Capabilities, CapabilitiesSchema, SharedState, StateUpdate } from '@forgeloop/shared';
import { LLMBackedAgent } from './base';

const SYSTEM_PROMPT = `Extract capabilities from the product request. Return STRICT JSON only:
{
  "entities": ["User", "Project", "Task"],
  "features": ["CRUD", "assign", "status", "due_date", "labels", "comments"],
  "auth": true,
  "roles": ["admin", "manager", "member"],
  "non_functional": ["performance: medium", "security: standard"]
}
Only include capabilities that make sense for the request; keep it concise.`;

const FALLBACK: Capabilities = {
  entities: ['User', 'Project', 'Task'],
  features: ['CRUD'],
  auth: true,
  roles: ['admin', 'member'],
  non_functional: ['performance: medium', 'security: standard'],
};

export class CapabilityAgent extends LLMBackedAgent {
  readonly id = 'capabilities' as const;

  protected isReady(state: SharedState): boolean {
    return !state.capabilities;
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const capabilities = await this.llmJson(
      CapabilitiesSchema,
      SYSTEM_PROMPT,
      `REQUEST:\n${state.prompt}\n\nExisting hints: ${(state.experience_hints ?? []).join('; ') || 'none'}`,
      FALLBACK
    );
    return { capabilities };
  }
}
