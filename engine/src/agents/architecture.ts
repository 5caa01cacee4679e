import { Architecture, ArchitectureSchema, SharedState, StateUpdate } from '@forgeloop/shared';
import { describeStack, LLMBackedAgent } from './base';

const SYSTEM_PROMPT = `Design a project architecture consistent with the chosen technologies. Return STRICT JSON only:
{
  "project_structure": {"src/": "main source", "config/": "configs", "tests/": "tests"},
  "key_components": ["ComponentA", "ComponentB"],
  "data_flow": "high level flow",
  "scalability_approach": "how it scales"
}`;

const FALLBACK: Architecture = {
  project_structure: { 'src/': 'main source', 'config/': 'config files', 'tests/': 'test files' },
  key_components: ['App', 'Database', 'API'],
  data_flow: 'Client -> API -> DB -> Response',
  scalability_approach: 'Horizontal scaling behind a load balancer',
};

export class ArchitectureAgent extends LLMBackedAgent {
  readonly id = 'architecture' as const;

  protected isReady(state: SharedState): boolean {
    return !state.architecture && !!state.tech_stack;
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const architecture = await this.llmJson(
      ArchitectureSchema,
      SYSTEM_PROMPT,
      `Project: ${state.prompt}\nChosen technologies:\n${describeStack(state)}\n` +
        `Complexity: ${state.analysis?.complexity ?? 'moderate'}`,
      FALLBACK
    );
    return { architecture };
  }
}
