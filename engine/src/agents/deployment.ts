import { DeploymentPlan, DeploymentPlanSchema, SharedState, StateUpdate } from '@forgeloop/shared';
import { describeStack, LLMBackedAgent } from './base';

const SYSTEM_PROMPT = `Create a deployment plan consistent with the stack. Return STRICT JSON only:
{"strategy": "...", "containers": {"service": "..."}, "environment": {"ENV": "value"}, "scaling": "..."}`;

const FALLBACK: DeploymentPlan = {
  strategy: 'Containers',
  containers: { app: 'main' },
  environment: { NODE_ENV: 'production' },
  scaling: 'horizontal',
};

export class DeploymentAgent extends LLMBackedAgent {
  readonly id = 'deployment' as const;

  protected isReady(state: SharedState): boolean {
    return !state.deployment && !!state.tech_stack;
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const deployment = await this.llmJson(
      DeploymentPlanSchema,
      SYSTEM_PROMPT,
      `Project: ${state.prompt}\nTech stack:\n${describeStack(state)}\n` +
        `Complexity: ${state.analysis?.complexity ?? 'moderate'}`,
      FALLBACK
    );
    return { deployment };
  }
}
