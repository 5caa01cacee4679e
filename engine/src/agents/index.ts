import { LLMGateway } from '../gateway';
import { SimilarityStore } from '../similarity-store';
import { Agent } from '../scheduler';
import { ArchitectureAgent } from './architecture';
import { AgentContext } from './base';
import { CapabilityAgent } from './capability';
import { CodegenAgent } from './codegen';
import { ContractAgent } from './contract';
import { ContractGuardAgent } from './contract-guard';
import { DatabaseAgent } from './database';
import { DeploymentAgent } from './deployment';
import { EvaluationAgent } from './evaluation';
import { MemoryAgent } from './memory';
import { StackResolverAgent } from './stack-resolver';
import { TechTeamAgent } from './tech-team';
import { ValidateAgent } from './validate';
import { ValidationRouterAgent } from './validation-router';

export type { AgentContext } from './base';
export { LLMBackedAgent } from './base';
export { MemoryAgent } from './memory';
export { EvaluationAgent } from './evaluation';

export interface AgentOptions {
  perspectiveGateway?: LLMGateway;
  similarityStore?: SimilarityStore;
  similarityTopK?: number;
}

export interface AgentSet {
  all: Agent[];
  memory: MemoryAgent;
  evaluation: EvaluationAgent;
}

export function createAgents(context: AgentContext, options: AgentOptions = {}): AgentSet {
  const memory = new MemoryAgent(context, options.similarityStore, options.similarityTopK);
  const evaluation = new EvaluationAgent(context);

  return {
    all: [
      memory,
      new TechTeamAgent(context, options.perspectiveGateway),
      new StackResolverAgent(context),
      new CapabilityAgent(context),
      new ContractAgent(context),
      new ContractGuardAgent(context),
      new ArchitectureAgent(context),
      new CodegenAgent(context),
      new DatabaseAgent(context),
      new DeploymentAgent(context),
      new ValidateAgent(context),
      new ValidationRouterAgent(context),
      evaluation,
    ],
    memory,
    evaluation,
  };
}
