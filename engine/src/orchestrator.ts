import * as path from 'path';
import { Config, OrchestratorEvent, SharedState, ValidationResult } from '@forgeloop/shared';
import { AgentSet, createAgents } from './agents';
import { LLMGateway, ProviderGateway } from './gateway';
import { createProvider } from './llm-providers';
import { Scheduler } from './scheduler';
import { JsonSimilarityStore, SimilarityStore } from './similarity-store';
import { createInitialState, emptyCode, mergeUpdate } from './state';

export interface OrchestratorDeps {
  gateway?: LLMGateway;
  perspectiveGateway?: LLMGateway;
  similarityStore?: SimilarityStore;
}

const NO_CODE_VALIDATION: ValidationResult = {
  status: 'no_code',
  score: 0,
  issues: ['The run ended before any code was validated'],
  suggestions: [],
  missing_files: [],
  missing_endpoints: [],
  missing_baseline: [],
};

/**
 * Runs one prompt through the agent pipeline and returns the final
 * blackboard, with the best generated code in `generated_code`.
 */
export class Orchestrator {
  private agents: AgentSet;

  constructor(
    private config: Config,
    private workspaceRoot: string,
    private eventCallback: (event: OrchestratorEvent) => void,
    deps: OrchestratorDeps = {}
  ) {
    const gateway =
      deps.gateway ??
      new ProviderGateway(createProvider(config.provider, config.model), config.llm_timeout_ms, eventCallback);

    // Perspectives may run on their own (cheaper) provider
    let perspectiveGateway = deps.perspectiveGateway;
    if (!perspectiveGateway && config.perspective_provider) {
      perspectiveGateway = new ProviderGateway(
        createProvider(config.perspective_provider, config.perspective_model ?? config.model),
        config.llm_timeout_ms,
        eventCallback
      );
    }

    const similarityStore =
      deps.similarityStore ??
      (config.similarity_store
        ? new JsonSimilarityStore(path.resolve(workspaceRoot, config.similarity_store))
        : undefined);

    this.agents = createAgents(
      { gateway, emit: (event) => this.emit(event) },
      { perspectiveGateway, similarityStore, similarityTopK: config.similarity_top_k }
    );
  }

  private emit(event: OrchestratorEvent) {
    this.eventCallback(event);
  }

  async runPipeline(prompt: string): Promise<SharedState> {
    this.emit({ type: 'status', message: `Starting pipeline in ${this.workspaceRoot}` });

    const scheduler = new Scheduler(this.agents.all, this.config.max_steps, this.eventCallback);
    const result = await scheduler.run(createInitialState(prompt, this.config));
    let state = result.state;

    // The loop halts on goal_reached, so evaluation and learning run here
    const { evaluation, memory } = this.agents;
    if (evaluation.canRun(state)) {
      try {
        state = mergeUpdate(state, await evaluation.run(structuredClone(state)));
      } catch (err) {
        this.emit({
          type: 'agent_failed',
          agent: evaluation.id,
          step: result.steps,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    if (state.evaluation) {
      await memory.learnFromOutcome(prompt, state.tech_stack ?? [], state.evaluation.overall_score);
    }

    const final: SharedState = {
      ...state,
      generated_code: state.best_generated_code ?? state.generated_code ?? emptyCode(),
      validation: state.best_validation ?? state.validation ?? NO_CODE_VALIDATION,
    };

    this.emit({
      type: 'pipeline_complete',
      reason: result.reason,
      steps: result.steps,
      score: final.best_validation_score ?? final.validation?.score ?? 0,
      files: Object.keys(final.generated_code?.files ?? {}).length,
    });

    return final;
  }
}
