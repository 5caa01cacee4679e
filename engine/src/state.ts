import {
  AgentId,
  Config,
  GeneratedCode,
  SharedState,
  StateUpdate,
  TechChoice,
  ValidationResult,
} from '@forgeloop/shared';

// Initial work queue; follow-up work is appended by the agents themselves
export const SEED_QUEUE: readonly AgentId[] = [
  'memory',
  'tech_team',
  'stack_resolver',
  'capabilities',
  'contract',
  'contract_guard',
  'architecture',
  'codegen',
  'database',
  'deployment',
  'validate',
  'validation_router',
];

export function createInitialState(
  prompt: string,
  config: Pick<
    Config,
    'validation_threshold' | 'max_codegen_iters' | 'require_valid_status' | 'file_contract_mode'
  >,
  queue: readonly AgentId[] = SEED_QUEUE
): SharedState {
  return {
    prompt,
    next_agents: [...queue],
    events: [],
    event_cursors: {},
    validation_threshold: config.validation_threshold,
    max_codegen_iters: config.max_codegen_iters,
    require_valid_status: config.require_valid_status,
    file_contract_mode: config.file_contract_mode,
  };
}

/**
 * Key-wise last-writer-wins merge. `next_agents` in the update is appended
 * to the remaining queue rather than replacing it.
 */
export function mergeUpdate(state: SharedState, update: StateUpdate): SharedState {
  const { next_agents: followUps, ...rest } = update;
  return {
    ...state,
    ...rest,
    next_agents: [...state.next_agents, ...(followUps ?? [])],
  };
}

export function techFor(state: SharedState, role: string): TechChoice | undefined {
  return (state.tech_stack ?? []).find((t) => t.role === role);
}

export function emptyCode(): GeneratedCode {
  return { files: {}, setup_instructions: [], run_commands: [], deployment_notes: [] };
}

/**
 * High-water mark of validation. The snapshot and the validation that
 * scored it are replaced together, and only by a strictly better score.
 */
export function recordBest(
  state: SharedState,
  validation: ValidationResult,
  code: GeneratedCode | undefined
): Pick<SharedState, 'best_validation_score' | 'best_generated_code' | 'best_validation'> {
  const best = state.best_validation_score ?? -1;
  if (validation.score > best) {
    return {
      best_validation_score: validation.score,
      best_generated_code: code ?? emptyCode(),
      best_validation: validation,
    };
  }
  return {
    best_validation_score: state.best_validation_score,
    best_generated_code: state.best_generated_code,
    best_validation: state.best_validation,
  };
}
