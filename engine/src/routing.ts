import {
  AgentId,
  ContractMode,
  IterationReason,
  RouteDecision,
  SharedState,
  StateUpdate,
  ValidationResult,
} from '@forgeloop/shared';
import { isContractEmpty } from './contract';
import { appendEvents, event } from './events';

export interface RouteInput {
  validation: ValidationResult;
  threshold: number;
  requireValidStatus: boolean;
  /** Completed codegen+validate cycles. */
  iteration: number;
  maxIterations: number;
  contractEmpty: boolean;
  missingBaseline: string[];
  mode: ContractMode;
}

const MODE_RANK: Record<ContractMode, number> = { free: 0, guided: 1, strict: 2 };

/** The stricter of two modes. */
export function ratchetMode(current: ContractMode, proposed: ContractMode): ContractMode {
  return MODE_RANK[proposed] > MODE_RANK[current] ? proposed : current;
}

/** Guided runs that leave contract gaps are judged strictly from then on. */
export function escalateMode(mode: ContractMode, validation: ValidationResult): ContractMode {
  const gaps = validation.missing_files.length + validation.missing_endpoints.length;
  return mode === 'guided' && gaps > 0 ? 'strict' : mode;
}

export function routeInputFrom(state: SharedState): RouteInput | null {
  if (!state.validation) return null;
  return {
    validation: state.validation,
    threshold: state.validation_threshold,
    requireValidStatus: state.require_valid_status,
    iteration: state.last_validated_iter ?? 0,
    maxIterations: state.max_codegen_iters,
    contractEmpty: state.contract_empty ?? isContractEmpty(state.contract),
    missingBaseline: state.missing_baseline ?? state.validation.missing_baseline,
    mode: state.file_contract_mode,
  };
}

/**
 * Pure transition of the refinement loop, in priority order: accept,
 * stop at the budget, fix structure, retry empty output, refine quality.
 */
export function routeValidation(input: RouteInput): RouteDecision {
  const { validation, iteration } = input;
  const score = validation.score;

  if (score >= input.threshold && (!input.requireValidStatus || validation.status === 'valid')) {
    return { kind: 'succeeded', score, iteration };
  }

  if (iteration >= input.maxIterations) {
    return { kind: 'budget_exhausted', score, iteration };
  }

  let reason: IterationReason;
  if (input.contractEmpty) {
    reason = 'contract_missing';
  } else if (input.missingBaseline.length > 0) {
    reason = 'baseline_missing';
  } else if (validation.status === 'no_code') {
    reason = 'no_code';
  } else {
    reason = 'quality_improvement';
  }

  return {
    kind: 'iterating',
    reason,
    structural: reason === 'contract_missing' || reason === 'baseline_missing',
    score,
    iteration,
    mode: escalateMode(input.mode, validation),
  };
}

const STRUCTURAL_CHAIN: AgentId[] = ['memory', 'contract', 'codegen', 'validate', 'validation_router'];
const REFINE_CHAIN: AgentId[] = ['memory', 'codegen', 'validate', 'validation_router'];

/**
 * State update for a routing decision.
 */
export function applyRoute(state: SharedState, input: RouteInput, decision: RouteDecision): StateUpdate {
  const base: StateUpdate = { routed_after_iter: decision.iteration };

  switch (decision.kind) {
    case 'succeeded':
      return { ...base, goal_reached: true };

    case 'budget_exhausted':
      return { ...base, goal_reached: true, budget_exhausted: true };

    case 'iterating': {
      const meta: Record<string, unknown> = {
        reason: decision.reason,
        iteration: decision.iteration + 1,
      };
      if (decision.reason === 'baseline_missing') {
        meta.missing_items = input.missingBaseline;
      }
      if (decision.reason === 'quality_improvement') {
        meta.score = decision.score;
        meta.threshold = input.threshold;
      }

      const update: StateUpdate = {
        ...base,
        redo_codegen: true,
        file_contract_mode: ratchetMode(state.file_contract_mode, decision.mode),
        next_agents: decision.structural ? STRUCTURAL_CHAIN : REFINE_CHAIN,
        events: appendEvents(state, event('refinement_triggered', meta)),
      };
      if (decision.structural) {
        update.redo_contract = true;
      }
      return update;
    }
  }
}
