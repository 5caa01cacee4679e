import {
  AgentId,
  OrchestratorEvent,
  SharedState,
  StateUpdate,
  StopReason,
} from '@forgeloop/shared';
import { mergeUpdate } from './state';

export interface Agent {
  readonly id: AgentId;
  /** Pure function of the state; may be called any number of times. */
  canRun(state: SharedState): boolean;
  run(state: SharedState): Promise<StateUpdate>;
}

export interface SchedulerResult {
  state: SharedState;
  steps: number;
  reason: StopReason;
}

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Reactive work-queue loop. Pops one agent id at a time, runs it when it is
 * eligible and merges its update into the blackboard. Halts when the queue
 * drains, the step cap is hit, or an agent reports goal_reached.
 */
export class Scheduler {
  private registry = new Map<AgentId, Agent>();

  constructor(
    agents: Agent[],
    private maxSteps: number,
    private eventCallback: (event: OrchestratorEvent) => void = () => undefined
  ) {
    for (const agent of agents) {
      this.registry.set(agent.id, agent);
    }
  }

  private emit(event: OrchestratorEvent) {
    this.eventCallback(event);
  }

  async run(initial: SharedState): Promise<SchedulerResult> {
    let state: SharedState = { ...initial, next_agents: [...initial.next_agents] };
    let steps = 0;

    while (state.next_agents.length > 0 && steps < this.maxSteps && !state.goal_reached) {
      steps++;
      const [agentId, ...remaining] = state.next_agents;
      state = { ...state, next_agents: remaining };

      const agent = this.registry.get(agentId);
      if (!agent) {
        this.emit({ type: 'agent_skipped', agent: agentId, step: steps, reason: 'unknown_agent' });
        continue;
      }

      let eligible: boolean;
      try {
        eligible = agent.canRun(state);
      } catch (err) {
        this.emit({
          type: 'agent_skipped',
          agent: agentId,
          step: steps,
          reason: 'eligibility_failed',
          error: errorMessage(err),
        });
        continue;
      }

      if (!eligible) {
        this.emit({ type: 'agent_skipped', agent: agentId, step: steps, reason: 'ineligible' });
        continue;
      }

      this.emit({ type: 'agent_started', agent: agentId, step: steps });

      let update: StateUpdate;
      try {
        // Agents get a private copy so a failed run leaves nothing behind
        update = await agent.run(structuredClone(state));
      } catch (err) {
        this.emit({ type: 'agent_failed', agent: agentId, step: steps, error: errorMessage(err) });
        continue;
      }

      state = mergeUpdate(state, update);
      this.emit({
        type: 'agent_completed',
        agent: agentId,
        step: steps,
        keys: Object.keys(update),
        follow_ups: update.next_agents ?? [],
      });
    }

    const reason: StopReason = state.goal_reached
      ? 'goal_reached'
      : state.next_agents.length === 0
        ? 'queue_empty'
        : 'step_cap';

    return { state, steps, reason };
  }
}
