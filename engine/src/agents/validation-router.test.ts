import { OrchestratorEvent, RouteDecision } from '@forgeloop/shared';
import { mergeContract } from '../contract';
import { Scheduler } from '../scheduler';
import { collectEvents, StubGateway, testState } from '../test-utils';
import { AgentContext } from './base';
import { CodegenAgent } from './codegen';
import { ValidateAgent } from './validate';
import { ValidationRouterAgent } from './validation-router';

const loopState = () =>
  testState({
    tech_stack: [{ role: 'backend', name: 'Express.js', reasoning: '' }],
    architecture: { project_structure: {}, key_components: [], data_flow: '', scalability_approach: '' },
    contract: mergeContract(),
    next_agents: ['codegen', 'validate', 'validation_router'],
  });

function refinementLoop(context: AgentContext) {
  return new Scheduler(
    [new CodegenAgent(context), new ValidateAgent(context), new ValidationRouterAgent(context)],
    60,
    context.emit
  );
}

const decisions = (events: OrchestratorEvent[]): RouteDecision[] =>
  events.flatMap((e) => (e.type === 'route_decision' ? [e.decision] : []));

describe('ValidationRouterAgent', () => {
  it('should route once per validated iteration', () => {
    const agent = new ValidationRouterAgent({ gateway: new StubGateway(), emit: () => undefined });
    const validation = {
      status: 'issues' as const,
      score: 4,
      issues: [],
      suggestions: [],
      missing_files: [],
      missing_endpoints: [],
      missing_baseline: [],
    };

    expect(agent.canRun(testState())).toBe(false);
    expect(agent.canRun(testState({ validation, last_validated_iter: 1 }))).toBe(true);
    expect(agent.canRun(testState({ validation, last_validated_iter: 1, routed_after_iter: 1 }))).toBe(false);
  });

  it('should stop after exactly max_codegen_iters iterations when the score never passes', async () => {
    const { events, emit } = collectEvents();
    const gateway = new StubGateway({ validate: { status: 'invalid', score: 0 } });

    const result = await refinementLoop({ gateway, emit }).run(loopState());

    expect(result.state.goal_reached).toBe(true);
    expect(result.state.budget_exhausted).toBe(true);
    expect(result.state.codegen_iters).toBe(4);
    expect(gateway.callsFor('validate')).toBe(4);
    expect(decisions(events).map((d) => d.kind)).toEqual([
      'iterating',
      'iterating',
      'iterating',
      'budget_exhausted',
    ]);
    expect(result.reason).toBe('goal_reached');
  });

  it('should accept on the first iteration that reaches the threshold', async () => {
    const { events, emit } = collectEvents();
    const scores = [4, 8];
    const gateway = new StubGateway({ validate: (call) => ({ status: 'issues', score: scores[call - 1] }) });

    const result = await refinementLoop({ gateway, emit }).run(loopState());

    expect(result.state.goal_reached).toBe(true);
    expect(result.state.budget_exhausted).toBeUndefined();
    expect(result.state.codegen_iters).toBe(2);
    expect(decisions(events)).toEqual([
      { kind: 'iterating', reason: 'quality_improvement', structural: false, score: 4, iteration: 1, mode: 'guided' },
      { kind: 'succeeded', score: 8, iteration: 2 },
    ]);
  });

  it('should never lower the best score across iterations', async () => {
    const { events, emit } = collectEvents();
    const scores = [5, 3, 6, 2];
    const gateway = new StubGateway({ validate: (call) => ({ status: 'issues', score: scores[call - 1] }) });
    const state = { ...loopState(), validation_threshold: 9 };

    const result = await refinementLoop({ gateway, emit }).run(state);

    const best = events.flatMap((e) => (e.type === 'validation_ready' ? [e.best_score] : []));
    expect(best).toEqual([5, 5, 6, 6]);
    expect(result.state.best_validation_score).toBe(6);
    expect(result.state.validation?.score).toBe(2);
  });
});
