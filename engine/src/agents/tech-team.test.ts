import { appendEvents, event } from '../events';
import { StubGateway, testState } from '../test-utils';
import { StackResolverAgent } from './stack-resolver';
import { PERSPECTIVES, TechTeamAgent } from './tech-team';

const decision = {
  backend: { name: 'FastAPI', reasoning: 'async Python' },
  frontend: { name: 'Vue', reasoning: 'small team' },
  database: { name: 'PostgreSQL', reasoning: 'relational' },
  deployment: { name: 'Fly.io', reasoning: 'simple' },
  team_discussion: 'DEV and PM agreed',
};

describe('TechTeamAgent', () => {
  it('should consult every perspective and fall back to the default stack', async () => {
    const perspectives = new StubGateway({ 'tech_team:DEV': { backend: 'Go' } });
    const agent = new TechTeamAgent({ gateway: new StubGateway(), emit: () => undefined }, perspectives);

    const update = await agent.run(testState());

    expect(perspectives.calls.map((c) => c.caller).sort()).toEqual(
      Object.keys(PERSPECTIVES).map((role) => `tech_team:${role}`).sort()
    );
    expect(update.perspectives?.find((p) => p.role === 'DEV')?.proposal).toEqual({ backend: 'Go' });
    expect(update.tech_stack?.map((t) => t.name)).toEqual(['Express.js', 'React', 'PostgreSQL', 'Docker + Cloud']);
    expect(update.next_agents).toBeUndefined();
  });

  it('should use the moderator decision', async () => {
    const gateway = new StubGateway({ tech_team: decision });
    const agent = new TechTeamAgent({ gateway, emit: () => undefined });

    const update = await agent.run(testState());

    expect(update.tech_stack).toEqual([
      { role: 'backend', name: 'FastAPI', reasoning: 'async Python' },
      { role: 'frontend', name: 'Vue', reasoning: 'small team' },
      { role: 'database', name: 'PostgreSQL', reasoning: 'relational' },
      { role: 'deployment', name: 'Fly.io', reasoning: 'simple' },
    ]);
    expect(update.team_decision?.team_discussion).toBe('DEV and PM agreed');
  });

  it('should reopen the debate once per stack mismatch', async () => {
    const agent = new TechTeamAgent({ gateway: new StubGateway(), emit: () => undefined });
    const state = testState({ tech_stack: [{ role: 'backend', name: 'Express.js', reasoning: '' }] });

    expect(agent.canRun(state)).toBe(false);

    state.events = appendEvents(state, event('need_debate', { reason: 'low_quality' }));
    expect(agent.canRun(state)).toBe(false);

    state.events = appendEvents(state, event('need_debate', { reason: 'stack_mismatch' }));
    expect(agent.canRun(state)).toBe(true);

    const update = await agent.run(state);
    expect(agent.canRun({ ...state, ...update })).toBe(false);
  });

  it('should queue the resolver again when a reopened debate stays ambiguous', async () => {
    const gateway = new StubGateway({
      tech_team: { ...decision, backend: { name: 'Django or Flask', reasoning: '' } },
    });
    const agent = new TechTeamAgent({ gateway, emit: () => undefined });
    const state = testState({ tech_stack: [{ role: 'backend', name: 'Express.js', reasoning: '' }] });

    const update = await agent.run(state);

    expect(update.next_agents).toEqual(['stack_resolver']);
  });
});

describe('StackResolverAgent', () => {
  const ambiguous = testState({
    tech_stack: [
      { role: 'backend', name: 'Django or Flask', reasoning: '' },
      { role: 'frontend', name: 'React', reasoning: '' },
    ],
  });

  it('should only run for ambiguous stacks', () => {
    const agent = new StackResolverAgent({ gateway: new StubGateway(), emit: () => undefined });

    expect(agent.canRun(ambiguous)).toBe(true);
    expect(agent.canRun(testState({ tech_stack: [{ role: 'backend', name: 'Express.js', reasoning: '' }] }))).toBe(
      false
    );
    expect(agent.canRun(testState({ tech_stack: [{ role: 'frontend', name: 'React/Vue', reasoning: '' }] }))).toBe(
      true
    );
  });

  it('should keep the current stack when no candidates come back', async () => {
    const agent = new StackResolverAgent({ gateway: new StubGateway(), emit: () => undefined });
    await expect(agent.run(ambiguous)).resolves.toEqual({ stack_resolved: false });
  });

  it('should keep the current stack when the judge is still ambiguous', async () => {
    const gateway = new StubGateway({
      'stack_resolver:candidates': { candidates: [decision] },
      'stack_resolver:judge': { ...decision, frontend: { name: 'Vue or Svelte', reasoning: '' } },
    });
    const agent = new StackResolverAgent({ gateway, emit: () => undefined });

    await expect(agent.run(ambiguous)).resolves.toEqual({ stack_resolved: false });
  });

  it('should replace the stack with the judged candidate', async () => {
    const gateway = new StubGateway({
      'stack_resolver:candidates': { candidates: [decision] },
      'stack_resolver:judge': { ...decision, rationale: 'team knows Python' },
    });
    const agent = new StackResolverAgent({ gateway, emit: () => undefined });

    const update = await agent.run(ambiguous);

    expect(update.stack_resolved).toBe(true);
    expect(update.stack_resolution_rationale).toBe('team knows Python');
    expect(update.tech_stack?.map((t) => t.name)).toEqual(['FastAPI', 'Vue', 'PostgreSQL', 'Fly.io']);
  });
});
