import { SimilarProject, TechChoice } from '@forgeloop/shared';
import { Orchestrator } from './orchestrator';
import { SimilarityStore } from './similarity-store';
import { collectEvents, StubGateway, testConfig } from './test-utils';

class MemoryStore implements SimilarityStore {
  readonly outcomes: Array<{ prompt: string; techStack: TechChoice[]; score: number }> = [];

  constructor(private failing = false) {}

  async findSimilar(): Promise<SimilarProject[]> {
    if (this.failing) throw new Error('store unavailable');
    return [];
  }

  async recordOutcome(prompt: string, techStack: TechChoice[], score: number): Promise<void> {
    if (this.failing) throw new Error('store unavailable');
    this.outcomes.push({ prompt, techStack, score });
  }
}

const PROMPT = 'build a task tracker';

describe('Orchestrator', () => {
  it('should stop at the iteration budget and keep the best code when no model answers', async () => {
    const { events, emit } = collectEvents();
    const store = new MemoryStore();
    const orchestrator = new Orchestrator(testConfig(), '/tmp/forgeloop-test', emit, {
      gateway: new StubGateway(),
      similarityStore: store,
    });

    const state = await orchestrator.runPipeline(PROMPT);

    expect(state.goal_reached).toBe(true);
    expect(state.budget_exhausted).toBe(true);
    expect(state.codegen_iters).toBe(4);
    expect(state.best_validation_score).toBe(6);
    expect(Object.keys(state.generated_code?.files ?? {}).sort()).toEqual([
      '.env.example',
      'Makefile',
      'README.md',
      'backend/app.js',
      'docker-compose.yml',
      'frontend/src/App.js',
      'scripts/build.sh',
      'scripts/dev.sh',
      'scripts/test.sh',
    ]);
    expect(state.evaluation?.overall_score).toBe(6);
    expect(store.outcomes).toEqual([{ prompt: PROMPT, techStack: state.tech_stack, score: 6 }]);

    const complete = events.find((e) => e.type === 'pipeline_complete');
    expect(complete).toMatchObject({ reason: 'goal_reached', score: 6, files: 9 });
  });

  it('should accept the first iteration that clears the threshold', async () => {
    const { emit } = collectEvents();
    const gateway = new StubGateway({ validate: { status: 'valid', score: 8 } });
    const orchestrator = new Orchestrator(testConfig(), '/tmp/forgeloop-test', emit, {
      gateway,
      similarityStore: new MemoryStore(),
    });

    const state = await orchestrator.runPipeline(PROMPT);

    expect(state.goal_reached).toBe(true);
    expect(state.budget_exhausted).toBeUndefined();
    expect(state.codegen_iters).toBe(1);
    expect(state.validation?.status).toBe('valid');
    expect(state.best_validation_score).toBe(8);
    expect(gateway.callsFor('validate')).toBe(1);
  });

  it('should reopen the stack debate and still stop at the budget when the backend language is wrong', async () => {
    const { events, emit } = collectEvents();
    const gateway = new StubGateway({ codegen: { files: { 'backend/app.py': 'print(1)' } } });
    const store = new MemoryStore();
    const orchestrator = new Orchestrator(testConfig(), '/tmp/forgeloop-test', emit, {
      gateway,
      similarityStore: store,
    });

    const state = await orchestrator.runPipeline(PROMPT);

    expect(state.goal_reached).toBe(true);
    expect(state.budget_exhausted).toBe(true);
    expect(state.codegen_iters).toBe(4);
    expect(gateway.callsFor('validate')).toBe(4);
    expect(state.events.filter((e) => e.type === 'need_debate')).toHaveLength(4);
    expect(gateway.callsFor('tech_team')).toBe(4);
    // Later strict passes score 5; the returned validation belongs to the best snapshot
    expect(state.validation?.score).toBe(6);
    expect(state.validation?.status).toBe('issues');
    expect(Object.keys(state.generated_code?.files ?? {})).toEqual(['backend/app.py']);
    expect(store.outcomes).toHaveLength(1);

    const complete = events.find((e) => e.type === 'pipeline_complete');
    expect(complete).toMatchObject({ reason: 'goal_reached', steps: 33, score: 6, files: 1 });
  });

  it('should finish when the similarity store fails', async () => {
    const { events, emit } = collectEvents();
    const orchestrator = new Orchestrator(testConfig({ max_codegen_iters: 1 }), '/tmp/forgeloop-test', emit, {
      gateway: new StubGateway(),
      similarityStore: new MemoryStore(true),
    });

    const state = await orchestrator.runPipeline(PROMPT);

    expect(state.budget_exhausted).toBe(true);
    expect(state.evaluation).toBeDefined();
    expect(events.some((e) => e.type === 'pipeline_complete')).toBe(true);
  });
});
