import { GeneratedCode } from '@forgeloop/shared';
import { mergeContract, missingBaseline, missingEndpoints, missingFiles } from '../contract';
import { collectEvents, StubGateway, testState } from '../test-utils';
import { CodegenAgent } from './codegen';
import { resolveContractPath, scaffoldProject } from './scaffold';

const architecture = { project_structure: {}, key_components: [], data_flow: '', scalability_approach: '' };
const stackOf = (backend: string) => [{ role: 'backend', name: backend, reasoning: '' }];

const previous: GeneratedCode = {
  files: { 'backend/app.js': 'old' },
  setup_instructions: [],
  run_commands: [],
  deployment_notes: [],
};

describe('resolveContractPath', () => {
  it('should leave literal paths alone', () => {
    expect(resolveContractPath('README.md')).toBe('README.md');
  });

  it('should pick the extension of the chosen backend', () => {
    expect(resolveContractPath('backend/app.*', 'Express.js')).toBe('backend/app.js');
    expect(resolveContractPath('backend/app.*', 'Django')).toBe('backend/app.py');
    expect(resolveContractPath('backend/app.*', 'Go (Gin)')).toBe('backend/app.go');
    expect(resolveContractPath('frontend/src/App.*', 'Django')).toBe('frontend/src/App.js');
  });

  it('should name other wildcards index', () => {
    expect(resolveContractPath('backend/routes/*.js')).toBe('backend/routes/index.js');
    expect(resolveContractPath('docs/**/*.md')).toBe('docs/index.md');
  });
});

describe('scaffoldProject', () => {
  it('should cover the contract, its endpoints and the baseline', () => {
    const contract = mergeContract(undefined, {
      files: ['backend/routes/*.py'],
      endpoints: [{ method: 'POST', path: '/api/tasks' }],
      tables: [],
    });
    const state = testState({ tech_stack: stackOf('Flask') });

    const project = scaffoldProject(state, contract);
    const manifest = Object.keys(project.files);

    expect(missingFiles(contract.files, manifest)).toEqual([]);
    expect(missingBaseline(manifest)).toEqual([]);
    expect(missingEndpoints(contract.endpoints, project.files)).toEqual([]);
    expect(project.files['backend/app.py']).toContain("@app.route('/api/tasks', methods=['POST'])");
  });
});

describe('CodegenAgent', () => {
  it('should need a stack, an architecture and remaining budget', () => {
    const agent = new CodegenAgent({ gateway: new StubGateway(), emit: () => undefined });
    const ready = testState({ tech_stack: stackOf('Express.js'), architecture });

    expect(agent.canRun(testState())).toBe(false);
    expect(agent.canRun(ready)).toBe(true);
    expect(agent.canRun({ ...ready, generated_code: previous })).toBe(false);
    expect(agent.canRun({ ...ready, generated_code: previous, redo_codegen: true })).toBe(true);
    expect(agent.canRun({ ...ready, generated_code: previous, redo_codegen: true, codegen_iters: 4 })).toBe(false);
  });

  it('should fall back to a scaffold of the contract', async () => {
    const agent = new CodegenAgent({ gateway: new StubGateway(), emit: () => undefined });

    const update = await agent.run(
      testState({ tech_stack: stackOf('Express.js'), architecture, contract: mergeContract() })
    );

    expect(update.codegen_iters).toBe(1);
    expect(update.redo_codegen).toBe(false);
    expect(update.contract).toBeUndefined();
    expect(Object.keys(update.generated_code?.files ?? {}).sort()).toEqual([
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
  });

  it('should draft the baseline contract when none exists', async () => {
    const agent = new CodegenAgent({ gateway: new StubGateway(), emit: () => undefined });

    const update = await agent.run(testState({ tech_stack: stackOf('Express.js'), architecture }));

    expect(update.contract).toEqual(mergeContract());
  });

  it('should hand a wrong-language backend on to validation', async () => {
    const { events, emit } = collectEvents();
    const gateway = new StubGateway({ codegen: { files: { 'backend/main.py': 'print(1)' } } });
    const agent = new CodegenAgent({ gateway, emit });

    const update = await agent.run(
      testState({ tech_stack: stackOf('Express.js'), architecture, generated_code: previous, codegen_iters: 1 })
    );

    expect(update.codegen_iters).toBe(2);
    expect(update.redo_codegen).toBe(false);
    expect(update.next_agents).toBeUndefined();
    expect(update.generated_code?.files).toEqual({ 'backend/main.py': 'print(1)' });
    expect(events).toEqual([]);
  });

  it('should keep the previous files when the model returns none', async () => {
    const gateway = new StubGateway({ codegen: { files: {}, run_commands: ['npm start'] } });
    const agent = new CodegenAgent({ gateway, emit: () => undefined });

    const update = await agent.run(
      testState({
        tech_stack: stackOf('Express.js'),
        architecture,
        contract: mergeContract(),
        generated_code: previous,
        codegen_iters: 2,
        redo_codegen: true,
      })
    );

    expect(update.generated_code).toEqual(previous);
    expect(update.codegen_iters).toBe(3);
  });
});
