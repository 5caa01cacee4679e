import { GeneratedCodeSchema, SharedState, StateUpdate } from '@forgeloop/shared';
import { endpointKey, isContractEmpty, mergeContract } from '../contract';
import { describeStack, LLMBackedAgent } from './base';
import { scaffoldProject } from './scaffold';

const SYSTEM_PROMPT = `You are a senior developer generating a complete, runnable project.

Return STRICT JSON only:
{
  "files": {"relative/path.ext": "full file content"},
  "setup_instructions": ["..."],
  "run_commands": ["..."],
  "deployment_notes": ["..."]
}

Rules:
- Use exactly the chosen stack; backend files must be in the backend's language.
- Implement every file and endpoint of the contract.
- In "strict" mode the contract is mandatory; in "guided" mode it is the expected shape; in "free" mode it is a suggestion.
- Address every reported issue from the previous validation.`;

const list = (items: readonly string[] = []): string => (items.length ? items.map((i) => `- ${i}`).join('\n') : '-');

/**
 * Generates the project files. Each run is one codegen iteration, capped
 * by max_codegen_iters.
 */
export class CodegenAgent extends LLMBackedAgent {
  readonly id = 'codegen' as const;

  protected isReady(state: SharedState): boolean {
    if (!state.architecture || !state.tech_stack) {
      return false;
    }
    const pending = !state.generated_code || !!state.redo_codegen;
    return pending && (state.codegen_iters ?? 0) < state.max_codegen_iters;
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const iterations = (state.codegen_iters ?? 0) + 1;
    const update: StateUpdate = {};

    let contract = state.contract;
    if (!contract || isContractEmpty(contract)) {
      contract = mergeContract(contract);
      update.contract = contract;
    }

    const policy = state.memory_policy;
    const prefer = policy ? Object.values(policy.prefer).flat() : [];
    const avoid = policy ? Object.values(policy.avoid).flat() : [];
    const validation = state.validation;

    const userPrompt = [
      `PROJECT: ${state.prompt}`,
      `STACK:\n${describeStack(state)}`,
      `ARCHITECTURE:\n${JSON.stringify(state.architecture)}`,
      `CONTRACT (mode: ${state.file_contract_mode}):\nfiles:\n${list(contract.files)}\nendpoints:\n${list(contract.endpoints.map(endpointKey))}`,
      `MEMORY COACHING\nPrefer: ${prefer.join(', ') || '-'}\nAvoid: ${avoid.join(', ') || '-'}\nNotes:\n${list(state.coach_notes)}`,
      `PREVIOUS ISSUES:\n${list(validation?.issues)}`,
      `SUGGESTIONS:\n${list(validation?.suggestions)}`,
      `MISSING FILES:\n${list(state.contract_missing_files)}`,
      `MISSING ENDPOINTS:\n${list(state.contract_missing_endpoints)}`,
    ].join('\n\n');

    const generated = await this.llmJson(
      GeneratedCodeSchema,
      SYSTEM_PROMPT,
      userPrompt,
      scaffoldProject(state, contract)
    );

    // A wrong-language backend is kept; validate flags it and reopens the stack debate
    const previous = state.generated_code;
    const keepPrevious = Object.keys(generated.files).length === 0 && !!previous && Object.keys(previous.files).length > 0;

    return {
      ...update,
      generated_code: keepPrevious && previous ? previous : generated,
      codegen_iters: iterations,
      redo_codegen: false,
    };
  }
}
