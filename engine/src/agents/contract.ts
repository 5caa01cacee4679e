import { Contract, ContractSchema, SharedState, StateUpdate } from '@forgeloop/shared';
import { isContractEmpty, mergeContract, withBaseline } from '../contract';
import { advanceCursor, hasUnseenEvent } from '../events';
import { techFor } from '../state';
import { describeStack, LLMBackedAgent } from './base';
import { backendExtension } from './stack';

const SYSTEM_PROMPT = `Given the chosen stack and capabilities, propose a PRACTICAL delivery CONTRACT.

Baseline every web project ships (stack-agnostic):
- docker-compose.yml with backend, frontend and db
- .env.example with required vars
- README.md with a quickstart and the health URL
- Makefile plus scripts/dev.sh, scripts/build.sh, scripts/test.sh
- GET /api/health and GET /docs

Return STRICT JSON only:
{
  "files": ["backend/app.*", "backend/routes/*.js", "frontend/src/App.*", "docker-compose.yml", ".env.example", "README.md", "Makefile"],
  "endpoints": [{"method": "GET", "path": "/api/health"}, {"method": "GET", "path": "/docs"}],
  "tables": [{"name": "users"}]
}
Keep it to 30 files or fewer. Match file extensions to the chosen backend.`;

function fallbackContract(state: SharedState): Contract {
  const ext = backendExtension(techFor(state, 'backend')?.name);
  return {
    files: [`backend/app.${ext}`, 'frontend/src/App.js', 'docker-compose.yml', '.env.example', 'README.md', 'Makefile'],
    endpoints: [
      { method: 'GET', path: '/api/health' },
      { method: 'GET', path: '/docs' },
    ],
    tables: [{ name: 'users' }],
  };
}

/**
 * Derives the delivery contract and merges it into whatever is already
 * agreed. Runs once up front, then again when routing asks for it or
 * validation reports missing pieces.
 */
export class ContractAgent extends LLMBackedAgent {
  readonly id = 'contract' as const;

  protected isReady(state: SharedState): boolean {
    if (!state.capabilities || !state.tech_stack) {
      return false;
    }

    const neverRan = state.event_cursors[this.id] === undefined;
    return neverRan || !!state.redo_contract || hasUnseenEvent(state, this.id, ['expand_contract']);
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const gaps = [...(state.contract_missing_files ?? []), ...(state.contract_missing_endpoints ?? [])];
    const proposal = await this.llmJson(
      ContractSchema,
      SYSTEM_PROMPT,
      `TECH_STACK:\n${describeStack(state)}\n\nCAPABILITIES:\n${JSON.stringify(state.capabilities)}\n` +
        `\nCURRENT CONTRACT:\n${JSON.stringify(state.contract ?? {})}\n` +
        `\nREPORTED GAPS: ${gaps.join(', ') || 'none'}`,
      fallbackContract(state)
    );

    const proposed: Contract = { ...proposal, source: 'llm' };
    const contract = state.contract ? mergeContract(state.contract, proposed) : withBaseline(proposed);

    return {
      contract,
      contract_empty: isContractEmpty(contract),
      redo_contract: false,
      ...advanceCursor(state, this.id),
    };
  }
}
