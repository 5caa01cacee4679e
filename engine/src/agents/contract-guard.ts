import { ContractSchema, SharedState, StateUpdate } from '@forgeloop/shared';
import { isContractEmpty, mergeContract } from '../contract';
import { techFor } from '../state';
import { describeStack, LLMBackedAgent } from './base';
import { backendExtension } from './stack';

const SYSTEM_PROMPT = `Draft a MINIMAL but runnable CONTRACT for the chosen stack and capabilities.
Respect the baseline (docker-compose, .env.example, README.md, Makefile/scripts, /api/health, /docs).
Return STRICT JSON only:
{"files": ["backend/app.*", "frontend/src/App.*", "docker-compose.yml", ".env.example", "README.md"], "endpoints": [{"method": "GET", "path": "/api/health"}, {"method": "GET", "path": "/docs"}], "tables": [{"name": "users"}]}`;

// Makes sure codegen never starts without a contract
export class ContractGuardAgent extends LLMBackedAgent {
  readonly id = 'contract_guard' as const;

  protected isReady(state: SharedState): boolean {
    return !!state.tech_stack && isContractEmpty(state.contract);
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const ext = backendExtension(techFor(state, 'backend')?.name);
    const draft = await this.llmJson(
      ContractSchema,
      SYSTEM_PROMPT,
      `STACK:\n${describeStack(state)}\nCAPABILITIES:\n${JSON.stringify(state.capabilities ?? {})}\nKeep it to 20 files or fewer.`,
      {
        files: [`backend/app.${ext}`, 'frontend/src/App.js', 'docker-compose.yml', '.env.example', 'README.md'],
        endpoints: [
          { method: 'GET', path: '/api/health' },
          { method: 'GET', path: '/docs' },
        ],
        tables: [{ name: 'users' }],
      }
    );

    const contract = { ...mergeContract(state.contract, draft), source: 'guard' };
    return { contract, contract_empty: isContractEmpty(contract) };
  }
}
