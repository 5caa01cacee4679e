import {
  DomainAnalysis,
  MemoryPolicy,
  MemoryPolicySchema,
  SharedState,
  SimilarProject,
  StateUpdate,
  TechChoice,
} from '@forgeloop/shared';
import { mergeContract, withBaseline } from '../contract';
import { analyzeProject } from '../domain';
import { advanceCursor, hasUnseenEvent } from '../events';
import { escalateMode, ratchetMode } from '../routing';
import { SimilarityStore } from '../similarity-store';
import { AgentContext, LLMBackedAgent } from './base';

const POLICY_SYSTEM_PROMPT = `Compile a MEMORY POLICY for a web project. Return STRICT JSON only:
{
  "prefer": {"backend": [], "frontend": [], "database": [], "deployment": []},
  "avoid": {"backend": [], "frontend": [], "database": [], "deployment": []},
  "seed_contract": {
    "files": ["backend/app.*", "frontend/src/App.*", "docker-compose.yml", ".env.example", "README.md", "Makefile"],
    "endpoints": [{"method": "GET", "path": "/api/health"}, {"method": "GET", "path": "/docs"}],
    "tables": [{"name": "users"}]
  },
  "validation": {"min_score": 7, "require_valid": false, "mode": "guided"},
  "coach_notes": ["short, practical build tips"]
}
Only concrete technology names. The seed contract must be runnable.`;

// Hints only come from past runs that were both close and successful
const HINT_SIMILARITY = 0.3;
const HINT_SUCCESS = 7;

/**
 * Learns from the prompt and from past runs, seeds the contract and sets
 * the acceptance knobs. Re-runs after each validation to tighten them.
 */
export class MemoryAgent extends LLMBackedAgent {
  readonly id = 'memory' as const;

  constructor(
    context: AgentContext,
    private store?: SimilarityStore,
    private topK = 5
  ) {
    super(context);
  }

  protected isReady(state: SharedState): boolean {
    return !state.memory || hasUnseenEvent(state, this.id, ['validation_completed', 'refinement_triggered']);
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const analysis = analyzeProject(state.prompt);
    const similar = await this.findSimilar(state.prompt);
    const guidance = experienceGuidance(state.prompt, analysis);
    const hints = [...guidance.hints, ...similarityHints(similar)];

    const policy = await this.llmJson(
      MemoryPolicySchema,
      POLICY_SYSTEM_PROMPT,
      `Domain=${analysis.domain} complexity=${analysis.complexity} performance=${analysis.performance_needs}\n` +
        `Hints: ${hints.slice(0, 6).join('; ') || 'none'}`,
      fallbackPolicy(state)
    );

    let contract = state.contract;
    if (policy.seed_contract) {
      contract = state.contract
        ? mergeContract(state.contract, policy.seed_contract)
        : withBaseline({ ...policy.seed_contract, source: 'memory_seed' });
    }

    // The policy can only tighten what the run started with
    let mode = ratchetMode(state.file_contract_mode, policy.validation.mode);
    if (state.validation) {
      mode = escalateMode(mode, state.validation);
    }

    return {
      memory: true,
      analysis,
      memory_policy: policy,
      contract,
      experience_hints: hints,
      experience_warnings: guidance.warnings,
      coach_notes: policy.coach_notes,
      similar_projects_count: similar.length,
      validation_threshold: Math.max(state.validation_threshold, policy.validation.min_score),
      require_valid_status: state.require_valid_status || policy.validation.require_valid,
      file_contract_mode: mode,
      ...advanceCursor(state, this.id),
    };
  }

  /**
   * Record how a finished run scored so later prompts get hints from it.
   */
  async learnFromOutcome(prompt: string, techStack: TechChoice[], score: number): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.recordOutcome(prompt, techStack, score);
    } catch (err) {
      this.context.emit({
        type: 'error',
        error: `Failed to record outcome: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  }

  private async findSimilar(prompt: string): Promise<SimilarProject[]> {
    if (!this.store) return [];
    try {
      return await this.store.findSimilar(prompt, this.topK);
    } catch (err) {
      this.context.emit({
        type: 'error',
        error: `Similarity lookup failed: ${err instanceof Error ? err.message : String(err)}`,
      });
      return [];
    }
  }
}

function fallbackPolicy(state: SharedState): MemoryPolicy {
  const layers = () => ({ backend: [], frontend: [], database: [], deployment: [] });
  return {
    prefer: layers(),
    avoid: layers(),
    seed_contract: {
      files: ['backend/app.*', 'frontend/src/App.*', 'docker-compose.yml', '.env.example', 'README.md', 'Makefile'],
      endpoints: [
        { method: 'GET', path: '/api/health' },
        { method: 'GET', path: '/docs' },
      ],
      tables: [{ name: 'users' }],
    },
    validation: {
      min_score: state.validation_threshold,
      require_valid: state.require_valid_status,
      mode: state.file_contract_mode,
    },
    coach_notes: ['use env vars', 'add health check'],
  };
}

export function similarityHints(similar: readonly SimilarProject[]): string[] {
  const hints: string[] = [];
  for (const project of similar) {
    if (project.success_score <= HINT_SUCCESS || project.similarity <= HINT_SIMILARITY) continue;
    const percent = `${Math.round(project.similarity * 100)}%`;
    for (const tech of project.tech_stack) {
      hints.push(`Similar project (${percent}) used ${tech.name} for ${tech.role}`);
    }
  }
  return hints;
}

function experienceGuidance(prompt: string, analysis: DomainAnalysis): { hints: string[]; warnings: string[] } {
  const p = prompt.toLowerCase();
  if (analysis.domain === 'productivity') {
    return {
      hints: ['Task/Project tools benefit from relational data (ACID, joins, reporting)'],
      warnings: ['Document stores complicate cross-entity queries and reporting'],
    };
  }
  if (p.includes('real-time') || p.includes('chat')) {
    return { hints: ['Real-time features benefit from a WebSocket-native stack'], warnings: [] };
  }
  return { hints: [], warnings: [] };
}
