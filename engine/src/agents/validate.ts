import {
  AgentId,
  PipelineEvent,
  SharedState,
  StateUpdate,
  ValidationResult,
  ValidationResultSchema,
} from '@forgeloop/shared';
import {
  coverage,
  endpointKey,
  isContractEmpty,
  missingBaseline,
  missingEndpoints,
} from '../contract';
import { appendEvents, event } from '../events';
import { recordBest, techFor } from '../state';
import { LLMBackedAgent } from './base';
import { detectStackMismatch } from './stack';

const SYSTEM_PROMPT = `You are a senior code reviewer validating a generated project.

Check the baseline (docker-compose.yml, .env.example, README.md, Makefile and scripts, /api/health, /docs),
contract compliance (every declared file and endpoint implemented), code quality, security and architecture.

Scoring: 9-10 production-ready; 7-8 good with minor issues; 5-6 basic; 3-4 incomplete; 0-2 non-functional.

Return STRICT JSON only:
{
  "status": "valid|issues|invalid",
  "score": 0-10,
  "technical_score": 0-10,
  "security_score": 0-10,
  "architecture_score": 0-10,
  "ux_score": 0-10,
  "issues": ["..."],
  "suggestions": ["..."],
  "missing_files": ["contract paths that are missing"],
  "missing_endpoints": ["METHOD /path"],
  "missing_baseline": ["baseline items not met"]
}`;

const FALLBACK: ValidationResult = {
  status: 'issues',
  score: 6,
  technical_score: 6,
  security_score: 5,
  architecture_score: 6,
  ux_score: 6,
  issues: ['Limited error handling', 'No auth flow'],
  suggestions: ['Add auth', 'Add tests'],
  missing_files: [],
  missing_endpoints: [],
  missing_baseline: [],
};

// Strict mode caps any run with contract gaps at this score
const STRICT_GAP_SCORE_CAP = 5;
const PREVIEW_FILES = 12;
const PREVIEW_CHARS = 300;

const union = (...lists: ReadonlyArray<readonly string[]>): string[] => [...new Set(lists.flat())];

/**
 * Scores the latest generated code once per codegen iteration. Contract
 * and baseline coverage are checked against the manifest directly and
 * merged with whatever gaps the reviewer model reports.
 */
export class ValidateAgent extends LLMBackedAgent {
  readonly id = 'validate' as const;

  protected isReady(state: SharedState): boolean {
    return !!state.generated_code && (state.last_validated_iter ?? -1) < (state.codegen_iters ?? 0);
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const iteration = state.codegen_iters ?? 0;
    const files = state.generated_code?.files ?? {};
    const manifest = Object.keys(files).sort();
    const contract = state.contract;

    if (manifest.length === 0) {
      const validation: ValidationResult = {
        status: 'no_code',
        score: 0,
        issues: ['No files were generated'],
        suggestions: [],
        missing_files: [],
        missing_endpoints: [],
        missing_baseline: [],
      };
      return this.finish(state, validation, iteration, [], []);
    }

    const backendName = techFor(state, 'backend')?.name ?? 'Unknown';
    const previews = manifest
      .slice(0, PREVIEW_FILES)
      .map((name) => `--- ${name}\n${files[name].slice(0, PREVIEW_CHARS)}`)
      .join('\n');

    const reviewed = await this.llmJson(
      ValidationResultSchema,
      SYSTEM_PROMPT,
      [
        `BACKEND: ${backendName}`,
        `CONTRACT:\n${JSON.stringify({
          files: contract?.files ?? [],
          endpoints: (contract?.endpoints ?? []).map(endpointKey),
          tables: contract?.tables ?? [],
        })}`,
        `MANIFEST (${manifest.length} files):\n${manifest.join('\n')}`,
        `PREVIEWS:\n${previews}`,
      ].join('\n\n'),
      FALLBACK
    );

    const fileCoverage = coverage(contract, manifest);
    const validation: ValidationResult = {
      ...reviewed,
      issues:
        fileCoverage.ratio < 1
          ? [...reviewed.issues, `Contract file coverage ${Math.round(fileCoverage.ratio * 100)}%`]
          : reviewed.issues,
      missing_files: union(fileCoverage.missing, reviewed.missing_files),
      missing_endpoints: union(missingEndpoints(contract?.endpoints ?? [], files), reviewed.missing_endpoints),
      missing_baseline: union(missingBaseline(manifest), reviewed.missing_baseline),
    };

    const hasGaps = validation.missing_files.length > 0 || validation.missing_endpoints.length > 0;
    if (state.file_contract_mode === 'strict' && hasGaps) {
      validation.status = 'invalid';
      validation.score = Math.min(validation.score, STRICT_GAP_SCORE_CAP);
    }

    const signals: PipelineEvent[] = [];
    const followUps: AgentId[] = [];
    const mismatch = detectStackMismatch(backendName, manifest);
    if (mismatch) {
      signals.push(event('need_debate', { reason: 'stack_mismatch', detail: mismatch }));
      followUps.push('tech_team');
    }
    if (hasGaps) {
      signals.push(
        event('expand_contract', {
          missing_files: validation.missing_files,
          missing_endpoints: validation.missing_endpoints,
          source: 'validate',
        })
      );
      followUps.push('contract');
    }

    return this.finish(state, validation, iteration, signals, followUps);
  }

  private finish(
    state: SharedState,
    validation: ValidationResult,
    iteration: number,
    signals: PipelineEvent[],
    followUps: AgentId[]
  ): StateUpdate {
    const best = recordBest(state, validation, state.generated_code);
    this.context.emit({
      type: 'validation_ready',
      validation,
      iteration,
      best_score: best.best_validation_score ?? validation.score,
    });

    const completed = event('validation_completed', {
      score: validation.score,
      status: validation.status,
      iteration,
    });

    return {
      validation,
      last_validated_iter: iteration,
      contract_missing_files: validation.missing_files,
      contract_missing_endpoints: validation.missing_endpoints,
      missing_baseline: validation.missing_baseline,
      contract_empty: isContractEmpty(state.contract),
      ...best,
      events: appendEvents(state, ...signals, completed),
      next_agents: followUps,
    };
  }
}
