import { z } from 'zod';
import { SharedState, StackDecisionSchema, StateUpdate } from '@forgeloop/shared';
import { LLMBackedAgent, describeStack } from './base';
import { hasAmbiguousChoice, isAmbiguous, STACK_ROLES, stackFromDecision } from './stack';

const CANDIDATES_SYSTEM_PROMPT = `You are resolving ambiguous technology choices.
Output 3 CONCRETE candidates (no "or", "/", "either", or multiple choices).
Each candidate has exactly one backend, one frontend, one database and one deployment.
Return STRICT JSON only:
{"candidates": [{"backend": {"name": "...", "reasoning": "..."}, "frontend": {...}, "database": {...}, "deployment": {...}}]}`;

const JUDGE_SYSTEM_PROMPT = `Choose the single best candidate for this project.
Criteria: fitness to the prompt, domain and performance needs, maintainability, coherence across layers.
Return STRICT JSON only:
{"backend": {"name": "...", "reasoning": "..."}, "frontend": {...}, "database": {...}, "deployment": {...}, "rationale": "why this candidate"}
One concrete choice per role; never write "or", "/" or alternatives.`;

const CandidatesSchema = z.object({
  candidates: z.array(StackDecisionSchema).default([]),
});

const VerdictSchema = StackDecisionSchema.extend({
  rationale: z.string().default(''),
}).nullable();

export class StackResolverAgent extends LLMBackedAgent {
  readonly id = 'stack_resolver' as const;

  protected isReady(state: SharedState): boolean {
    return hasAmbiguousChoice(state.tech_stack);
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const situation = [
      `Project prompt:\n${state.prompt}`,
      `Domain=${state.analysis?.domain ?? 'general'}, complexity=${state.analysis?.complexity ?? 'moderate'}`,
      `Current stack:\n${describeStack(state)}`,
      `Hints: ${(state.experience_hints ?? []).join('; ') || '-'}`,
    ].join('\n\n');

    const { candidates } = await this.llmJson(
      CandidatesSchema,
      CANDIDATES_SYSTEM_PROMPT,
      `${situation}\n\nProduce 3 distinct concrete candidates.`,
      { candidates: [] },
      `${this.id}:candidates`
    );
    if (candidates.length === 0) {
      return { stack_resolved: false };
    }

    const verdict = await this.llmJson(
      VerdictSchema,
      JUDGE_SYSTEM_PROMPT,
      `${situation}\n\nCandidates:\n${JSON.stringify(candidates, null, 2)}`,
      null,
      `${this.id}:judge`
    );
    if (!verdict || STACK_ROLES.some((role) => isAmbiguous(verdict[role].name))) {
      return { stack_resolved: false };
    }

    return {
      tech_stack: stackFromDecision(verdict),
      stack_resolved: true,
      stack_resolution_rationale: verdict.rationale,
    };
  }
}
