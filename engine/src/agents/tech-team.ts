import {
  PipelineEvent,
  SharedState,
  StackDecision,
  StackDecisionSchema,
  StateUpdate,
} from '@forgeloop/shared';
import { advanceCursor, hasUnseenEvent } from '../events';
import { LLMGateway } from '../gateway';
import { AgentContext, LLMBackedAgent } from './base';
import { hasAmbiguousChoice, stackFromDecision } from './stack';

// Advisory roles consulted in parallel before the moderator decides
export const PERSPECTIVES: Record<string, string> = {
  PM: 'You are a Project Manager focused on timeline, budget, and risk.',
  DEV: 'You are a Lead Developer focused on implementation, maintainability, and performance.',
  PO: 'You are a Product Owner focused on UX, features, and roadmap.',
  CONSULTANT: 'You are a Technology Consultant focused on industry best practices and tradeoffs.',
  USER: 'You are the end user focused on usability and perceived speed.',
};

const MODERATOR_SYSTEM_PROMPT = `You are a neutral moderator. Combine the role proposals into ONE coherent stack.
Honor Memory Prefer/Avoid where reasonable. Exactly one concrete choice per layer, never "A or B".
Return STRICT JSON only:
{
  "backend": {"name": "...", "reasoning": "..."},
  "frontend": {"name": "...", "reasoning": "..."},
  "database": {"name": "...", "reasoning": "..."},
  "deployment": {"name": "...", "reasoning": "..."},
  "team_discussion": "concise synthesis of points and tradeoffs"
}`;

const FALLBACK_DECISION: StackDecision = {
  backend: { name: 'Express.js', reasoning: 'Widely used, fast to scaffold' },
  frontend: { name: 'React', reasoning: 'Component model, large ecosystem' },
  database: { name: 'PostgreSQL', reasoning: 'Relational integrity and reporting' },
  deployment: { name: 'Docker + Cloud', reasoning: 'Portable containers' },
  team_discussion: 'Team debate unavailable; using the default stack.',
};

// need_debate reasons that justify reopening the stack decision
const DEBATE_REASONS: readonly string[] = ['stack_mismatch', 'perf_regression', 'security_gap'];

const isDebateTrigger = (e: PipelineEvent): boolean =>
  typeof e.meta.reason === 'string' && DEBATE_REASONS.includes(e.meta.reason);

/**
 * Chooses the technology stack: every perspective proposes independently,
 * then a moderator merges the proposals into one decision.
 */
export class TechTeamAgent extends LLMBackedAgent {
  readonly id = 'tech_team' as const;

  constructor(
    context: AgentContext,
    private perspectiveGateway: LLMGateway = context.gateway
  ) {
    super(context);
  }

  protected isReady(state: SharedState): boolean {
    return !state.tech_stack || hasUnseenEvent(state, this.id, ['need_debate'], isDebateTrigger);
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const debateContext = buildDebateContext(state);

    const perspectives = await Promise.all(
      Object.entries(PERSPECTIVES).map(async ([role, systemPrompt]) => {
        const proposal = await this.perspectiveGateway.extractStructured(
          systemPrompt,
          `${debateContext}\n\nAs ${role}, propose a concrete stack (backend, frontend, database, deployment) and justify it. Return JSON.`,
          `${this.id}:${role}`
        );
        return { role, proposal: proposal ?? {} };
      })
    );

    const bullets = perspectives.map((p) => `- ${p.role}: ${JSON.stringify(p.proposal)}`).join('\n');
    const decision = await this.llmJson(
      StackDecisionSchema,
      MODERATOR_SYSTEM_PROMPT,
      `${debateContext}\n\nProposals:\n${bullets}`,
      FALLBACK_DECISION
    );

    const techStack = stackFromDecision(decision);
    const update: StateUpdate = {
      tech_stack: techStack,
      team_decision: decision,
      perspectives,
      ...advanceCursor(state, this.id),
    };

    // A reopened debate runs after the seeded resolver, so queue it again
    if (state.tech_stack && hasAmbiguousChoice(techStack)) {
      update.next_agents = ['stack_resolver'];
    }
    return update;
  }
}

function buildDebateContext(state: SharedState): string {
  const analysis = state.analysis;
  const policy = state.memory_policy;
  return [
    `Project: ${state.prompt}`,
    analysis
      ? `Domain: ${analysis.domain} (complexity: ${analysis.complexity}, performance: ${analysis.performance_needs})`
      : 'Domain: general',
    `Experience: ${(state.experience_hints ?? []).join('; ') || '-'}`,
    `Warnings: ${(state.experience_warnings ?? []).join('; ') || '-'}`,
    `Memory Prefer: ${policy ? JSON.stringify(policy.prefer) : '-'}`,
    `Memory Avoid: ${policy ? JSON.stringify(policy.avoid) : '-'}`,
    `Coach Notes: ${(state.coach_notes ?? []).slice(0, 3).join('; ') || '-'}`,
  ].join('\n');
}
