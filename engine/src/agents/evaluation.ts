import { Evaluation, EvaluationSchema, SharedState, StateUpdate } from '@forgeloop/shared';
import { describeStack, LLMBackedAgent } from './base';

const SYSTEM_PROMPT = `Evaluate overall success: technology fit, code quality (validation), architecture soundness, user satisfaction.
Return STRICT JSON only:
{"overall_score": 0-10, "technology_fit": 0-10, "code_quality": 0-10, "user_satisfaction": 0-10, "feedback": "..."}`;

/**
 * Final assessment of a finished run. Unlike the other agents it only
 * runs once the goal is reached.
 */
export class EvaluationAgent extends LLMBackedAgent {
  readonly id = 'evaluation' as const;

  canRun(state: SharedState): boolean {
    return this.isReady(state);
  }

  protected isReady(state: SharedState): boolean {
    return !!state.validation && !!state.goal_reached && !state.evaluation;
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const score = state.best_validation_score ?? state.validation?.score ?? 0;
    const fallback: Evaluation = {
      overall_score: score,
      technology_fit: 7,
      code_quality: score,
      user_satisfaction: 7,
      feedback: 'Solid with room to improve',
    };

    const evaluation = await this.llmJson(
      EvaluationSchema,
      SYSTEM_PROMPT,
      `Request: ${state.prompt}\nTech:\n${describeStack(state)}\n` +
        `Validation: ${state.validation?.status ?? 'unknown'} (${score}/10)\n` +
        `Architecture components: ${state.architecture?.key_components.length ?? 0}`,
      fallback
    );
    return { evaluation };
  }
}
