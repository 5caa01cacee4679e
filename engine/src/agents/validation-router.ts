import { SharedState, StateUpdate } from '@forgeloop/shared';
import { applyRoute, routeInputFrom, routeValidation } from '../routing';
import { LLMBackedAgent } from './base';

// Decides what happens after each validation; never calls the model
export class ValidationRouterAgent extends LLMBackedAgent {
  readonly id = 'validation_router' as const;

  protected isReady(state: SharedState): boolean {
    return !!state.validation && (state.routed_after_iter ?? -1) < (state.last_validated_iter ?? -1);
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const input = routeInputFrom(state);
    if (!input) {
      return {};
    }

    const decision = routeValidation(input);
    this.context.emit({ type: 'route_decision', decision });
    return applyRoute(state, input, decision);
  }
}
