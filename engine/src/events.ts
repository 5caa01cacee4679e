import { AgentId, PipelineEvent, PipelineEventType, SharedState } from '@forgeloop/shared';

/**
 * Event log helpers. The log is append-only; instead of "already handled"
 * flags each reacting agent keeps a cursor, the index of the first event
 * it has not processed yet.
 */

export function appendEvents(state: SharedState, ...events: PipelineEvent[]): PipelineEvent[] {
  return [...state.events, ...events];
}

export function event(type: PipelineEventType, meta: Record<string, unknown> = {}): PipelineEvent {
  return { type, meta };
}

export function hasEventType(events: readonly PipelineEvent[], type: PipelineEventType): boolean {
  return events.some((e) => e.type === type);
}

export function unseenEvents(state: SharedState, agent: AgentId): PipelineEvent[] {
  return state.events.slice(state.event_cursors[agent] ?? 0);
}

export function hasUnseenEvent(
  state: SharedState,
  agent: AgentId,
  types: readonly PipelineEventType[],
  predicate: (e: PipelineEvent) => boolean = () => true
): boolean {
  return unseenEvents(state, agent).some((e) => types.includes(e.type) && predicate(e));
}

/**
 * Marks every event up to `events.length` as processed by `agent`. Pass the
 * agent's own outgoing log when it appends in the same update.
 */
export function advanceCursor(
  state: SharedState,
  agent: AgentId,
  events: readonly PipelineEvent[] = state.events
): Pick<SharedState, 'event_cursors'> {
  return { event_cursors: { ...state.event_cursors, [agent]: events.length } };
}
