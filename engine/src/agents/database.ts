import { DatabaseSchema, DatabaseSchemaSchema, SharedState, StateUpdate } from '@forgeloop/shared';
import { techFor } from '../state';
import { LLMBackedAgent } from './base';

const FALLBACK: DatabaseSchema = {
  tables: {
    users: {
      columns: { id: 'PRIMARY KEY', email: 'VARCHAR' },
      indexes: ['email'],
      relationships: [],
    },
  },
  optimization_notes: 'basic',
};

export class DatabaseAgent extends LLMBackedAgent {
  readonly id = 'database' as const;

  protected isReady(state: SharedState): boolean {
    return !state.database_schema && !!state.tech_stack;
  }

  async run(state: SharedState): Promise<StateUpdate> {
    const database = techFor(state, 'database');
    const dbName = database?.name ?? 'Unknown';

    const tableHints = (state.contract?.tables ?? []).map((t) => t.name).join(', ');
    const databaseSchema = await this.llmJson(
      DatabaseSchemaSchema,
      `Design a schema for ${dbName}. Return STRICT JSON only:
{"tables": {"table_name": {"columns": {"col": "type"}, "indexes": ["..."], "relationships": ["..."]}}, "optimization_notes": "..."}`,
      `Project: ${state.prompt}\nDB: ${dbName} (${database?.reasoning ?? ''})\nContract tables: ${tableHints || 'none'}`,
      FALLBACK
    );
    return { database_schema: databaseSchema };
  }
}
