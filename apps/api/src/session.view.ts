import { formatSchema } from './schema-parser';
import { SessionContext } from './types';

export function toSessionView(session: SessionContext) {
  return {
    id: session.id,
    createdAt: session.createdAt,
    schema: session.schema ?? null,
    schemaText: session.schema ? formatSchema(session.schema) : null,
    pendingSchema: session.pendingSchema ?? null,
    history: session.history,
  };
}
