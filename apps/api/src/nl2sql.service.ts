import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { DbService } from './db.service';
import { EmptySchemaError, ExecutionError, ValidationRejectedError } from './errors';
import { InferenceClient } from './inference.client';
import { buildSqlPrompt } from './prompt-builder';
import { formatSchema } from './schema-parser';
import { SessionStore } from './session.store';
import { validateReadOnly } from './sql-guard';
import { ExecutionOutcome, ExecutionResult, QueryCandidate, QueryOutcome, Schema, ValidationResult } from './types';

export type AskOptions = {
  /** Run the query when it passes validation and came from the sample schema. Defaults to true. */
  execute?: boolean;
  includePrompt?: boolean;
};

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

@Injectable()
export class Nl2SqlService {
  private readonly logger = new Logger(Nl2SqlService.name);

  constructor(
    private readonly sessions: SessionStore,
    private readonly inference: InferenceClient,
    private readonly db: DbService,
  ) {}

  async ask(sessionId: string, question: string, options: AskOptions = {}): Promise<QueryOutcome> {
    const { execute = true, includePrompt = false } = options;
    const session = this.sessions.get(sessionId);
    if (!session.schema || session.schema.tables.length === 0) {
      throw new EmptySchemaError('The session has no schema with at least one table');
    }

    // Taken before the inference call so a schema change mid-request cannot leak into this candidate.
    const snapshot: Schema = deepFreeze(structuredClone(session.schema));
    const schemaText = formatSchema(snapshot);
    const prompt = buildSqlPrompt(snapshot, question);

    this.logger.log(`Generating SQL against ${snapshot.source} schema (${snapshot.tables.length} tables): ${question}`);
    const sql = await this.inference.generateSql(prompt);
    this.logger.log(`Generated SQL: ${sql}`);

    const candidate: QueryCandidate = Object.freeze({
      id: randomUUID(),
      question,
      sql,
      schema: snapshot,
      schemaText,
      createdAt: new Date().toISOString(),
    });
    this.sessions.record(sessionId, candidate);

    const validation = validateReadOnly(sql);
    const execution = this.autoExecute(candidate, validation, execute);
    return includePrompt ? { candidate, validation, execution, prompt } : { candidate, validation, execution };
  }

  /** Runs a query from the session history on explicit request. */
  executeCandidate(sessionId: string, candidateId: string): ExecutionResult {
    const candidate = this.sessions.findCandidate(sessionId, candidateId);
    if (candidate.schema.source !== 'sample') {
      throw new ConflictException('Only queries generated against the sample database can be executed');
    }
    const validation = validateReadOnly(candidate.sql);
    if (!validation.ok) {
      this.logger.warn(`Blocked execution of ${candidate.id}: ${validation.reason}`);
      throw new ValidationRejectedError(validation.reason, candidate.sql);
    }
    return this.db.execute(candidate.sql);
  }

  private autoExecute(candidate: QueryCandidate, validation: ValidationResult, requested: boolean): ExecutionOutcome {
    if (candidate.schema.source !== 'sample') return { status: 'skipped', reason: 'not_sample' };
    if (!validation.ok) {
      this.logger.warn(`Not executing ${candidate.id}: ${validation.reason}`);
      return { status: 'skipped', reason: 'rejected' };
    }
    if (!requested) return { status: 'skipped', reason: 'not_requested' };

    try {
      return { status: 'ok', result: this.db.execute(candidate.sql) };
    } catch (error) {
      if (!(error instanceof ExecutionError)) throw error;
      this.logger.warn(`Demo execution failed (${error.code}): ${error.message}`);
      return {
        status: 'failed',
        error: { kind: 'execution', code: error.code, message: error.message, suggestions: error.suggestions },
      };
    }
  }
}
