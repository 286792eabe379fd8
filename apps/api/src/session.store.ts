import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { APP_CONFIG, AppConfig } from './config';
import { QueryCandidate, Schema, SessionContext } from './types';

/**
 * Per-session state: active schema, an unconfirmed image-derived schema, and query history (newest first).
 * The map is kept in activity order, so the idle and least recently used sessions sit at its front.
 */
@Injectable()
export class SessionStore {
  private readonly logger = new Logger(SessionStore.name);
  private readonly sessions = new Map<string, SessionContext>();

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  create(schema?: Schema): SessionContext {
    this.evictIdle();
    while (this.sessions.size >= this.config.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
      this.logger.log(`Session ${oldest.value} evicted: session limit ${this.config.maxSessions} reached`);
    }

    const now = Date.now();
    const session: SessionContext = {
      id: randomUUID(),
      createdAt: new Date(now).toISOString(),
      lastActiveAt: now,
      schema,
      history: [],
    };
    this.sessions.set(session.id, session);
    this.logger.log(`Session ${session.id} created`);
    return session;
  }

  get(id: string): SessionContext {
    const session = this.sessions.get(id);
    const now = Date.now();
    if (session && now - session.lastActiveAt > this.config.sessionTtlMs) {
      this.sessions.delete(id);
      this.logger.log(`Session ${id} expired`);
    } else if (session) {
      session.lastActiveAt = now;
      this.sessions.delete(id);
      this.sessions.set(id, session);
      return session;
    }
    throw new NotFoundException(`Session '${id}' not found`);
  }

  delete(id: string): void {
    this.get(id);
    this.sessions.delete(id);
    this.logger.log(`Session ${id} ended`);
  }

  setSchema(id: string, schema: Schema): SessionContext {
    const session = this.get(id);
    session.schema = schema;
    session.pendingSchema = undefined;
    return session;
  }

  setPendingSchema(id: string, schema: Schema): SessionContext {
    const session = this.get(id);
    session.pendingSchema = schema;
    return session;
  }

  /** Promotes the pending image-derived schema, or `replacement` when the user edited it. */
  confirmPending(id: string, replacement?: Schema): SessionContext {
    const session = this.get(id);
    if (!session.pendingSchema) {
      throw new BadRequestException('No extracted schema is waiting for confirmation');
    }
    session.schema = { ...(replacement ?? session.pendingSchema), verified: true };
    session.pendingSchema = undefined;
    return session;
  }

  record(id: string, candidate: QueryCandidate): void {
    const session = this.get(id);
    session.history = [candidate, ...session.history].slice(0, this.config.historyLimit);
  }

  findCandidate(id: string, candidateId: string): QueryCandidate {
    const candidate = this.get(id).history.find((c) => c.id === candidateId);
    if (!candidate) throw new NotFoundException(`Query '${candidateId}' not found in session history`);
    return candidate;
  }

  private evictIdle(): void {
    const cutoff = Date.now() - this.config.sessionTtlMs;
    for (const [id, session] of this.sessions) {
      if (session.lastActiveAt >= cutoff) break;
      this.sessions.delete(id);
      this.logger.log(`Session ${id} expired`);
    }
  }
}
