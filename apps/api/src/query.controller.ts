import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { z } from 'zod';
import { Nl2SqlService } from './nl2sql.service';
import { SessionStore } from './session.store';
import { ZodValidationPipe } from './zod-validation.pipe';

const QueryBody = z.object({
  question: z.string().trim().min(1).max(2000),
  execute: z.boolean().optional(),
  includePrompt: z.boolean().optional(),
});
type QueryBody = z.infer<typeof QueryBody>;

@Controller('api/sessions/:id')
export class QueryController {
  constructor(
    private readonly nl2sql: Nl2SqlService,
    private readonly sessions: SessionStore,
  ) {}

  @Post('query')
  @HttpCode(200)
  ask(@Param('id') id: string, @Body(new ZodValidationPipe(QueryBody)) body: QueryBody) {
    const { question, ...options } = body;
    return this.nl2sql.ask(id, question, options);
  }

  @Get('history')
  history(@Param('id') id: string) {
    return { history: this.sessions.get(id).history };
  }

  @Post('history/:candidateId/execute')
  @HttpCode(200)
  execute(@Param('id') id: string, @Param('candidateId') candidateId: string) {
    return { candidateId, result: this.nl2sql.executeCandidate(id, candidateId) };
  }
}
