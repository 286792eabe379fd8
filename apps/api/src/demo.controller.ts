import { Controller, DefaultValuePipe, Get, Inject, Param, ParseIntPipe, Query } from '@nestjs/common';
import { z } from 'zod';
import { APP_CONFIG, AppConfig } from './config';
import { DbService } from './db.service';
import { formatSchema } from './schema-parser';
import { SchemaService } from './schema.service';
import { ZodValidationPipe } from './zod-validation.pipe';

const EXAMPLE_QUESTIONS = {
  sample: [
    'Show all employees in the Engineering department',
    'What is the average salary by department?',
    'List the top 5 products by price',
    'Show total sales by employee',
    'Find products with stock quantity less than 50',
    'What are the monthly sales totals?',
    'Show employees hired after 2022',
    'List all products in the Electronics category',
  ],
  custom: [
    'Show all records from the main table',
    'Count total number of records',
    'Find records created in the last month',
    'Show top 10 records by value',
    'Group data by category or type',
    'Calculate average values',
    'Find records with specific conditions',
    'Show relationships between tables',
  ],
};

const ExampleMode = z.enum(['sample', 'custom']).default('sample');
type ExampleMode = z.infer<typeof ExampleMode>;

const MAX_SAMPLE_ROWS = 50;

@Controller('api')
export class DemoController {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly db: DbService,
    private readonly schemas: SchemaService,
  ) {}

  @Get('health')
  health() {
    return { ok: true, provider: this.config.provider, authenticated: Boolean(this.config.apiToken) };
  }

  @Get('demo/schema')
  demoSchema() {
    const schema = this.schemas.sample();
    return { schema, schemaText: formatSchema(schema) };
  }

  @Get('demo/tables/:table/sample')
  sampleRows(
    @Param('table') table: string,
    @Query('limit', new DefaultValuePipe(5), ParseIntPipe) limit: number,
  ) {
    return this.db.sampleRows(table, Math.min(limit, MAX_SAMPLE_ROWS));
  }

  @Get('schema-templates')
  templates() {
    return this.schemas.listTemplates().map(({ name, schema }) => ({
      name,
      schema,
      schemaText: formatSchema(schema),
    }));
  }

  @Get('examples')
  examples(@Query('mode', new ZodValidationPipe(ExampleMode)) mode: ExampleMode) {
    return { mode, questions: EXAMPLE_QUESTIONS[mode] };
  }
}
