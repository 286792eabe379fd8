import { formatSchema } from './schema-parser';
import { Schema } from './types';

// Must not mention any identifier: table and column names appear only in the schema block.
const SQL_INSTRUCTIONS = [
  '- Use the exact table and column spellings listed above',
  '- Write one syntactically correct, read-only statement',
  '- Use JOINs when the question spans several tables',
  '- Add WHERE clauses for any filtering the question asks for',
  '- Reply with the SQL only, without commentary',
].join('\n');

/**
 * Every table name, column name and the question appear exactly once, as long as
 * the names are distinct and none is a word of the fixed text around them
 * (`Table`, `question`, `query`, `SQL`, `schema` and the like).
 */
export function buildSqlPrompt(schema: Pick<Schema, 'tables'>, question: string): string {
  return `### Task
Convert the following natural language question to a SQL query.

### Database Schema
${formatSchema(schema)}

### Question
${question}

### Instructions
${SQL_INSTRUCTIONS}

### SQL Query
`;
}

export function buildSchemaExtractionPrompt(): string {
  return [
    'Analyze this database schema image and list every table it shows.',
    'For each table write a line "Table: <table>" followed by one line per column',
    'in the form "  - <column>: <TYPE>". Use the names exactly as they appear in the image.',
    'Do not add tables or columns that are not visible.',
  ].join('\n');
}
