import { ColumnDef, Schema, SchemaSource, TableDef } from './types';

const CREATE_TABLE =
  /create\s+(?:temp(?:orary)?\s+)?table\s+(?:if\s+not\s+exists\s+)?((?:[`"[]?[\w$]+[`"\]]?\s*\.\s*)?[`"[]?[\w$]+[`"\]]?)\s*\(/gi;

const TABLE_CONSTRAINT = /^(?:constraint|primary\s+key|foreign\s+key|unique|check|index|key|fulltext)\b/i;

const TYPE_WORD =
  /^\(?\s*(?:int\w*|bigint|smallint|tinyint|serial|bigserial|varchar|nvarchar|char|character|text|string|uuid|bool(?:ean)?|date|datetime|time|timestamp\w*|decimal|numeric|number|float\w*|double|real|money|json\w*|blob|binary|varbinary|bytea|enum)\b/i;

const CONSTRAINT_WORDS = '(?:primary key|foreign key|not null|null|unique|pk|fk|auto_?increment|indexed)';
const CONSTRAINT_GROUP = new RegExp(`\\s*\\(\\s*${CONSTRAINT_WORDS}(?:\\s*,\\s*${CONSTRAINT_WORDS})*\\s*\\)`, 'gi');

const HEADER_PREFIX =
  /^(?:table|entity)\b\s*(?:name\s*(?=[:\-–]))?[:\-–]?\s*[`"']?([A-Za-z_][\w$.]*)[`"']?\s*:?(?:\s*\(.*\))?\s*$/i;
const HEADER_SUFFIX = /^[`"']?([A-Za-z_][\w$.]*)[`"']?\s+(?:table|entity)\s*:?\s*$/i;
const COMPACT = /^[`"]?([A-Za-z_][\w$.]*)[`"]?\s*\((.+)\)\s*;?$/;
const BULLET = /^(?:[-*•+]|\d+[.)])\s+/;

/**
 * Builds a schema from parsed tables. Names are unique case-insensitively;
 * a repeated table or column replaces the earlier one in its original position.
 */
export function createSchema(tables: TableDef[], source: SchemaSource): Schema {
  const byName = new Map<string, TableDef>();
  for (const table of tables) {
    const columns = new Map<string, ColumnDef>();
    for (const c of table.columns) columns.set(c.name.toLowerCase(), { name: c.name, type: c.type });
    byName.set(table.name.toLowerCase(), { name: table.name, columns: [...columns.values()] });
  }
  return { tables: [...byName.values()], source, verified: source !== 'image' };
}

export function formatSchema(schema: Pick<Schema, 'tables'>): string {
  return schema.tables
    .map((t) =>
      [`Table: ${t.name}`, ...t.columns.map((c) => (c.type ? `  - ${c.name}: ${c.type}` : `  - ${c.name}`))].join(
        '\n',
      ),
    )
    .join('\n\n');
}

/**
 * Loose schema reader. Understands CREATE TABLE statements, the
 * `Table: name` / `- column: TYPE` listing, `name(col TYPE, ...)` one-liners,
 * and the looser prose vision models tend to produce. Returns whatever tables
 * it recognised, possibly none.
 */
export function parseSchemaText(text: string): TableDef[] {
  if (/\bcreate\s+(?:temp(?:orary)?\s+)?table\b/i.test(text)) {
    const tables = parseDdl(text);
    if (tables.length > 0) return tables;
  }
  return parseListing(text);
}

export function parseDdl(ddl: string): TableDef[] {
  const text = stripSqlComments(ddl);
  const tables: TableDef[] = [];
  for (const match of text.matchAll(CREATE_TABLE)) {
    const start = (match.index ?? 0) + match[0].length;
    const body = readParenthesized(text, start);
    const columns = splitTopLevel(body)
      .map(parseColumnDefinition)
      .filter((c): c is ColumnDef => c !== undefined);
    tables.push({ name: unquote(match[1]), columns });
  }
  return tables;
}

function parseListing(text: string): TableDef[] {
  const tables: TableDef[] = [];
  let current: TableDef | undefined;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;

    const compact = COMPACT.exec(line);
    if (compact) {
      const columns = splitTopLevel(compact[2])
        .map(parseColumnDefinition)
        .filter((c): c is ColumnDef => c !== undefined);
      if (columns.length > 0) {
        tables.push({ name: compact[1], columns });
        current = undefined;
        continue;
      }
    }

    const header = matchHeader(line);
    if (header) {
      current = { name: header, columns: [] };
      tables.push(current);
      continue;
    }

    if (/^(?:#|--|\/\/)/.test(line) || !current) continue;

    const column = matchColumn(line);
    if (column) current.columns.push(column);
  }
  return tables;
}

function matchHeader(line: string): string | undefined {
  const plain = line.replace(/^[#>*\s]+/, '').replace(/\*\*/g, '').trim();
  const m = HEADER_PREFIX.exec(plain) ?? HEADER_SUFFIX.exec(plain);
  return m ? m[1] : undefined;
}

function matchColumn(line: string): ColumnDef | undefined {
  const bulleted = BULLET.test(line);
  const body = line.replace(BULLET, '').replace(/\*\*/g, '').replace(/[,;]\s*$/, '').trim();

  const withColon = /^[`"']?([A-Za-z_][\w$]*)[`"']?\s*:\s*(.*)$/.exec(body);
  if (withColon) return { name: withColon[1], type: cleanType(withColon[2]) };

  const spaced = /^[`"']?([A-Za-z_][\w$]*)[`"']?(?:\s+(.*))?$/.exec(body);
  if (!spaced) return undefined;
  const rest = spaced[2] ?? '';
  if ((bulleted && !rest) || TYPE_WORD.test(rest)) return { name: spaced[1], type: cleanType(rest) };
  return undefined;
}

function parseColumnDefinition(entry: string): ColumnDef | undefined {
  const def = entry.trim();
  if (!def || TABLE_CONSTRAINT.test(def)) return undefined;
  const m = /^[`"[]?([A-Za-z_][\w$]*)[`"\]]?(?:\s+(.*))?$/s.exec(def);
  if (!m) return undefined;
  const type = /^[A-Za-z_]\w*(?:\s*\([^)]*\))?/.exec(m[2] ?? '');
  return { name: m[1], type: type ? type[0].replace(/\s+/g, '') : '' };
}

function cleanType(raw: string): string {
  return raw
    .replace(CONSTRAINT_GROUP, '')
    .replace(/^\(\s*(.*?)\s*\)$/, '$1')
    .replace(/[,;]\s*$/, '')
    .trim();
}

function stripSqlComments(sql: string): string {
  return sql.replace(/--[^\n]*/g, '').replace(/\/\*[\s\S]*?\*\//g, '');
}

function unquote(name: string): string {
  return name.replace(/[`"[\]\s]/g, '');
}

/** Content from `start` up to the parenthesis that closes an already-open one. */
function readParenthesized(text: string, start: number): string {
  let depth = 1;
  let quote: string | undefined;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = undefined;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')' && --depth === 0) {
      return text.slice(start, i);
    }
  }
  return text.slice(start);
}

function splitTopLevel(body: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let from = 0;
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (quote) {
      if (ch === quote) quote = undefined;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
    } else if (ch === ',' && depth === 0) {
      parts.push(body.slice(from, i));
      from = i + 1;
    }
  }
  parts.push(body.slice(from));
  return parts.map((p) => p.trim()).filter(Boolean);
}
