import { buildSchemaExtractionPrompt, buildSqlPrompt } from './prompt-builder';
import { createSchema } from './schema-parser';

const schema = createSchema(
  [
    {
      name: 'staff',
      columns: [
        { name: 'emp_no', type: 'INT' },
        { name: 'full_name', type: 'TEXT' },
        { name: 'dept_code', type: 'TEXT' },
      ],
    },
    { name: 'departments', columns: [{ name: 'code', type: 'TEXT' }, { name: 'title', type: 'TEXT' }] },
  ],
  'custom',
);

function occurrences(text: string, word: string): number {
  return text.match(new RegExp(`\\b${word}\\b`, 'g'))?.length ?? 0;
}

describe('buildSqlPrompt', () => {
  const question = 'Who earns the most?';
  const prompt = buildSqlPrompt(schema, question);

  it('lays out task, schema, question and instructions in order', () => {
    expect(prompt.startsWith(
      '### Task\nConvert the following natural language question to a SQL query.\n\n### Database Schema\nTable: staff\n  - emp_no: INT\n',
    )).toBe(true);
    expect(prompt).toContain('### Question\nWho earns the most?\n\n### Instructions\n');
    expect(prompt.endsWith('### SQL Query\n')).toBe(true);
  });

  it('mentions every table and column exactly once', () => {
    for (const name of ['staff', 'emp_no', 'full_name', 'dept_code', 'departments', 'code', 'title']) {
      expect(occurrences(prompt, name)).toBe(1);
    }
  });

  it('includes the question exactly once', () => {
    expect(prompt.split(question)).toHaveLength(2);
  });
});

// Deterministic LCG so failures reproduce.
function generator(seed: number) {
  let state = seed;
  const next = () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
  const pick = <T>(items: readonly T[]): T => items[Math.floor(next() * items.length)];
  return { next, pick };
}

describe('buildSqlPrompt over generated schemas', () => {
  const fixedWords = new Set(
    (buildSqlPrompt({ tables: [] }, '').match(/\w+/g) ?? []).map((w) => w.toLowerCase()),
  );
  const types = ['INT', 'TEXT', 'DATE', 'DECIMAL(10,2)'];

  it('mentions every name and the question exactly once', () => {
    const { next, pick } = generator(7);
    const letters = 'abcdefghijklmnopqrstuvwxyz_'.split('');

    for (let round = 0; round < 50; round++) {
      const used = new Set<string>();
      const freshName = (): string => {
        for (;;) {
          let name = pick(letters.slice(0, 26));
          const length = 2 + Math.floor(next() * 9);
          for (let i = 0; i < length; i++) name += pick(letters);
          const key = name.toLowerCase();
          if (!used.has(key) && !fixedWords.has(key) && !types.includes(name.toUpperCase())) {
            used.add(key);
            return name;
          }
        }
      };

      const tables = Array.from({ length: 1 + Math.floor(next() * 4) }, () => ({
        name: freshName(),
        columns: Array.from({ length: 1 + Math.floor(next() * 5) }, () => ({ name: freshName(), type: pick(types) })),
      }));
      const question = `${Array.from({ length: 3 }, freshName).join(' ')}?`;
      const prompt = buildSqlPrompt(createSchema(tables, 'custom'), question);

      for (const name of tables.flatMap((t) => [t.name, ...t.columns.map((c) => c.name)])) {
        expect(occurrences(prompt, name)).toBe(1);
      }
      expect(prompt.split(question)).toHaveLength(2);
    }
  });

  it('documents that names shared with the fixed text collide', () => {
    expect(fixedWords.has('question')).toBe(true);
    expect(fixedWords.has('query')).toBe(true);
  });
});

describe('buildSchemaExtractionPrompt', () => {
  it('asks for the listing format the parser reads', () => {
    const prompt = buildSchemaExtractionPrompt();
    expect(prompt).toContain('"Table: <table>"');
    expect(prompt).toContain('"  - <column>: <TYPE>"');
  });
});
