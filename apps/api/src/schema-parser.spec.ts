import { createSchema, formatSchema, parseSchemaText } from './schema-parser';

describe('parseSchemaText', () => {
  it('reads CREATE TABLE statements and skips table constraints', () => {
    const ddl = `
      CREATE TABLE users (
        id INT PRIMARY KEY,
        email VARCHAR(255) NOT NULL,
        created_at TIMESTAMP
      );
      -- orders belong to users
      CREATE TABLE orders (id INT, user_id INT, total DECIMAL(10, 2), FOREIGN KEY (user_id) REFERENCES users(id));
    `;

    expect(parseSchemaText(ddl)).toEqual([
      {
        name: 'users',
        columns: [
          { name: 'id', type: 'INT' },
          { name: 'email', type: 'VARCHAR(255)' },
          { name: 'created_at', type: 'TIMESTAMP' },
        ],
      },
      {
        name: 'orders',
        columns: [
          { name: 'id', type: 'INT' },
          { name: 'user_id', type: 'INT' },
          { name: 'total', type: 'DECIMAL(10,2)' },
        ],
      },
    ]);
  });

  it('reads the Table: / - column: TYPE listing and drops constraint notes', () => {
    const text = [
      '# Billing',
      '',
      'Table: customers',
      '  - id: INT',
      '  - name: VARCHAR(100) (NOT NULL)',
      '',
      'Table: invoices',
      '  - id: INT',
      '  - customer_id: INT (FK)',
    ].join('\n');

    expect(parseSchemaText(text)).toEqual([
      { name: 'customers', columns: [{ name: 'id', type: 'INT' }, { name: 'name', type: 'VARCHAR(100)' }] },
      { name: 'invoices', columns: [{ name: 'id', type: 'INT' }, { name: 'customer_id', type: 'INT' }] },
    ]);
  });

  it('reads compact one-line tables with or without types', () => {
    expect(parseSchemaText('users(id INT, email TEXT)\norders(id, user_id)')).toEqual([
      { name: 'users', columns: [{ name: 'id', type: 'INT' }, { name: 'email', type: 'TEXT' }] },
      { name: 'orders', columns: [{ name: 'id', type: '' }, { name: 'user_id', type: '' }] },
    ]);
  });

  it('reads loose model prose and ignores sentences', () => {
    const text = ['**Table: Employees**', '- employee_id (INT)', '2. full_name VARCHAR', 'Some description here'].join(
      '\n',
    );

    expect(parseSchemaText(text)).toEqual([
      {
        name: 'Employees',
        columns: [
          { name: 'employee_id', type: 'INT' },
          { name: 'full_name', type: 'VARCHAR' },
        ],
      },
    ]);
  });

  it('returns no tables for text without any', () => {
    expect(parseSchemaText('just some words')).toEqual([]);
    expect(parseSchemaText('')).toEqual([]);
  });
});

describe('createSchema', () => {
  it('keeps one entry per name, case-insensitively, in first position', () => {
    const schema = createSchema(
      [
        { name: 'Users', columns: [{ name: 'id', type: 'INT' }, { name: 'ID', type: 'BIGINT' }] },
        { name: 'orders', columns: [] },
        { name: 'users', columns: [{ name: 'email', type: 'TEXT' }] },
      ],
      'custom',
    );

    expect(schema).toEqual({
      tables: [
        { name: 'users', columns: [{ name: 'email', type: 'TEXT' }] },
        { name: 'orders', columns: [] },
      ],
      source: 'custom',
      verified: true,
    });
  });

  it('marks image-derived schemas unverified', () => {
    expect(createSchema([], 'image').verified).toBe(false);
    expect(createSchema([], 'template').verified).toBe(true);
  });
});

describe('formatSchema', () => {
  it('renders one block per table', () => {
    const text = formatSchema({
      tables: [
        { name: 't', columns: [{ name: 'a', type: 'INT' }, { name: 'b', type: '' }] },
        { name: 'u', columns: [] },
      ],
    });

    expect(text).toBe('Table: t\n  - a: INT\n  - b\n\nTable: u');
  });

  it('round-trips through the listing parser', () => {
    const schema = createSchema(
      [{ name: 'products', columns: [{ name: 'price', type: 'DECIMAL(10,2)' }, { name: 'name', type: 'TEXT' }] }],
      'custom',
    );
    expect(parseSchemaText(formatSchema(schema))).toEqual(schema.tables);
  });
});
