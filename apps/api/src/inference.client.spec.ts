import { loadConfig } from './config';
import { MalformedResponseError, ModelLoadingError, RateLimitedError } from './errors';
import { extractSql, InferenceClient } from './inference.client';
import { validateReadOnly } from './sql-guard';
import { CompletionRequest } from './types';

function stubEndpoint(model: string) {
  return { model, complete: jest.fn<Promise<string>, [CompletionRequest, { timeoutMs: number }]>() };
}

describe('extractSql', () => {
  it('takes the fenced block and keeps the terminating semicolon', () => {
    expect(extractSql('```sql\nSELECT name FROM employees;\n```\nThis query lists names.')).toBe(
      'SELECT name FROM employees;',
    );
  });

  it('drops a label and stops at the first blank line', () => {
    expect(extractSql('SQL: SELECT *\nFROM products\nWHERE price > 100\n\nExplanation: filters by price')).toBe(
      'SELECT * FROM products WHERE price > 100',
    );
  });

  it('finds a statement embedded in prose', () => {
    expect(extractSql('Here is the query: select count(*) from sales')).toBe('select count(*) from sales');
  });

  it('prefers a keyword at the start of a line over one in prose', () => {
    expect(extractSql('Start with this:\nSELECT 1')).toBe('SELECT 1');
  });

  it('stops at a markdown heading', () => {
    expect(extractSql(' SELECT a FROM t\n### Explanation\nSELECT is used here')).toBe('SELECT a FROM t');
  });

  it('returns an empty string when there is no SQL', () => {
    expect(extractSql('I am not sure what you mean.')).toBe('');
    expect(extractSql('With pleasure! Let me know if you need anything else.')).toBe('');
  });

  it('skips a lead-in sentence that starts with a keyword', () => {
    const sql = extractSql('With the schema above, the query is:\nSELECT * FROM employees;');

    expect(sql).toBe('SELECT * FROM employees;');
    expect(validateReadOnly(sql)).toEqual({ ok: true, keyword: 'SELECT' });
    expect(extractSql('Select the rows you need:\nSELECT name FROM employees')).toBe('SELECT name FROM employees');
  });

  it('keeps common table expressions', () => {
    expect(extractSql('WITH eng AS (SELECT * FROM employees) SELECT name FROM eng;')).toBe(
      'WITH eng AS (SELECT * FROM employees) SELECT name FROM eng;',
    );
    expect(extractSql('WITH RECURSIVE n(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM n WHERE x < 3)\nSELECT x FROM n')).toBe(
      'WITH RECURSIVE n(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM n WHERE x < 3) SELECT x FROM n',
    );
  });

  it('does not end the statement at a semicolon inside a literal', () => {
    expect(extractSql("SELECT * FROM products WHERE name = 'a;b';")).toBe("SELECT * FROM products WHERE name = 'a;b';");
    expect(extractSql("SELECT name FROM employees WHERE name = 'O''Brien'; DROP TABLE employees")).toBe(
      "SELECT name FROM employees WHERE name = 'O''Brien';",
    );
  });
});

describe('InferenceClient', () => {
  const config = loadConfig({ LOADING_MAX_RETRIES: '3', LOADING_RETRY_DELAY_MS: '0', INFERENCE_TIMEOUT_MS: '1000' });
  let sqlEndpoint: ReturnType<typeof stubEndpoint>;
  let visionEndpoint: ReturnType<typeof stubEndpoint>;
  let client: InferenceClient;

  beforeEach(() => {
    sqlEndpoint = stubEndpoint('stub-sql');
    visionEndpoint = stubEndpoint('stub-vision');
    client = new InferenceClient(config, sqlEndpoint, visionEndpoint);
  });

  it('returns the extracted SQL', async () => {
    sqlEndpoint.complete.mockResolvedValue('```sql\nSELECT 1;\n```');

    await expect(client.generateSql('prompt')).resolves.toBe('SELECT 1;');
    expect(sqlEndpoint.complete).toHaveBeenCalledWith({ prompt: 'prompt' }, { timeoutMs: 1000 });
  });

  it('retries while the model is loading and then succeeds', async () => {
    sqlEndpoint.complete
      .mockRejectedValueOnce(new ModelLoadingError('Model stub-sql is loading', 20))
      .mockRejectedValueOnce(new ModelLoadingError('Model stub-sql is loading', 10))
      .mockResolvedValueOnce('SELECT 2');

    await expect(client.generateSql('prompt')).resolves.toBe('SELECT 2');
    expect(sqlEndpoint.complete).toHaveBeenCalledTimes(3);
  });

  it('gives up after the configured number of retries', async () => {
    sqlEndpoint.complete.mockRejectedValue(new ModelLoadingError('Model stub-sql is loading'));

    await expect(client.generateSql('prompt')).rejects.toBeInstanceOf(ModelLoadingError);
    expect(sqlEndpoint.complete).toHaveBeenCalledTimes(4);
  });

  it('does not retry other failures', async () => {
    sqlEndpoint.complete.mockRejectedValue(new RateLimitedError('slow down'));

    await expect(client.generateSql('prompt')).rejects.toBeInstanceOf(RateLimitedError);
    expect(sqlEndpoint.complete).toHaveBeenCalledTimes(1);
  });

  it('reports a completion without SQL as malformed', async () => {
    sqlEndpoint.complete.mockResolvedValue('I am unable to answer.');

    await expect(client.generateSql('prompt')).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('sends images to the vision endpoint', async () => {
    visionEndpoint.complete.mockResolvedValue('Table: users\n- id: INT');
    const image = { data: Buffer.from('png-bytes'), mimeType: 'image/png' };

    await expect(client.describeImage(image, 'list tables')).resolves.toBe('Table: users\n- id: INT');
    expect(visionEndpoint.complete).toHaveBeenCalledWith({ prompt: 'list tables', image }, { timeoutMs: 1000 });
    expect(sqlEndpoint.complete).not.toHaveBeenCalled();
  });
});
