export type SchemaSource = 'sample' | 'custom' | 'template' | 'image';

export type ColumnDef = { name: string; type: string };

export type TableDef = {
  name: string;
  columns: ColumnDef[];
};

export type Schema = {
  tables: TableDef[];
  source: SchemaSource;
  // false only for image-derived schemas the user has not confirmed yet
  verified: boolean;
};

export type QueryCandidate = {
  id: string;
  question: string;
  sql: string;
  schema: Readonly<Schema>;
  schemaText: string;
  createdAt: string;
};

export type Scalar = string | number | bigint | boolean | null | Buffer;

export type ExecutionResult = {
  columns: string[];
  rows: Record<string, Scalar>[];
  rowCount: number;
};

export type ValidationResult =
  | { ok: true; keyword: 'SELECT' | 'WITH' }
  | { ok: false; keyword?: string; reason: string };

export type ExecutionErrorCode = 'syntax' | 'unknown_column' | 'unknown_table' | 'other';

export type ExecutionOutcome =
  | { status: 'ok'; result: ExecutionResult }
  | {
      status: 'failed';
      error: { kind: 'execution'; code: ExecutionErrorCode; message: string; suggestions: string[] };
    }
  | { status: 'skipped'; reason: 'not_requested' | 'rejected' | 'not_sample' };

export type QueryOutcome = {
  candidate: QueryCandidate;
  validation: ValidationResult;
  execution: ExecutionOutcome;
  prompt?: string;
};

export type SessionContext = {
  id: string;
  createdAt: string;
  // epoch ms of the last request that touched the session
  lastActiveAt: number;
  schema?: Schema;
  pendingSchema?: Schema;
  history: QueryCandidate[];
};

export type CompletionRequest = {
  prompt: string;
  image?: { data: Buffer; mimeType: string };
};

export interface InferenceEndpoint {
  readonly model: string;
  complete(request: CompletionRequest, options: { timeoutMs: number }): Promise<string>;
}
