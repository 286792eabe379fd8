import { Inject, Injectable, Logger, NotFoundException, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { APP_CONFIG, AppConfig } from './config';
import { DbService } from './db.service';
import { EmptySchemaError } from './errors';
import { createSchema, parseSchemaText } from './schema-parser';
import { Schema, SchemaSource } from './types';

export type SchemaTemplate = { name: string; schema: Schema };

/**
 * The three intake paths (demo database, typed text or a named template)
 * converge here on one Schema. Image intake lives in ImageSchemaService.
 */
@Injectable()
export class SchemaService implements OnModuleInit {
  private readonly logger = new Logger(SchemaService.name);
  private templates: SchemaTemplate[] = [];

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly db: DbService,
  ) {}

  onModuleInit() {
    const dir = path.join(this.config.demoDataDir, 'templates');
    if (!fs.existsSync(dir)) {
      this.logger.warn(`No schema templates found under ${dir}`);
      return;
    }
    this.templates = fs
      .readdirSync(dir)
      .filter((f) => f.endsWith('.txt'))
      .sort()
      .map((file) => {
        const text = fs.readFileSync(path.join(dir, file), 'utf8');
        return { name: templateTitle(file, text), schema: createSchema(parseSchemaText(text), 'template') };
      });
    this.logger.log(`Loaded ${this.templates.length} schema templates`);
  }

  sample(): Schema {
    return this.db.describeSchema();
  }

  fromText(text: string, source: SchemaSource = 'custom'): Schema {
    const schema = createSchema(parseSchemaText(text), source);
    if (schema.tables.length === 0) {
      throw new EmptySchemaError('No tables could be read from the schema text');
    }
    return schema;
  }

  listTemplates(): SchemaTemplate[] {
    return this.templates;
  }

  template(name: string): Schema {
    const found = this.templates.find((t) => t.name.toLowerCase() === name.toLowerCase());
    if (!found) throw new NotFoundException(`Unknown schema template '${name}'`);
    return found.schema;
  }
}

// A template's first line may carry its display name as "# Name".
function templateTitle(file: string, text: string): string {
  const heading = /^#\s*(.+?)\s*$/m.exec(text.split(/\r?\n/, 1)[0]);
  return heading ? heading[1] : path.basename(file, '.txt');
}
