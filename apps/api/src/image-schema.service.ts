import { BadRequestException, Inject, Injectable, Logger, PayloadTooLargeException } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from './config';
import { MalformedResponseError } from './errors';
import { InferenceClient } from './inference.client';
import { buildSchemaExtractionPrompt } from './prompt-builder';
import { createSchema, parseSchemaText } from './schema-parser';
import { Schema } from './types';

export const SUPPORTED_IMAGE_TYPES = ['image/png', 'image/jpeg', 'image/gif', 'image/bmp', 'image/webp'];

export type ExtractedSchema = { schema: Schema; rawText: string };

@Injectable()
export class ImageSchemaService {
  private readonly logger = new Logger(ImageSchemaService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly inference: InferenceClient,
  ) {}

  /**
   * Best-effort: the vision model's prose is read with the same loose parser
   * used for typed schemas. The result is unverified until the user confirms it.
   */
  async extract(data: Buffer, mimeType: string): Promise<ExtractedSchema> {
    if (!SUPPORTED_IMAGE_TYPES.includes(mimeType)) {
      throw new BadRequestException(
        `Unsupported image type '${mimeType}'. Use one of: ${SUPPORTED_IMAGE_TYPES.join(', ')}`,
      );
    }
    if (data.length === 0) throw new BadRequestException('Uploaded image is empty');
    if (data.length > this.config.maxImageBytes) {
      throw new PayloadTooLargeException(`Image exceeds ${this.config.maxImageBytes} bytes`);
    }

    const rawText = await this.inference.describeImage({ data, mimeType }, buildSchemaExtractionPrompt());
    const tables = parseSchemaText(rawText).filter((t) => t.columns.length > 0);
    if (tables.length === 0) {
      this.logger.warn(`Vision output had no table/column pairs: ${rawText.slice(0, 120)}`);
      throw new MalformedResponseError('No table with columns could be read from the image description');
    }

    const schema = createSchema(tables, 'image');
    this.logger.log(`Extracted ${schema.tables.length} tables from a ${mimeType} image (unverified)`);
    return { schema, rawText };
  }
}
