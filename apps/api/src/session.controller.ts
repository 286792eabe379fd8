import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Post,
  Put,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { z } from 'zod';
import { ImageSchemaService } from './image-schema.service';
import { formatSchema } from './schema-parser';
import { SchemaService } from './schema.service';
import { SessionStore } from './session.store';
import { toSessionView } from './session.view';
import { ZodValidationPipe } from './zod-validation.pipe';

const SchemaBody = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('sample') }),
  z.object({ mode: z.literal('custom'), text: z.string().trim().min(1).max(50_000) }),
  z.object({ mode: z.literal('template'), name: z.string().trim().min(1) }),
]);
type SchemaBody = z.infer<typeof SchemaBody>;

const ConfirmBody = z.object({ text: z.string().trim().min(1).max(50_000).optional() });
type ConfirmBody = z.infer<typeof ConfirmBody>;

@Controller('api/sessions')
export class SessionController {
  constructor(
    private readonly sessions: SessionStore,
    private readonly schemas: SchemaService,
    private readonly images: ImageSchemaService,
  ) {}

  @Post()
  create() {
    return toSessionView(this.sessions.create(this.schemas.sample()));
  }

  @Get(':id')
  get(@Param('id') id: string) {
    return toSessionView(this.sessions.get(id));
  }

  @Delete(':id')
  @HttpCode(204)
  remove(@Param('id') id: string) {
    this.sessions.delete(id);
  }

  @Put(':id/schema')
  setSchema(@Param('id') id: string, @Body(new ZodValidationPipe(SchemaBody)) body: SchemaBody) {
    this.sessions.get(id);
    switch (body.mode) {
      case 'sample':
        return toSessionView(this.sessions.setSchema(id, this.schemas.sample()));
      case 'custom':
        return toSessionView(this.sessions.setSchema(id, this.schemas.fromText(body.text)));
      case 'template':
        return toSessionView(this.sessions.setSchema(id, this.schemas.template(body.name)));
    }
  }

  @Post(':id/schema/image')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('image'))
  async uploadImage(@Param('id') id: string, @UploadedFile() file: Express.Multer.File | undefined) {
    this.sessions.get(id);
    if (!file) throw new BadRequestException("Attach the image as the multipart field 'image'");

    const { schema, rawText } = await this.images.extract(file.buffer, file.mimetype);
    this.sessions.setPendingSchema(id, schema);
    return { pendingSchema: schema, schemaText: formatSchema(schema), rawText };
  }

  @Post(':id/schema/confirm')
  @HttpCode(200)
  confirm(@Param('id') id: string, @Body(new ZodValidationPipe(ConfirmBody)) body: ConfirmBody) {
    const edited = body.text === undefined ? undefined : this.schemas.fromText(body.text, 'image');
    return toSessionView(this.sessions.confirmPending(id, edited));
  }
}
