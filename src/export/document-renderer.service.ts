import { Injectable, Logger } from '@nestjs/common';
import { renderDocx } from './docx.renderer';
import { DocumentModel, buildDocument } from './markup';
import { renderPdf } from './pdf.renderer';

export type ExportFormat = 'pdf' | 'docx';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['pdf', 'docx'];

export const CONTENT_TYPES: Record<ExportFormat, string> = {
  pdf: 'application/pdf',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

export interface ExportedDocument {
  format: ExportFormat;
  contentType: string;
  model: DocumentModel;
  payload: Buffer;
}

export function isExportFormat(v: string): v is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === v);
}

@Injectable()
export class DocumentRendererService {
  private readonly log = new Logger(DocumentRendererService.name);

  async render(
    markup: string,
    title: string,
    format: ExportFormat,
    now: Date = new Date(),
  ): Promise<ExportedDocument> {
    const startTime = Date.now();
    const model = buildDocument(markup, title, now);
    const payload =
      format === 'pdf' ? await renderPdf(model) : await renderDocx(model);

    this.log.log(
      `📄 Rendered ${format.toUpperCase()} "${title}" (${model.blocks.length} blocks, ${payload.length} bytes, ${Date.now() - startTime}ms)`,
    );
    return { format, contentType: CONTENT_TYPES[format], model, payload };
  }
}
