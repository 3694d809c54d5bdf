import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  Post,
  Query,
  StreamableFile,
} from '@nestjs/common';
import { isExportFormat } from '../export/document-renderer.service';
import { DocumentsService, ExportSource } from '../pipeline/documents.service';
import { RecordingsService } from '../pipeline/recordings.service';
import { requireOwner } from './owner';

@Controller('recordings')
export class DocumentsController {
  constructor(
    private recordings: RecordingsService,
    private documents: DocumentsService,
  ) {}

  @Post(':id/summary')
  async summarize(
    @Param('id') id: string,
    @Body('ownerId') ownerIdStr?: string,
    @Body('instruction') instruction?: string,
  ) {
    const recording = await this.recordings.findOwned(requireOwner(ownerIdStr), id);
    const summary = await this.documents.summarize(recording, instruction);
    return {
      ok: true,
      message: !summary.generated
        ? 'Nothing to summarize, transcript returned unchanged'
        : summary.customInstruction
          ? 'Summary generated (custom instruction)'
          : 'Summary generated',
      summary,
    };
  }

  @Get(':id/export')
  async export(
    @Param('id') id: string,
    @Query('ownerId') ownerIdStr?: string,
    @Query('format') formatStr = 'pdf',
    @Query('source') sourceStr = 'summary',
  ) {
    if (!isExportFormat(formatStr)) {
      throw new BadRequestException('format must be pdf or docx');
    }
    if (sourceStr !== 'summary' && sourceStr !== 'transcript') {
      throw new BadRequestException('source must be summary or transcript');
    }
    const source: ExportSource = sourceStr;

    const recording = await this.recordings.findOwned(requireOwner(ownerIdStr), id);
    const doc = await this.documents.export(recording, formatStr, source);

    return new StreamableFile(doc.payload, {
      type: doc.contentType,
      disposition: `attachment; filename="${doc.filename}"`,
      length: doc.payload.length,
    });
  }
}
