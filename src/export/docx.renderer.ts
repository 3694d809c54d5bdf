import {
  AlignmentType,
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  TextRun,
} from 'docx';
import { format } from 'date-fns';
import { Block, DocumentModel } from './markup';

function toParagraph(block: Block): Paragraph {
  switch (block.kind) {
    case 'heading':
      return new Paragraph({ text: block.text, heading: HeadingLevel.HEADING_1 });
    case 'subheading':
      return new Paragraph({ text: block.text, heading: HeadingLevel.HEADING_2 });
    case 'emphasis':
      return new Paragraph({ children: [new TextRun({ text: block.text, bold: true })] });
    case 'paragraph':
      return new Paragraph({ text: block.text });
    case 'spacer':
      return new Paragraph({});
  }
}

export function renderDocx(model: DocumentModel): Promise<Buffer> {
  const doc = new Document({
    title: model.title,
    sections: [
      {
        children: [
          new Paragraph({
            text: model.title,
            heading: HeadingLevel.TITLE,
            alignment: AlignmentType.CENTER,
          }),
          new Paragraph({
            text: `Generated on ${format(model.generatedAt, 'dd/MM/yyyy HH:mm')}`,
            alignment: AlignmentType.RIGHT,
          }),
          new Paragraph({}),
          ...model.blocks.map(toParagraph),
        ],
      },
    ],
  });

  return Packer.toBuffer(doc);
}
