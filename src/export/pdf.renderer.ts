import PDFDocument from 'pdfkit';
import { format } from 'date-fns';
import { Block, DocumentModel } from './markup';

type TextStyle = {
  font: string;
  size: number;
  color: string;
  gapBefore: number;
  gapAfter: number;
};

const STYLES: Record<'title' | 'heading' | 'subheading' | 'emphasis' | 'paragraph', TextStyle> = {
  title: { font: 'Helvetica-Bold', size: 18, color: '#1565c0', gapBefore: 0, gapAfter: 30 },
  heading: { font: 'Helvetica-Bold', size: 14, color: '#2196f3', gapBefore: 20, gapAfter: 12 },
  subheading: { font: 'Helvetica-Bold', size: 12, color: '#42a5f5', gapBefore: 15, gapAfter: 8 },
  emphasis: { font: 'Helvetica-Bold', size: 11, color: '#000000', gapBefore: 0, gapAfter: 8 },
  paragraph: { font: 'Helvetica', size: 11, color: '#000000', gapBefore: 0, gapAfter: 8 },
};

function write(
  doc: PDFKit.PDFDocument,
  text: string,
  style: TextStyle,
  align: 'left' | 'center' = 'left',
) {
  if (style.gapBefore) doc.y += style.gapBefore;
  doc
    .font(style.font)
    .fontSize(style.size)
    .fillColor(style.color)
    .text(text, { align, paragraphGap: style.gapAfter, lineGap: 2 });
}

function writeBlock(doc: PDFKit.PDFDocument, block: Block) {
  if (block.kind === 'spacer') {
    doc.y += 6;
    return;
  }
  write(doc, block.text, STYLES[block.kind]);
}

/** A4 pages with one-inch margins. */
export function renderPdf(model: DocumentModel): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: 'A4',
      margins: { top: 72, bottom: 72, left: 72, right: 72 },
      info: { Title: model.title, CreationDate: model.generatedAt },
    });

    const chunks: Buffer[] = [];
    doc.on('data', (c: Buffer) => chunks.push(c));
    doc.on('error', reject);
    doc.on('end', () => resolve(Buffer.concat(chunks)));

    write(doc, model.title, STYLES.title, 'center');
    write(
      doc,
      `Generated on ${format(model.generatedAt, 'dd/MM/yyyy HH:mm')}`,
      { ...STYLES.paragraph, gapAfter: 20 },
    );

    for (const block of model.blocks) writeBlock(doc, block);

    doc.end();
  });
}
