import { DocumentRendererService, isExportFormat } from './document-renderer.service';

const MARKUP = [
  '## VISIT SUMMARY',
  '**Patient:** Not specified',
  '',
  '### CHIEF COMPLAINT',
  'Headache for three days.',
].join('\n');

describe('DocumentRendererService', () => {
  const renderer = new DocumentRendererService();
  const now = new Date(2024, 0, 5, 9, 7);

  it('renders a PDF', async () => {
    const doc = await renderer.render(MARKUP, 'Visit Summary - Ana', 'pdf', now);

    expect(doc.contentType).toBe('application/pdf');
    expect(doc.payload.subarray(0, 4).toString('ascii')).toBe('%PDF');
    expect(doc.model.blocks).toHaveLength(5);
  });

  it('renders a DOCX package', async () => {
    const doc = await renderer.render(MARKUP, 'Visit Summary - Ana', 'docx', now);

    expect(doc.contentType).toBe(
      'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    );
    expect(doc.payload.subarray(0, 2).toString('ascii')).toBe('PK');
  });

  it('renders empty markup', async () => {
    const doc = await renderer.render('', 'Visit Summary - Conversation', 'pdf', now);

    expect(doc.model.blocks).toEqual([{ kind: 'spacer' }]);
    expect(doc.payload.length).toBeGreaterThan(0);
  });
});

describe('isExportFormat', () => {
  it.each([
    ['pdf', true],
    ['docx', true],
    ['PDF', false],
    ['txt', false],
  ])('%s -> %s', (v, expected) => {
    expect(isExportFormat(v)).toBe(expected);
  });
});
