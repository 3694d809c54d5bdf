export type Block =
  | { kind: 'heading'; text: string }
  | { kind: 'subheading'; text: string }
  | { kind: 'emphasis'; text: string }
  | { kind: 'paragraph'; text: string }
  | { kind: 'spacer' };

export interface DocumentModel {
  title: string;
  generatedAt: Date;
  blocks: Block[];
}

function parseLine(raw: string): Block {
  const line = raw.trim();
  if (!line) return { kind: 'spacer' };
  if (line.startsWith('## ')) return { kind: 'heading', text: line.slice(3).trim() };
  if (line.startsWith('### ')) return { kind: 'subheading', text: line.slice(4).trim() };
  if (line.length >= 4 && line.startsWith('**') && line.endsWith('**')) {
    return { kind: 'emphasis', text: line.slice(2, -2).trim() };
  }
  return { kind: 'paragraph', text: line };
}

/** One block per input line, in order. Unknown markers read as paragraphs. */
export function parseMarkup(text: string): Block[] {
  return text.split(/\r?\n/).map(parseLine);
}

export function buildDocument(
  markup: string,
  title: string,
  generatedAt: Date = new Date(),
): DocumentModel {
  return { title, generatedAt, blocks: parseMarkup(markup) };
}
