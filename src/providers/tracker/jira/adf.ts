/**
 * Atlassian Document Format
 *
 * Jira Cloud REST v3 only accepts rich text as ADF documents.
 */

export interface AdfText {
  type: 'text';
  text: string;
}

export interface AdfParagraph {
  type: 'paragraph';
  content: AdfText[];
}

export interface AdfDocument {
  type: 'doc';
  version: 1;
  content: AdfParagraph[];
}

/**
 * Build a document with one paragraph per non-empty line.
 */
export function toAdfDocument(text: string): AdfDocument {
  const paragraphs = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map<AdfParagraph>((line) => ({ type: 'paragraph', content: [{ type: 'text', text: line }] }));

  return { type: 'doc', version: 1, content: paragraphs };
}
