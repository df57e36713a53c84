/**
 * Document extraction.
 *
 * Inline text passes through; files are read as UTF-8 text. Binary formats
 * (PDF, DOCX) need their own Extractor.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

export type DocumentSource =
  | { type: 'text'; text: string }
  | { type: 'file'; path: string };

export interface Extractor {
  extract(source: DocumentSource): Promise<string>;
}

const TEXT_EXTENSIONS = ['.txt', '.md', '.markdown', '.text'];

export function createTextExtractor(): Extractor {
  return {
    async extract(source: DocumentSource): Promise<string> {
      if (source.type === 'text') {
        return source.text;
      }

      const ext = extname(source.path).toLowerCase();
      if (!TEXT_EXTENSIONS.includes(ext)) {
        throw new Error(`Unsupported document type "${ext || 'none'}" for ${source.path}`);
      }
      return readFile(source.path, 'utf-8');
    },
  };
}
