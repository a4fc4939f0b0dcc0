import path from 'node:path';
import mammoth from 'mammoth';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { ValidationError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';

export type DocumentKind = 'pdf' | 'docx' | 'txt';

const MIME_KINDS: Record<string, DocumentKind> = {
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'text/plain': 'txt',
};

export function detectDocumentKind(fileName: string, mimeType?: string): DocumentKind {
  const ext = path.extname(fileName).toLowerCase();
  if (ext === '.pdf') return 'pdf';
  if (ext === '.docx') return 'docx';
  if (ext === '.txt' || ext === '.md') return 'txt';
  const byMime = mimeType ? MIME_KINDS[mimeType] : undefined;
  if (byMime) return byMime;
  throw new ValidationError(`Unsupported file type ${ext || mimeType || 'unknown'}; upload PDF, DOCX or TXT`);
}

const KIND_LABELS: Record<DocumentKind, string> = { pdf: 'PDF', docx: 'DOCX', txt: 'text' };

async function readWith<T>(kind: DocumentKind, fileName: string, read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (err) {
    throw new ValidationError(`Could not read ${KIND_LABELS[kind]} file`, { file_name: fileName, reason: errorMessage(err) });
  }
}

export async function extractDocumentText(buffer: Buffer, fileName: string, mimeType?: string): Promise<string> {
  const kind = detectDocumentKind(fileName, mimeType);

  if (kind === 'txt') {
    return buffer.toString('utf8').replace(/^\uFEFF/, '');
  }

  if (kind === 'docx') {
    const result = await readWith(kind, fileName, () => mammoth.extractRawText({ buffer }));
    return result.value;
  }

  const parsed = await readWith(kind, fileName, () => pdfParse(buffer));
  if (parsed.text.trim().length < 100) {
    // Likely a scanned document; there is no OCR step
    await Logger.logWarning('DocumentText', 'PDF produced very little text', {
      Endpoint: 'extractDocumentText',
      RequestPayload: { fileName, pages: parsed.numpages },
    });
  }
  return parsed.text;
}

/**
 * Normalises extracted text before it is sent to the model: collapses whitespace,
 * drops symbols other than the ones that appear in contact details and skill names
 * (c++, c#, ci/cd), and puts spaces around emails and phone numbers glued to other words.
 */
export function preprocessText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/[^\p{L}\p{N}\s_\-@.(),/+#]/gu, ' ')
    .replace(/([A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,})/g, ' $1 ')
    .replace(/(?<!\d)(1[3-9]\d{9})(?!\d)/g, ' $1 ')
    .replace(/ {2,}/g, ' ')
    .trim();
}

export function containsCjk(text: string): boolean {
  return /[\u4e00-\u9fff]/.test(text);
}
