// ZIP invoice archive extraction
import JSZip from 'jszip';
import { MalformedInputError, errorMessage } from '../lib/errors.js';
import type { ConversionResult, InvoiceConverter, OutputFile } from '../shared/types/capabilities.js';
import { hasExtension, safeName } from './naming.js';

export interface ArchiveEntry {
  name: string;
  content: Buffer;
}

export interface ConvertedArchive extends ConversionResult {
  xmlName: string;
  pdf?: OutputFile;
}

export async function readZipEntries(data: Buffer): Promise<ArchiveEntry[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    throw new MalformedInputError(`Attachment is not a valid ZIP archive: ${errorMessage(error)}`, { cause: error });
  }

  const entries: ArchiveEntry[] = [];
  for (const file of Object.values(zip.files)) {
    if (file.dir) continue;
    entries.push({ name: file.name, content: await file.async('nodebuffer') });
  }
  return entries;
}

/**
 * Convert the first XML entry the converter accepts (archive order) and
 * carry the first PDF along. Throws MalformedInputError when no entry holds
 * a convertible invoice.
 */
export async function convertArchive(data: Buffer, converter: InvoiceConverter): Promise<ConvertedArchive> {
  const entries = await readZipEntries(data);
  const xmlEntries = entries.filter((entry) => hasExtension(entry.name, '.xml'));
  if (xmlEntries.length === 0) {
    throw new MalformedInputError('No XML file found inside the ZIP archive');
  }

  const pdfEntry = entries.find((entry) => hasExtension(entry.name, '.pdf'));
  const pdf: OutputFile | undefined = pdfEntry
    ? {
        name: safeName(pdfEntry.name.split('/').pop() ?? pdfEntry.name, 'invoice.pdf'),
        mimeType: 'application/pdf',
        content: pdfEntry.content,
      }
    : undefined;

  let lastError: unknown;
  for (const entry of xmlEntries) {
    try {
      const result = await converter.convert(entry.content, entry.name);
      return { ...result, xmlName: entry.name, pdf };
    } catch (error) {
      if (!(error instanceof MalformedInputError)) throw error;
      lastError = error;
    }
  }

  throw new MalformedInputError(
    `No valid invoice XML inside the ZIP archive. Last error: ${errorMessage(lastError)}`,
    { cause: lastError }
  );
}
