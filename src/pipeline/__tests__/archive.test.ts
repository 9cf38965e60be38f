import { describe, expect, test } from 'vitest';
import { MalformedInputError } from '../../lib/errors.js';
import { buildZip, ublInvoiceXml } from '../../../tests/helpers/test-fixtures.js';
import { FakeConverter } from '../../../tests/helpers/mock-clients.js';
import { convertArchive, readZipEntries } from '../archive.js';
import { fileStem, hasExtension, safeName } from '../naming.js';

describe('naming helpers', () => {
  test('safeName replaces reserved characters and trims dots', () => {
    expect(safeName('FE/2024:001')).toBe('FE_2024_001');
    expect(safeName('  ..INV-7.. ')).toBe('INV-7');
    expect(safeName('...', 'fallback')).toBe('fallback');
  });

  test('fileStem strips directories and the last extension', () => {
    expect(fileStem('nested/dir/FE-10.xml')).toBe('FE-10');
    expect(fileStem('archive.tar.gz')).toBe('archive.tar');
    expect(fileStem('.hidden')).toBe('.hidden');
  });

  test('hasExtension ignores case', () => {
    expect(hasExtension('INVOICE.ZIP', '.zip')).toBe(true);
    expect(hasExtension('invoice.zip.txt', '.zip')).toBe(false);
  });
});

describe('readZipEntries', () => {
  test('lists file entries in archive order', async () => {
    const zip = await buildZip([
      ['b.xml', '<b/>'],
      ['a.pdf', 'pdf'],
    ]);

    const entries = await readZipEntries(zip);

    expect(entries.map((entry) => entry.name)).toEqual(['b.xml', 'a.pdf']);
    expect(entries[1].content.toString('utf-8')).toBe('pdf');
  });

  test('rejects data that is not a ZIP archive', async () => {
    await expect(readZipEntries(Buffer.from('not a zip'))).rejects.toBeInstanceOf(MalformedInputError);
  });
});

describe('convertArchive', () => {
  test('converts the invoice XML and carries the PDF along', async () => {
    const zip = await buildZip([
      ['docs/FE-10.pdf', Buffer.from('%PDF-1.4')],
      ['docs/FE-10.xml', ublInvoiceXml({ id: 'FE-10' })],
    ]);

    const result = await convertArchive(zip, new FakeConverter());

    expect(result.invoiceId).toBe('FE-10');
    expect(result.xmlName).toBe('docs/FE-10.xml');
    expect(result.files.map((file) => file.name)).toEqual(['FE-10.xlsx']);
    expect(result.pdf).toMatchObject({ name: 'FE-10.pdf', mimeType: 'application/pdf' });
  });

  test('skips XML entries the converter rejects', async () => {
    const converter = new FakeConverter();
    const zip = await buildZip([
      ['signature.xml', '<Signature/>'],
      ['invoice.xml', ublInvoiceXml({ id: 'FE-11' })],
    ]);

    const result = await convertArchive(zip, converter);

    expect(result.invoiceId).toBe('FE-11');
    expect(converter.calls).toBe(2);
  });

  test('fails when the archive holds no XML', async () => {
    const zip = await buildZip([['readme.txt', 'hello']]);
    await expect(convertArchive(zip, new FakeConverter())).rejects.toThrow('No XML file found inside the ZIP archive');
  });

  test('fails when no XML entry is an invoice', async () => {
    const zip = await buildZip([['signature.xml', '<Signature/>']]);
    await expect(convertArchive(zip, new FakeConverter())).rejects.toBeInstanceOf(MalformedInputError);
  });
});
