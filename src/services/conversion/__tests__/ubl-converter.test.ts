import * as XLSX from 'xlsx';
import { describe, expect, test } from 'vitest';
import { MalformedInputError } from '../../../lib/errors.js';
import { attachedDocumentXml, ublInvoiceXml } from '../../../../tests/helpers/test-fixtures.js';
import { UblInvoiceConverter, extractInvoiceRoot, parseInvoice } from '../ubl-converter.js';

describe('parseInvoice', () => {
  test('reads header and line items from a UBL invoice', () => {
    const invoice = parseInvoice(
      ublInvoiceXml({
        id: 'FE-100',
        lines: [{ id: '1', description: 'Espresso machine', quantity: 1, amount: 1000, percent: 19 }],
      })
    );

    expect(invoice.header).toMatchObject({
      invoiceId: 'FE-100',
      uuid: 'uuid-FE-100',
      supplierName: 'Acme Supplies',
      supplierId: '900123456',
      customerName: 'Corner Cafe',
      issueDate: '2024-03-01',
      currency: 'COP',
      subtotal: 1000,
      taxTotal: 190,
      total: 1190,
    });
    expect(invoice.lines).toEqual([
      { lineId: '1', description: 'Espresso machine', quantity: 1, lineExtensionAmount: 1000, taxPercent: 19 },
    ]);
  });

  test('unwraps an invoice embedded in an AttachedDocument', () => {
    const root = extractInvoiceRoot(attachedDocumentXml(ublInvoiceXml({ id: 'FE-200' })));
    expect(root['ID']).toBe('FE-200');
  });

  test('rejects documents without an invoice', () => {
    expect(() => parseInvoice('<ApplicationResponse><ID>1</ID></ApplicationResponse>')).toThrow(
      'No embedded Invoice XML found in document'
    );
  });

  test('rejects invalid XML', () => {
    expect(() => parseInvoice('<Invoice><ID>1</Invoice>')).toThrow(MalformedInputError);
  });

  test('rejects an invoice without lines', () => {
    expect(() => parseInvoice(ublInvoiceXml({ id: 'FE-300', lines: [] }))).toThrow('Invoice has no line items');
  });
});

describe('UblInvoiceConverter', () => {
  test('writes an item sheet and a header sheet named after the invoice', async () => {
    const result = await new UblInvoiceConverter().convert(Buffer.from(ublInvoiceXml({ id: 'FE/400' })), 'x.xml');

    expect(result.invoiceId).toBe('FE/400');
    expect(result.files.map((file) => file.name)).toEqual(['FE_400.xlsx']);

    const workbook = XLSX.read(result.files[0].content, { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['Items', 'Header']);

    const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets['Items'], { header: 1 });
    expect(rows).toEqual([
      ['Line', 'Description', 'Quantity', 'Line amount', 'Tax %'],
      ['1', 'Coffee beans 500g', 2, 30000, 19],
      ['2', 'Paper filters', 1, 5000, 19],
    ]);
  });

  test('falls back to the file stem when the invoice has no id', async () => {
    const xml = ublInvoiceXml({ id: '' });
    const result = await new UblInvoiceConverter().convert(Buffer.from(xml), 'docs/FE-500.xml');
    expect(result.invoiceId).toBe('FE-500');
  });
});
