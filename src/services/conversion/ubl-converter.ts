// UBL 2.1 invoice to spreadsheet conversion
import { XMLParser } from 'fast-xml-parser';
import * as XLSX from 'xlsx';
import { MalformedInputError, errorMessage } from '../../lib/errors.js';
import { fileStem, safeName } from '../../pipeline/naming.js';
import type { ConversionResult, InvoiceConverter } from '../../shared/types/capabilities.js';

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const ARRAY_ELEMENTS = new Set(['InvoiceLine', 'TaxTotal', 'TaxSubtotal', 'Attachment', 'AllowanceCharge']);

export interface InvoiceLine {
  lineId: string;
  description: string;
  quantity: number;
  lineExtensionAmount: number;
  taxPercent: number;
}

export interface InvoiceHeader {
  invoiceId: string;
  uuid: string;
  supplierName: string;
  supplierId: string;
  customerName: string;
  issueDate: string;
  dueDate: string;
  currency: string;
  subtotal: number;
  taxTotal: number;
  totalTaxInclusive: number;
  total: number;
}

export interface ParsedInvoice {
  header: InvoiceHeader;
  lines: InvoiceLine[];
}

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function first(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

function child(node: unknown, key: string): unknown {
  const current = first(node);
  return isNode(current) ? current[key] : undefined;
}

function textAt(node: unknown, path: string[]): string {
  let current: unknown = node;
  for (const key of path) {
    current = child(current, key);
    if (current === undefined) return '';
  }

  const leaf = first(current);
  if (typeof leaf === 'string' || typeof leaf === 'number') {
    return String(leaf).trim();
  }
  if (isNode(leaf) && '#text' in leaf) {
    return String(leaf['#text']).trim();
  }
  return '';
}

function firstText(node: unknown, paths: string[][]): string {
  for (const path of paths) {
    const value = textAt(node, path);
    if (value) return value;
  }
  return '';
}

/**
 * Depth-first search for the first `key` anywhere below `node`
 */
function findFirst(node: unknown, key: string): unknown {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findFirst(item, key);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  if (!isNode(node)) return undefined;
  if (key in node) return node[key];
  for (const value of Object.values(node)) {
    const found = findFirst(value, key);
    if (found !== undefined) return found;
  }
  return undefined;
}

function toNumber(value: string): number {
  if (!value) return 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

function asArray(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function createParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    removeNSPrefix: true,
    parseTagValue: false,
    trimValues: true,
    isArray: (name) => ARRAY_ELEMENTS.has(name),
  });
}

function parseDocument(xml: string): XmlNode {
  let parsed: unknown;
  try {
    parsed = createParser().parse(xml, true);
  } catch (error) {
    throw new MalformedInputError(`Invalid XML: ${errorMessage(error)}`, { cause: error });
  }
  if (!isNode(parsed)) {
    throw new MalformedInputError('Invalid XML: no root element');
  }
  return parsed;
}

/**
 * Return the Invoice element, unwrapping a DIAN-style AttachedDocument whose
 * cac:Attachment/cac:ExternalReference/cbc:Description embeds the invoice XML.
 */
export function extractInvoiceRoot(xml: string): XmlNode {
  const document = parseDocument(xml);

  const invoice = document['Invoice'];
  if (isNode(invoice)) {
    return invoice;
  }

  const attached = document['AttachedDocument'];
  for (const attachment of asArray(child(attached, 'Attachment'))) {
    const description = textAt(attachment, ['ExternalReference', 'Description']);
    if (!description.includes('<Invoice')) continue;

    try {
      const embedded = parseDocument(description)['Invoice'];
      if (isNode(embedded)) return embedded;
    } catch (error) {
      if (!(error instanceof MalformedInputError)) throw error;
    }
  }

  throw new MalformedInputError('No embedded Invoice XML found in document');
}

export function parseInvoiceLines(invoice: XmlNode): InvoiceLine[] {
  const lines = asArray(invoice['InvoiceLine']).map((line) => ({
    lineId: textAt(line, ['ID']),
    description: textAt(line, ['Item', 'Description']),
    quantity: toNumber(textAt(line, ['InvoicedQuantity'])),
    lineExtensionAmount: toNumber(textAt(line, ['LineExtensionAmount'])),
    taxPercent: toNumber(textAt(findFirst(line, 'TaxCategory'), ['Percent'])),
  }));

  if (lines.length === 0) {
    throw new MalformedInputError('Invoice has no line items');
  }
  return lines;
}

export function parseInvoiceHeader(invoice: XmlNode): InvoiceHeader {
  const supplier = ['AccountingSupplierParty', 'Party'];
  const customer = ['AccountingCustomerParty', 'Party'];

  const taxTotal = asArray(invoice['TaxTotal']).reduce<number>(
    (sum, tax) => sum + toNumber(textAt(tax, ['TaxAmount'])),
    0
  );

  return {
    invoiceId: textAt(invoice, ['ID']),
    uuid: textAt(invoice, ['UUID']),
    supplierName: firstText(invoice, [
      [...supplier, 'PartyTaxScheme', 'RegistrationName'],
      [...supplier, 'PartyLegalEntity', 'RegistrationName'],
      [...supplier, 'PartyName', 'Name'],
    ]),
    supplierId: firstText(invoice, [
      [...supplier, 'PartyTaxScheme', 'CompanyID'],
      [...supplier, 'PartyLegalEntity', 'CompanyID'],
    ]),
    customerName: firstText(invoice, [
      [...customer, 'PartyTaxScheme', 'RegistrationName'],
      [...customer, 'PartyName', 'Name'],
    ]),
    issueDate: textAt(invoice, ['IssueDate']),
    dueDate: textAt(invoice, ['DueDate']),
    currency: textAt(invoice, ['DocumentCurrencyCode']),
    subtotal: toNumber(textAt(invoice, ['LegalMonetaryTotal', 'LineExtensionAmount'])),
    taxTotal,
    totalTaxInclusive: toNumber(textAt(invoice, ['LegalMonetaryTotal', 'TaxInclusiveAmount'])),
    total: toNumber(textAt(invoice, ['LegalMonetaryTotal', 'PayableAmount'])),
  };
}

export function parseInvoice(xml: string): ParsedInvoice {
  const root = extractInvoiceRoot(xml);
  return {
    lines: parseInvoiceLines(root),
    header: parseInvoiceHeader(root),
  };
}

export function buildWorkbook(invoice: ParsedInvoice): Buffer {
  const workbook = XLSX.utils.book_new();

  const items = XLSX.utils.aoa_to_sheet([
    ['Line', 'Description', 'Quantity', 'Line amount', 'Tax %'],
    ...invoice.lines.map((line) => [
      line.lineId,
      line.description,
      line.quantity,
      line.lineExtensionAmount,
      line.taxPercent,
    ]),
  ]);
  XLSX.utils.book_append_sheet(workbook, items, 'Items');

  const { header } = invoice;
  const headerSheet = XLSX.utils.aoa_to_sheet([
    ['Field', 'Value'],
    ['Supplier', header.supplierName],
    ['Supplier ID', header.supplierId],
    ['Customer', header.customerName],
    ['Invoice', header.invoiceId],
    ['UUID', header.uuid],
    ['Issue date', header.issueDate],
    ['Due date', header.dueDate],
    ['Currency', header.currency],
    ['Subtotal', header.subtotal],
    ['Taxes', header.taxTotal],
    ['Total incl. taxes', header.totalTaxInclusive],
    ['Total', header.total],
  ]);
  XLSX.utils.book_append_sheet(workbook, headerSheet, 'Header');

  return Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
}

/**
 * Default converter: one workbook per invoice, named after the invoice id.
 */
export class UblInvoiceConverter implements InvoiceConverter {
  async convert(xml: Buffer, sourceName: string): Promise<ConversionResult> {
    const invoice = parseInvoice(xml.toString('utf-8'));
    const invoiceId = invoice.header.invoiceId || fileStem(sourceName);
    const reference = safeName(invoiceId);

    return {
      invoiceId,
      files: [
        {
          name: `${reference}.xlsx`,
          mimeType: XLSX_MIME_TYPE,
          content: buildWorkbook(invoice),
        },
      ],
    };
  }
}
