/**
 * Declared table objects in OOXML workbooks
 *
 * SheetJS does not surface table parts, so they are resolved from the
 * archive directly:
 * - `xl/workbook.xml` maps sheet names to relationship ids
 * - `xl/_rels/workbook.xml.rels` maps those ids to worksheet parts
 * - `xl/worksheets/_rels/sheetN.xml.rels` links a worksheet to its tables
 * - `xl/tables/tableN.xml` declares name, range, header and totals rows
 */

import path from 'node:path';
import { DOMParser } from '@xmldom/xmldom';
import type { TableDefinition } from '@/lib/types';
import { parseRangeAddress } from '@/lib/utils';
import { readArchiveEntries } from './archive';

// ============================================================================
// Configuration
// ============================================================================

const WORKBOOK_PART = 'xl/workbook.xml';
const WORKBOOK_RELS_PART = 'xl/_rels/workbook.xml.rels';
const SHEET_RELS_PATTERN = /^xl\/worksheets\/_rels\/[^/]+\.xml\.rels$/;
const TABLE_PART_PATTERN = /^xl\/tables\/[^/]+\.xml$/;
const TABLE_RELATIONSHIP_SUFFIX = '/table';

// ============================================================================
// Main Reader
// ============================================================================

/**
 * Read declared tables from an .xlsx buffer, keyed by sheet name
 */
export async function readTableDefinitions(buffer: Buffer): Promise<Map<string, TableDefinition[]>> {
  const parts = await readArchiveEntries(
    buffer,
    (fileName) =>
      fileName === WORKBOOK_PART ||
      fileName === WORKBOOK_RELS_PART ||
      SHEET_RELS_PATTERN.test(fileName) ||
      TABLE_PART_PATTERN.test(fileName)
  );

  return resolveTableDefinitions(parts);
}

/**
 * Resolve table definitions from already-extracted archive parts
 */
export function resolveTableDefinitions(parts: Map<string, string>): Map<string, TableDefinition[]> {
  const result = new Map<string, TableDefinition[]>();

  const workbookXml = parts.get(WORKBOOK_PART);
  const workbookRelsXml = parts.get(WORKBOOK_RELS_PART);
  if (!workbookXml || !workbookRelsXml) {
    return result;
  }

  const workbookRels = parseRelationships(workbookRelsXml, 'xl');

  for (const sheet of elements(parseXml(workbookXml), 'sheet')) {
    const sheetName = sheet.getAttribute('name');
    const relId = sheet.getAttribute('r:id');
    if (!sheetName || !relId) continue;

    const sheetPart = workbookRels.get(relId)?.target;
    if (!sheetPart) continue;

    const relsPath = path.posix.join(
      path.posix.dirname(sheetPart),
      '_rels',
      `${path.posix.basename(sheetPart)}.rels`
    );
    const sheetRelsXml = parts.get(relsPath);
    if (!sheetRelsXml) continue;

    const definitions: TableDefinition[] = [];
    const sheetRels = parseRelationships(sheetRelsXml, path.posix.dirname(sheetPart));

    for (const rel of sheetRels.values()) {
      if (!rel.type.endsWith(TABLE_RELATIONSHIP_SUFFIX)) continue;

      const tableXml = parts.get(rel.target);
      if (!tableXml) {
        console.warn(`[Loader] Table part ${rel.target} referenced by "${sheetName}" is missing`);
        continue;
      }

      const definition = parseTablePart(tableXml);
      if (definition) {
        definitions.push(definition);
      }
    }

    if (definitions.length > 0) {
      result.set(sheetName, definitions);
    }
  }

  return result;
}

// ============================================================================
// Part Parsers
// ============================================================================

interface Relationship {
  type: string;
  /** Archive path of the target part */
  target: string;
}

/**
 * Parse a .rels part; targets are resolved against `baseDir`
 */
function parseRelationships(xml: string, baseDir: string): Map<string, Relationship> {
  const rels = new Map<string, Relationship>();

  for (const rel of elements(parseXml(xml), 'Relationship')) {
    const id = rel.getAttribute('Id');
    const target = rel.getAttribute('Target');
    if (!id || !target) continue;

    rels.set(id, {
      type: rel.getAttribute('Type') ?? '',
      target: resolvePartPath(baseDir, target),
    });
  }

  return rels;
}

/**
 * Parse a single `xl/tables/tableN.xml` part
 */
export function parseTablePart(xml: string): TableDefinition | null {
  const table = elements(parseXml(xml), 'table')[0];
  if (!table) return null;

  const ref = table.getAttribute('ref');
  if (!ref) return null;

  const name = table.getAttribute('name') ?? '';
  const displayName = table.getAttribute('displayName') || name;

  const columns = elements(table, 'tableColumn').map((col) => col.getAttribute('name') ?? '');

  return {
    name: displayName || name,
    displayName,
    ref,
    bounds: parseRangeAddress(ref),
    headerRowCount: parseCount(table.getAttribute('headerRowCount'), 1),
    totalsRowCount: parseCount(table.getAttribute('totalsRowCount'), 0),
    columns,
  };
}

// ============================================================================
// XML Helpers
// ============================================================================

function parseXml(xml: string): Document {
  return new DOMParser().parseFromString(xml, 'text/xml');
}

function elements(node: Document | Element, tagName: string): Element[] {
  return Array.from(node.getElementsByTagName(tagName));
}

function parseCount(value: string | null, fallback: number): number {
  if (value === null || value === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

function resolvePartPath(baseDir: string, target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }
  return path.posix.normalize(path.posix.join(baseDir, target));
}
