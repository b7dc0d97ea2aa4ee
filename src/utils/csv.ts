import type { SObjectRecord } from '../types/salesforce.js';
import { getFieldValue } from './records.js';

// Unaliased calls to these come back under the wrapped field's name; any
// other unaliased function comes back as expr0, expr1, ...
const FIELD_NAMED_FUNCTIONS = new Set(['TOLABEL', 'CONVERTCURRENCY', 'FORMAT']);

function isWordBoundary(text: string, index: number): boolean {
  return index < 0 || index >= text.length || !/[A-Za-z0-9_]/.test(text.charAt(index));
}

/**
 * Split the top-level SELECT list of a SOQL query, skipping anything inside
 * parentheses or string literals. Returns an empty list when the query has no
 * SELECT ... FROM shape.
 */
export function splitSelectList(soql: string): string[] {
  const text = soql.trim();
  if (!/^select\b/i.test(text)) {
    return [];
  }

  const items: string[] = [];
  let depth = 0;
  let inQuote = false;
  let start = 'select'.length;

  for (let i = start; i < text.length; i++) {
    const char = text.charAt(i);

    if (inQuote) {
      if (char === '\\') {
        i++;
      } else if (char === "'") {
        inQuote = false;
      }
      continue;
    }

    if (char === "'") {
      inQuote = true;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
    } else if (depth === 0 && char === ',') {
      items.push(text.slice(start, i).trim());
      start = i + 1;
    } else if (
      depth === 0 &&
      /^from\b/i.test(text.slice(i, i + 5)) &&
      isWordBoundary(text, i - 1) &&
      isWordBoundary(text, i + 4)
    ) {
      items.push(text.slice(start, i).trim());
      return items.filter((item) => item.length > 0);
    }
  }

  return [];
}

/**
 * Column keys for a SOQL query, in SELECT order, as they appear on returned
 * records. Sub-queries and TYPEOF clauses are left out.
 */
export function extractSelectFields(soql: string): string[] {
  const columns: string[] = [];
  let expressionIndex = 0;

  for (const item of splitSelectList(soql)) {
    if (item.startsWith('(') || /^typeof\b/i.test(item)) {
      continue;
    }

    const call = /^([A-Za-z_]+)\s*\((.*)\)\s*([A-Za-z_][A-Za-z0-9_]*)?$/.exec(item);
    if (!call) {
      columns.push(item);
      continue;
    }

    const [, functionName = '', argument = '', alias] = call;
    const wrapsField = FIELD_NAMED_FUNCTIONS.has(functionName.toUpperCase()) && !argument.includes('(');
    if (alias) {
      columns.push(alias);
    } else if (wrapsField) {
      columns.push(argument.trim());
    } else {
      columns.push(`expr${expressionIndex++}`);
    }
  }

  return columns;
}

export function csvCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Render records as CSV with the given columns as header, one line per record
 */
export function toCsv(columns: string[], records: SObjectRecord[]): string {
  const lines = [columns.map(csvCell).join(',')];
  for (const record of records) {
    lines.push(columns.map((column) => csvCell(getFieldValue(record, column))).join(','));
  }
  return lines.join('\n');
}
