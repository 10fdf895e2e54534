import {
  INVOICE_FIELD_NAMES,
  emptyInvoiceFields,
  type InvoiceFields,
} from '../interfaces/extracted-fields.interface';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Returns the first balanced {...} substring, skipping braces inside JSON
 * strings, or null when there is none.
 */
export function firstBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

function toFieldValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Reads the model's reply into InvoiceFields.
 *
 * A reply that is not JSON is salvaged from its first balanced object; if
 * nothing parses, every field is "". Unknown keys are dropped and
 * non-string values are stringified.
 */
export function parseExtractionReply(content: string): InvoiceFields {
  let parsed = tryParse(content);
  if (!isRecord(parsed)) {
    const candidate = firstBalancedObject(content);
    parsed = candidate === null ? undefined : tryParse(candidate);
  }

  const fields = emptyInvoiceFields();
  if (!isRecord(parsed)) return fields;

  for (const name of INVOICE_FIELD_NAMES) {
    fields[name] = toFieldValue(parsed[name]);
  }
  return fields;
}
