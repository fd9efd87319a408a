/**
 * Progress events and their server-sent-event framing.
 *
 * Each event goes out as one `data: <json>\n\n` chunk. The JSON body uses
 * ", " and ": " separators, \uXXXX escapes for non-ASCII characters and
 * float notation for scores (0.0, 1e-05), which is the byte format existing
 * stream consumers were built against.
 */

import type { ImprovementResult, ProgressEvent, ProgressStage } from '../types';

export const STAGE_MESSAGES: Record<ProgressStage, string> = {
  starting: 'Validating data completeness...',
  parsing: 'Parsing resume content...',
  scoring: 'Calculating compatibility score...',
  improving: 'Improving resume content...',
  generating: 'Generating preview...'
};

export function stageEvent(stage: ProgressStage): ProgressEvent {
  return { status: stage, message: STAGE_MESSAGES[stage] };
}

export function completedEvent(data: ImprovementResult): ProgressEvent {
  return { status: 'completed', data };
}

export function errorEvent(message: string): ProgressEvent {
  return { status: 'error', message };
}

export function isTerminalEvent(event: ProgressEvent): boolean {
  return event.status === 'completed' || event.status === 'error';
}

function escapeNonAscii(json: string): string {
  return json.replace(/[\u0080-\uffff]/g, char =>
    `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/** Result fields that are floating point on the wire */
export const FLOAT_FIELDS: ReadonlySet<string> = new Set(['original_score', 'new_score']);

/**
 * Shortest round-trip digits, always with a fraction or an exponent:
 * fixed notation for exponents -4 to 15, otherwise d.ddde+XX.
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  if (Object.is(value, -0)) {
    return '-0.0';
  }

  const sign = value < 0 ? '-' : '';
  const [mantissa, exponentText] = Math.abs(value).toExponential().split('e');
  const exponent = Number(exponentText);
  const digits = mantissa.replace('.', '');

  if (exponent < -4 || exponent >= 16) {
    const significand = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
    const exponentSign = exponent < 0 ? '-' : '+';
    return `${sign}${significand}e${exponentSign}${String(Math.abs(exponent)).padStart(2, '0')}`;
  }

  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  const integerPart = digits.slice(0, exponent + 1).padEnd(exponent + 1, '0');
  const fraction = digits.slice(exponent + 1) || '0';
  return `${sign}${integerPart}.${fraction}`;
}

/**
 * Serialize a JSON-compatible value with spaced separators and ASCII-only output.
 * Numbers under a key in floatFields print with formatFloat.
 */
export function toSpacedJson(value: unknown, floatFields: ReadonlySet<string> = new Set()): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'string') {
    return escapeNonAscii(JSON.stringify(value));
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? JSON.stringify(value) : String(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => toSpacedJson(item, floatFields)).join(', ')}]`;
  }
  if (typeof value === 'object') {
    const parts: string[] = [];
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined) continue;
      const body = typeof item === 'number' && floatFields.has(key)
        ? formatFloat(item)
        : toSpacedJson(item, floatFields);
      parts.push(`${toSpacedJson(key)}: ${body}`);
    }
    return `{${parts.join(', ')}}`;
  }
  throw new TypeError(`Cannot serialize value of type ${typeof value}`);
}

export function formatSseEvent(event: ProgressEvent): string {
  return `data: ${toSpacedJson(event, FLOAT_FIELDS)}\n\n`;
}
