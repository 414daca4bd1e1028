import logger from './logger.js';

/** Inputs above this size skip the regex-heavy repairs. */
const AGGRESSIVE_REPAIR_LIMIT = 50_000;

type Repair = (text: string) => string;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

const stripFences: Repair = (text) =>
  text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

/** True when every brace and bracket outside strings is closed in order. */
function isBalanced(text: string): boolean {
  const closers: string[] = [];
  let inString = false;
  let escaped = false;
  for (const ch of text) {
    if (escaped) {
      escaped = false;
    } else if (inString) {
      if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      closers.push('}');
    } else if (ch === '[') {
      closers.push(']');
    } else if (ch === '}' || ch === ']') {
      if (closers.pop() !== ch) return false;
    }
  }
  return closers.length === 0 && !inString;
}

/**
 * Cuts prose before the first opener and after its last matching closer.
 * A cut that leaves unbalanced brackets is a truncated response and is
 * left alone so it fails to parse.
 */
const sliceOuterValue: Repair = (text) => {
  const brace = text.indexOf('{');
  const bracket = text.indexOf('[');
  const useBrace = brace >= 0 && (bracket < 0 || brace < bracket);
  const start = useBrace ? brace : bracket;
  if (start < 0) return text;
  const end = text.lastIndexOf(useBrace ? '}' : ']');
  if (end <= start) return text;
  const sliced = text.slice(start, end + 1);
  return isBalanced(sliced) ? sliced : text;
};

const dropTrailingCommas: Repair = (text) => text.replace(/,\s*([\]}])/g, '$1');

/** Raw newlines and tabs inside string values, and single-quoted values. */
const normalizeStrings: Repair = (text) =>
  text
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t')
    .replace(/(?<=[\[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"');

const quoteBareKeys: Repair = (text) => text.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');

const CHEAP_REPAIRS: Repair[] = [stripFences, sliceOuterValue, dropTrailingCommas];
const AGGRESSIVE_REPAIRS: Repair[] = [normalizeStrings, quoteBareKeys];

/**
 * Parses model output that may carry markdown fences, surrounding prose,
 * trailing commas or bare keys. Repairs are applied cumulatively and the
 * first text that parses wins. A response cut off mid-value is never
 * completed: it returns null like any other unparseable text, and callers
 * validate the shape themselves.
 */
export function repairJSON(text: string): unknown {
  if (!text) return null;

  let current = text;
  for (const repair of CHEAP_REPAIRS) {
    current = repair(current);
    const parsed = tryParse(current);
    if (parsed.ok) return parsed.value;
  }

  if (current.length > AGGRESSIVE_REPAIR_LIMIT) {
    logger.warn({ size: current.length }, 'JSON repair: input too large for aggressive repair');
    return null;
  }

  for (const repair of AGGRESSIVE_REPAIRS) {
    const next = repair(current);
    if (next === current) continue;
    current = next;
    const parsed = tryParse(current);
    if (parsed.ok) return parsed.value;
  }

  logger.warn({ rawSnippet: text.slice(0, 300) }, 'JSON repair: nothing parseable');
  return null;
}
