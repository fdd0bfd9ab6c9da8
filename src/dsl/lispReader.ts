import { EvaluationError } from '../core/errors';

export type Datum = string | number | boolean | null | Datum[] | { [key: string]: Datum };

type Token = { type: 'open'; char: string } | { type: 'close'; char: string } | { type: 'string'; value: string } | { type: 'atom'; value: string };

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSERS = new Set([')', ']', '}']);
const NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '"': '"', '\\': '\\' };

const isDelimiter = (ch: string) => ch in OPENERS || CLOSERS.has(ch) || ch === '"' || ch === ';' || /[\s,]/.test(ch);

export const tokenize = (text: string): Token[] => {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (/[\s,]/.test(ch)) {
      i++;
    } else if (ch === ';') {
      while (i < text.length && text[i] !== '\n') i++;
    } else if (ch in OPENERS) {
      tokens.push({ type: 'open', char: ch });
      i++;
    } else if (CLOSERS.has(ch)) {
      tokens.push({ type: 'close', char: ch });
      i++;
    } else if (ch === '"') {
      let value = '';
      i++;
      while (i < text.length && text[i] !== '"') {
        if (text[i] === '\\' && i + 1 < text.length) {
          value += ESCAPES[text[i + 1]] ?? text[i + 1];
          i += 2;
        } else {
          value += text[i];
          i++;
        }
      }
      if (i >= text.length) {
        throw EvaluationError.malformed('Unterminated string literal');
      }
      i++;
      tokens.push({ type: 'string', value });
    } else {
      let value = '';
      while (i < text.length && !isDelimiter(text[i])) {
        value += text[i];
        i++;
      }
      tokens.push({ type: 'atom', value });
    }
  }
  return tokens;
};

const atomValue = (raw: string): Datum => {
  if (NUMBER.test(raw)) return Number(raw);
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === 'nil') return null;
  return raw;
};

const toMap = (items: Datum[]): Datum => {
  if (items.length % 2 !== 0) {
    throw EvaluationError.malformed(`Map literal needs key/value pairs, got ${items.length} items`);
  }
  const out: { [key: string]: Datum } = {};
  for (let i = 0; i < items.length; i += 2) {
    const key = items[i];
    if (typeof key !== 'string' && typeof key !== 'number') {
      throw EvaluationError.malformed('Map keys must be keywords, strings or numbers');
    }
    out[String(key)] = items[i + 1];
  }
  return out;
};

export const readForms = (text: string): Datum[] => {
  const tokens = tokenize(text);
  let pos = 0;

  const readForm = (): Datum => {
    if (pos >= tokens.length) {
      throw EvaluationError.malformed('Unexpected end of input');
    }
    const token = tokens[pos++];
    switch (token.type) {
      case 'string':
        return token.value;
      case 'atom':
        return atomValue(token.value);
      case 'close':
        throw EvaluationError.malformed(`Unexpected closing '${token.char}'`);
      case 'open': {
        const closer = OPENERS[token.char];
        const items: Datum[] = [];
        for (;;) {
          const next = tokens[pos];
          if (next === undefined) {
            throw EvaluationError.malformed(`Unmatched opening '${token.char}'`);
          }
          if (next.type === 'close') {
            if (next.char !== closer) {
              throw EvaluationError.malformed(`Expected '${closer}' but found '${next.char}'`);
            }
            pos++;
            return token.char === '{' ? toMap(items) : items;
          }
          items.push(readForm());
        }
      }
    }
  };

  const forms: Datum[] = [];
  while (pos < tokens.length) {
    forms.push(readForm());
  }
  return forms;
};

const readSingleForm = (text: string): Datum => {
  const forms = readForms(text);
  if (forms.length === 0) {
    throw EvaluationError.malformed('Unexpected end of input');
  }
  if (forms.length > 1) {
    throw EvaluationError.malformed('Unexpected tokens after parsing');
  }
  return forms[0];
};

// JSON documents and s-expression programs are both accepted.
export const readProgramText = (text: string): unknown => {
  const trimmed = text.trim();
  if (!trimmed.startsWith('[') && !trimmed.startsWith('{')) {
    return readSingleForm(trimmed);
  }
  try {
    return JSON.parse(trimmed);
  } catch (jsonErr) {
    const reason = jsonErr instanceof Error ? jsonErr.message : String(jsonErr);
    try {
      return readSingleForm(trimmed);
    } catch (formErr) {
      const formReason = formErr instanceof Error ? formErr.message : String(formErr);
      throw EvaluationError.malformed(`Program is neither valid JSON (${reason}) nor a valid form (${formReason})`);
    }
  }
};
