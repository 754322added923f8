/**
 * KeyValues text reader.
 *
 * The nested `"key" "value"` / `"key" { ... }` format shared by maps,
 * materials, gameinfo.txt and Steam's library manifests. Duplicate keys
 * are kept in document order (a map holds many `solid` and `side` blocks).
 * A platform conditional such as `[$X360]` applies to the entry it follows;
 * it is evaluated for the PC build and entries whose condition is false are
 * dropped.
 */

import { MalformedAssetError } from '../utils/errors.js';

export interface KeyValue {
  key: string;
  value: string | KeyValue[];
}

type Token =
  | { type: 'string'; text: string; offset: number }
  | { type: 'conditional'; expression: string; offset: number }
  | { type: 'open'; offset: number }
  | { type: 'close'; offset: number };

/** Platform symbols that are set for the PC build; every other symbol is unset */
const PC_PLATFORM_SYMBOLS: ReadonlySet<string> = new Set(['$WIN32', '$WINDOWS']);

/**
 * Evaluate a conditional body such as `!$X360` or `$WIN32 || $OSX`.
 * `&&` binds tighter than `||`.
 */
export function evaluateConditional(expression: string): boolean {
  return expression.split('||').some(clause =>
    clause.split('&&').every(term => {
      let symbol = term.trim();
      let negated = false;
      while (symbol.startsWith('!')) {
        negated = !negated;
        symbol = symbol.slice(1).trim();
      }
      return PC_PLATFORM_SYMBOLS.has(symbol.toUpperCase()) !== negated;
    })
  );
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\f' || ch === '\v';
}

function* tokenize(text: string): Generator<Token> {
  let i = 0;
  const length = text.length;

  while (i < length) {
    const ch = text[i];

    if (isWhitespace(ch)) {
      i++;
      continue;
    }

    if (ch === '/' && text[i + 1] === '/') {
      while (i < length && text[i] !== '\n') i++;
      continue;
    }

    if (ch === '{') {
      yield { type: 'open', offset: i++ };
      continue;
    }

    if (ch === '}') {
      yield { type: 'close', offset: i++ };
      continue;
    }

    if (ch === '[') {
      const end = text.indexOf(']', i);
      if (end === -1) {
        throw new MalformedAssetError(`Unterminated conditional at offset ${i}`);
      }
      yield { type: 'conditional', expression: text.slice(i + 1, end), offset: i };
      i = end + 1;
      continue;
    }

    if (ch === '"') {
      const start = i;
      const end = text.indexOf('"', i + 1);
      if (end === -1) {
        throw new MalformedAssetError(`Unterminated string at offset ${start}`);
      }
      yield { type: 'string', text: text.slice(i + 1, end), offset: start };
      i = end + 1;
      continue;
    }

    const start = i;
    while (i < length && !isWhitespace(text[i]) && text[i] !== '{' && text[i] !== '}' && text[i] !== '"') {
      i++;
    }
    yield { type: 'string', text: text.slice(start, i), offset: start };
  }
}

/**
 * Parse KeyValues text into an ordered list of top-level entries
 */
export function parseKeyValues(text: string): KeyValue[] {
  const source = tokenize(text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);
  let peeked: IteratorResult<Token, void> | null = null;

  const tokens = {
    next(): IteratorResult<Token, void> {
      if (peeked) {
        const token = peeked;
        peeked = null;
        return token;
      }
      return source.next();
    },
    peek(): IteratorResult<Token, void> {
      if (!peeked) {
        peeked = source.next();
      }
      return peeked;
    }
  };

  /** Consume the conditional trailing an entry, if any, and evaluate it */
  function trailingConditionHolds(): boolean {
    const next = tokens.peek();
    if (next.done) {
      return true;
    }
    const token = next.value;
    if (token.type !== 'conditional') {
      return true;
    }
    tokens.next();
    return evaluateConditional(token.expression);
  }

  function parseBlock(nested: boolean): KeyValue[] {
    const entries: KeyValue[] = [];

    for (;;) {
      const next = tokens.next();
      if (next.done) {
        if (nested) {
          throw new MalformedAssetError('Unexpected end of document inside a block');
        }
        return entries;
      }

      const keyToken = next.value;
      if (keyToken.type === 'close') {
        if (!nested) {
          throw new MalformedAssetError(`Unexpected '}' at offset ${keyToken.offset}`);
        }
        return entries;
      }
      if (keyToken.type === 'open') {
        throw new MalformedAssetError(`Expected a key but found '{' at offset ${keyToken.offset}`);
      }
      if (keyToken.type === 'conditional') {
        // not attached to an entry
        continue;
      }

      const valueResult = tokens.next();
      if (valueResult.done) {
        throw new MalformedAssetError(`Key "${keyToken.text}" has no value`);
      }

      const valueToken = valueResult.value;
      let entry: KeyValue;
      if (valueToken.type === 'open') {
        entry = { key: keyToken.text, value: parseBlock(true) };
      } else if (valueToken.type === 'string') {
        entry = { key: keyToken.text, value: valueToken.text };
      } else if (valueToken.type === 'close') {
        throw new MalformedAssetError(`Key "${keyToken.text}" has no value before '}' at offset ${valueToken.offset}`);
      } else {
        throw new MalformedAssetError(`Key "${keyToken.text}" has no value before a conditional at offset ${valueToken.offset}`);
      }

      if (trailingConditionHolds()) {
        entries.push(entry);
      }
    }
  }

  return parseBlock(false);
}

/**
 * Decode a KeyValues document from raw bytes
 */
export function parseKeyValuesBytes(bytes: Uint8Array): KeyValue[] {
  return parseKeyValues(Buffer.from(bytes).toString('utf8'));
}

/** First string value stored under `key` (case-insensitive) */
export function findValue(entries: KeyValue[], key: string): string | undefined {
  const wanted = key.toLowerCase();
  for (const entry of entries) {
    if (typeof entry.value === 'string' && entry.key.toLowerCase() === wanted) {
      return entry.value;
    }
  }
  return undefined;
}

/** First block stored under `key` (case-insensitive) */
export function findBlock(entries: KeyValue[], key: string): KeyValue[] | undefined {
  return findBlocks(entries, key)[0];
}

/** Every block stored under `key` (case-insensitive), in document order */
export function findBlocks(entries: KeyValue[], key: string): KeyValue[][] {
  const wanted = key.toLowerCase();
  const blocks: KeyValue[][] = [];
  for (const entry of entries) {
    if (typeof entry.value !== 'string' && entry.key.toLowerCase() === wanted) {
      blocks.push(entry.value);
    }
  }
  return blocks;
}
