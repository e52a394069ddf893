/**
 * Tolerant XML fragment scanning (no DOM, no schema)
 *
 * Responses are treated as a flat sequence of elements; callers pick out the
 * elements they know by name and read whichever attributes are present.
 * Unknown elements and attributes are ignored.
 */

export interface Fragment {
  name: string;
  /** Attribute values, entity-decoded. A flag attribute (`minor=""`) maps to '' */
  attrs: Record<string, string>;
  /** Offset of the opening '<' */
  start: number;
  /** Offset just past the element (after its closing tag when it has one) */
  end: number;
  /** The opening tag as it appeared */
  raw: string;
  /** Undecoded content between the opening and closing tag ('' when self-closing) */
  inner: string;
}

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
};

/**
 * Decode the predefined XML entities and numeric character references
 */
export function decodeEntities(text: string): string {
  if (text.indexOf('&') === -1) return text;
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g, (match: string, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[body] ?? match;
  });
}

/**
 * All elements named `tagName` (every element when omitted), in document order.
 * Nested elements are reported as well as their parents.
 */
export function scanElements(xml: string, tagName?: string): Fragment[] {
  const matches: Fragment[] = [];
  let i = 0;

  while (i < xml.length) {
    const lt = xml.indexOf('<', i);
    if (lt === -1) break;
    if (startsWithAt(xml, lt, '<!--')) {
      const end = xml.indexOf('-->', lt + 4);
      i = end === -1 ? xml.length : end + 3;
      continue;
    }

    const name = tagName === undefined ? readTagName(xml, lt) : isTagAt(xml, lt, tagName) ? tagName : null;
    if (name) {
      const openEnd = findTagEnd(xml, lt);
      if (openEnd === -1) break;
      const raw = xml.slice(lt, openEnd + 1);
      const attrs = parseAttributes(raw, name);

      if (xml[openEnd - 1] === '/') {
        matches.push({ name, attrs, start: lt, end: openEnd + 1, raw, inner: '' });
      } else {
        const close = findClosingTag(xml, name, openEnd + 1);
        const innerEnd = close === -1 ? xml.length : close;
        const end = close === -1 ? xml.length : close + name.length + 3;
        matches.push({ name, attrs, start: lt, end, raw, inner: xml.slice(openEnd + 1, innerEnd) });
      }
      i = openEnd + 1;
      continue;
    }

    i = lt + 1;
  }

  return matches;
}

/** First element named `tagName`, or null */
export function firstElement(xml: string, tagName: string): Fragment | null {
  return scanElements(xml, tagName)[0] ?? null;
}

/** Decoded text content of an element */
export function textOf(fragment: Fragment): string {
  return decodeEntities(fragment.inner);
}

/** Decoded text of every `tagName` child, e.g. the `<g>` entries of a group list */
export function childTexts(xml: string, tagName: string): string[] {
  return scanElements(xml, tagName).map(textOf);
}

function readTagName(xml: string, index: number): string | null {
  let i = index + 1;
  const first = xml[i];
  if (!first || first === '/' || first === '!' || first === '?') return null;
  while (i < xml.length && !isWhitespace(xml[i]) && xml[i] !== '>' && xml[i] !== '/') i++;
  const name = xml.slice(index + 1, i);
  return name || null;
}

function isTagAt(xml: string, index: number, tagName: string): boolean {
  if (xml[index] !== '<') return false;
  if (!startsWithAt(xml, index + 1, tagName)) return false;
  const next = xml[index + 1 + tagName.length];
  return isWhitespace(next) || next === '>' || next === '/';
}

function findTagEnd(xml: string, start: number): number {
  let i = start;
  let quote: string | null = null;

  while (i < xml.length) {
    const ch = xml[i];
    if (quote) {
      if (ch === quote) {
        quote = null;
      }
      i++;
      continue;
    }
    if (ch === '"' || ch === '\'') {
      quote = ch;
      i++;
      continue;
    }
    if (ch === '>') return i;
    i++;
  }
  return -1;
}

/** Offset of the `</name>` that closes an element opened before `from` */
function findClosingTag(xml: string, name: string, from: number): number {
  let depth = 1;
  let i = from;

  while (i < xml.length) {
    const lt = xml.indexOf('<', i);
    if (lt === -1) return -1;

    if (xml[lt + 1] === '/' && startsWithAt(xml, lt + 2, name)) {
      const after = xml[lt + 2 + name.length];
      if (after === '>' || isWhitespace(after)) {
        depth--;
        if (depth === 0) return lt;
      }
    } else if (isTagAt(xml, lt, name)) {
      const openEnd = findTagEnd(xml, lt);
      if (openEnd === -1) return -1;
      if (xml[openEnd - 1] !== '/') depth++;
      i = openEnd + 1;
      continue;
    }
    i = lt + 1;
  }
  return -1;
}

function parseAttributes(tag: string, tagName: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  let i = tagName.length + 1; // after '<tag'

  while (i < tag.length) {
    const ch = tag[i];
    if (ch === '>') break;
    if (isWhitespace(ch) || ch === '/') {
      i++;
      continue;
    }

    const nameStart = i;
    while (i < tag.length && !isWhitespace(tag[i]) && tag[i] !== '=' && tag[i] !== '>' && tag[i] !== '/') {
      i++;
    }
    const name = tag.slice(nameStart, i).trim();
    if (!name) {
      i++;
      continue;
    }

    while (i < tag.length && isWhitespace(tag[i])) i++;
    let value = '';

    if (tag[i] === '=') {
      i++;
      while (i < tag.length && isWhitespace(tag[i])) i++;
      const quote = tag[i] === '"' || tag[i] === '\'' ? tag[i] : null;
      if (quote) {
        i++;
        const valueStart = i;
        while (i < tag.length && tag[i] !== quote) i++;
        value = tag.slice(valueStart, i);
        if (tag[i] === quote) i++;
      } else {
        const valueStart = i;
        while (i < tag.length && !isWhitespace(tag[i]) && tag[i] !== '>') i++;
        value = tag.slice(valueStart, i);
      }
    }

    attrs[name] = decodeEntities(value);
  }

  return attrs;
}

function startsWithAt(text: string, index: number, seq: string): boolean {
  if (index + seq.length > text.length) return false;
  for (let i = 0; i < seq.length; i++) {
    if (text[index + i] !== seq[i]) return false;
  }
  return true;
}

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}
