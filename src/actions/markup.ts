/**
 * Action Markup Reader
 *
 * A small element reader for the body of one `<actions>` block. It knows
 * elements, attributes, comments, CDATA sections and the predefined
 * entities; anything structurally wrong (unclosed or mismatched tags,
 * broken attribute syntax, unterminated CDATA) raises ActionParseError so
 * the caller can drop the block.
 *
 * Text is kept lenient: a bare `&` or a `<` that cannot start a tag is
 * taken literally, because shell commands (`a && b`, `x < y`) routinely
 * show up unescaped.
 */

import { ActionParseError } from '../errors/index.js';

export interface MarkupElement {
  name: string;
  attributes: Record<string, string>;
  children: MarkupElement[];
  /** Concatenated direct text and CDATA, entities decoded */
  text: string;
  /** Offset of the opening `<` within the parsed source */
  offset: number;
}

const NAME_START = /[A-Za-z_]/;
const NAME = /[A-Za-z_][\w.:-]*/y;
const ATTRIBUTE = /\s*([A-Za-z_][\w.:-]*)\s*=\s*(?:"([^"]*)"|'([^']*)')/y;
const WHITESPACE = /\s*/y;

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
};

/**
 * Decode the predefined and numeric entities. Unknown references stay as
 * written.
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z]+);/g, (match, ref: string) => {
    if (ref.startsWith('#x')) {
      return safeFromCodePoint(parseInt(ref.slice(2), 16)) ?? match;
    }
    if (ref.startsWith('#')) {
      return safeFromCodePoint(parseInt(ref.slice(1), 10)) ?? match;
    }
    return NAMED_ENTITIES[ref] ?? match;
  });
}

function safeFromCodePoint(code: number): string | undefined {
  if (!Number.isFinite(code) || code < 0 || code > 0x10ffff) {
    return undefined;
  }
  return String.fromCodePoint(code);
}

/**
 * Parse a markup fragment into its top-level elements. Text outside any
 * element is ignored.
 */
export function parseMarkup(source: string): MarkupElement[] {
  const roots: MarkupElement[] = [];
  const stack: MarkupElement[] = [];
  let pos = 0;

  const appendText = (text: string): void => {
    const current = stack[stack.length - 1];
    if (current) {
      current.text += text;
    }
  };

  while (pos < source.length) {
    const lt = source.indexOf('<', pos);
    if (lt === -1) {
      appendText(decodeEntities(source.slice(pos)));
      break;
    }
    if (lt > pos) {
      appendText(decodeEntities(source.slice(pos, lt)));
      pos = lt;
    }

    if (source.startsWith('<!--', pos)) {
      const end = source.indexOf('-->', pos + 4);
      if (end === -1) {
        throw new ActionParseError('Unterminated comment', pos);
      }
      pos = end + 3;
      continue;
    }

    if (source.startsWith('<![CDATA[', pos)) {
      const end = source.indexOf(']]>', pos + 9);
      if (end === -1) {
        throw new ActionParseError('Unterminated CDATA section', pos);
      }
      appendText(source.slice(pos + 9, end));
      pos = end + 3;
      continue;
    }

    if (source.startsWith('<?', pos)) {
      const end = source.indexOf('?>', pos + 2);
      if (end === -1) {
        throw new ActionParseError('Unterminated processing instruction', pos);
      }
      pos = end + 2;
      continue;
    }

    if (source.startsWith('</', pos)) {
      pos = readClosingTag(source, pos, stack);
      continue;
    }

    if (!NAME_START.test(source.charAt(pos + 1))) {
      appendText('<');
      pos += 1;
      continue;
    }

    const { element, selfClosing, next } = readOpeningTag(source, pos);
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else {
      roots.push(element);
    }
    if (!selfClosing) {
      stack.push(element);
    }
    pos = next;
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    throw new ActionParseError(`Unclosed <${unclosed.name}>`, unclosed.offset);
  }

  return roots;
}

function readName(source: string, pos: number): string | undefined {
  NAME.lastIndex = pos;
  const match = NAME.exec(source);
  return match?.[0];
}

function skipWhitespace(source: string, pos: number): number {
  WHITESPACE.lastIndex = pos;
  WHITESPACE.exec(source);
  return WHITESPACE.lastIndex;
}

function readOpeningTag(
  source: string,
  start: number
): { element: MarkupElement; selfClosing: boolean; next: number } {
  const name = readName(source, start + 1);
  if (!name) {
    throw new ActionParseError('Expected element name', start);
  }

  const attributes: Record<string, string> = {};
  let pos = start + 1 + name.length;

  for (;;) {
    ATTRIBUTE.lastIndex = pos;
    const match = ATTRIBUTE.exec(source);
    if (!match) {
      break;
    }
    const [, attrName, doubleQuoted, singleQuoted] = match;
    if (attrName === undefined) {
      break;
    }
    attributes[attrName] = decodeEntities(doubleQuoted ?? singleQuoted ?? '');
    pos = ATTRIBUTE.lastIndex;
  }

  pos = skipWhitespace(source, pos);
  let selfClosing = false;
  if (source.startsWith('/>', pos)) {
    selfClosing = true;
    pos += 2;
  } else if (source.charAt(pos) === '>') {
    pos += 1;
  } else {
    throw new ActionParseError(`Malformed tag <${name}>`, pos, { element: name });
  }

  return {
    element: { name, attributes, children: [], text: '', offset: start },
    selfClosing,
    next: pos,
  };
}

function readClosingTag(source: string, start: number, stack: MarkupElement[]): number {
  const name = readName(source, start + 2);
  if (!name) {
    throw new ActionParseError('Expected element name in closing tag', start);
  }
  let pos = skipWhitespace(source, start + 2 + name.length);
  if (source.charAt(pos) !== '>') {
    throw new ActionParseError(`Malformed closing tag </${name}>`, pos, { element: name });
  }
  pos += 1;

  const open = stack.pop();
  if (!open) {
    throw new ActionParseError(`Unexpected closing tag </${name}>`, start, { element: name });
  }
  if (open.name !== name) {
    throw new ActionParseError(`Mismatched closing tag: expected </${open.name}>, found </${name}>`, start, {
      element: name,
    });
  }
  return pos;
}

/**
 * First direct child with the given name.
 */
export function childElement(element: MarkupElement, name: string): MarkupElement | undefined {
  return element.children.find((child) => child.name === name);
}
