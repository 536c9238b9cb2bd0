/**
 * Splits the interior of a string-array literal into element literals.
 *
 * A comma inside a quoted element does not separate elements, so string
 * arrays cannot be split naively.
 *
 * @packageDocumentation
 */

import { createFormatError, failure, success, type IdlResult } from '../errors/index.js';

const ESCAPE = '\\';

function isQuote(char: string | undefined): char is '"' | "'" {
  return char === '"' || char === "'";
}

function skipSpaces(text: string, position: number): number {
  let index = position;
  while (text[index] === ' ') {
    index += 1;
  }
  return index;
}

/**
 * Finds the next occurrence of `target` not preceded by an escaping backslash.
 *
 * @param text - Text to scan.
 * @param from - Index to start scanning at.
 * @param target - Character to find.
 * @returns Its index, or -1 when there is none.
 */
function findUnescaped(text: string, from: number, target: string): number {
  let index = from;
  while (index < text.length) {
    const char = text[index];
    if (char === ESCAPE && text[index + 1] === target) {
      index += 2;
      continue;
    }
    if (char === target) {
      return index;
    }
    index += 1;
  }
  return -1;
}

/**
 * Tokenizes the text between the brackets of a string-array literal.
 *
 * Quoted elements run to the next unescaped occurrence of their opening
 * quote; `\<quote>` inside them is unescaped. Unquoted elements run to the
 * next unescaped comma and are returned verbatim, including any quote
 * characters they contain.
 *
 * @param interior - The literal without its enclosing brackets.
 * @returns The element literals, or a FormatError for a leading comma or an
 * unterminated quote.
 *
 * @example
 * ```typescript
 * tokenizeStringArray(`'a,b', 'c'`); // { success: true, value: ['a,b', 'c'] }
 * ```
 */
export function tokenizeStringArray(interior: string): IdlResult<string[]> {
  const elements: string[] = [];
  let position = 0;

  while (position < interior.length) {
    position = skipSpaces(interior, position);
    if (position >= interior.length) {
      break;
    }

    const opening = interior[position];
    if (opening === ',') {
      return failure(
        createFormatError(interior, `unexpected ',' at beginning of [${interior.slice(position)}]`)
      );
    }

    if (isQuote(opening)) {
      const closing = findUnescaped(interior, position + 1, opening);
      if (closing === -1) {
        return failure(
          createFormatError(interior, `string [${interior.slice(position)}] incorrectly quoted`)
        );
      }
      elements.push(interior.slice(position + 1, closing).replaceAll(ESCAPE + opening, opening));
      position = closing + 1;
    } else {
      const comma = findUnescaped(interior, position, ',');
      const end = comma === -1 ? interior.length : comma;
      elements.push(interior.slice(position, end));
      position = end;
    }

    position = skipSpaces(interior, position);
    if (interior[position] === ',') {
      position += 1;
    }
  }

  return success(elements);
}
