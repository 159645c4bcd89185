/**
 * Cut a complete JSON array or object out of surrounding script text
 * Brackets inside string literals are ignored.
 *
 * @param text - Script source
 * @param start - Index of the opening "[" or "{"
 * @returns The balanced substring, or null if it never closes
 *
 * @example
 * sliceJsonValue('f({data:[1,"]",[2]], x: 1})', 8) // '[1,"]",[2]]'
 */
export function sliceJsonValue(text: string, start: number): string | null {
  const open = text[start];
  if (open !== "[" && open !== "{") return null;

  const stack: string[] = [];
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (char === "\\") {
        i++; // Skip escaped character
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    switch (char) {
      case '"':
        inString = true;
        break;
      case "[":
        stack.push("]");
        break;
      case "{":
        stack.push("}");
        break;
      case "]":
      case "}":
        if (stack.pop() !== char) return null;
        if (stack.length === 0) return text.slice(start, i + 1);
        break;
    }
  }

  return null;
}

/**
 * JSON.parse that returns undefined instead of throwing
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
