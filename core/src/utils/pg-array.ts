/**
 * Normalise a text[] column value. Drivers differ on whether arrays of
 * varchar arrive decoded, so both a JS array and the `{a,b,"c d"}` literal
 * are accepted. NULL elements are dropped.
 */
export function parseTextArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  if (typeof value !== 'string') {
    return [];
  }

  const literal = value.trim();
  if (!literal.startsWith('{') || !literal.endsWith('}')) {
    return [];
  }

  const body = literal.slice(1, -1);
  const items: string[] = [];
  let current = '';
  let quoted = false;
  let wasQuoted = false;

  for (let i = 0; i < body.length; i++) {
    const char = body.charAt(i);
    if (quoted) {
      if (char === '\\') {
        current += body.charAt(i + 1);
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
      wasQuoted = true;
    } else if (char === ',') {
      pushItem(items, current, wasQuoted);
      current = '';
      wasQuoted = false;
    } else {
      current += char;
    }
  }
  if (body.length > 0) {
    pushItem(items, current, wasQuoted);
  }
  return items;
}

function pushItem(items: string[], raw: string, wasQuoted: boolean): void {
  if (!wasQuoted && raw.trim().toUpperCase() === 'NULL') {
    return;
  }
  items.push(wasQuoted ? raw : raw.trim());
}
