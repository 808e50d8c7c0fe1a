/**
 * Splits an address header (`To`, `Cc`, ...) on commas that are not inside a quoted
 * display name or an angle-bracketed address.
 */
export const splitAddressList = (header: string | null | undefined): string[] => {
  if (!header) {
    return [];
  }
  const entries: string[] = [];
  let current = '';
  let inQuotes = false;
  let angleDepth = 0;

  for (let index = 0; index < header.length; index += 1) {
    const char = header[index];
    if (char === '\\' && inQuotes && index + 1 < header.length) {
      current += char + header[index + 1];
      index += 1;
      continue;
    }
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (!inQuotes && char === '<') {
      angleDepth += 1;
    } else if (!inQuotes && char === '>' && angleDepth > 0) {
      angleDepth -= 1;
    } else if (char === ',' && !inQuotes && angleDepth === 0) {
      entries.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  entries.push(current);

  return entries.map((entry) => entry.trim()).filter(Boolean);
};

export const parseDateValue = (value: string | number | null | undefined): Date | null => {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Date.parse(value);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return new Date(parsed);
};

export const decodeBase64Url = (data: string | null | undefined) =>
  data ? Buffer.from(data, 'base64url').toString('utf8') : '';
