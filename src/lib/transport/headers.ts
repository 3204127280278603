import type { ResponseHeaders } from '../types/collaborators.js';

/** All values of `name`, matched case-insensitively, in arrival order. */
export function getHeaderValues(headers: ResponseHeaders, name: string): string[] {
  const wanted = name.toLowerCase();
  const values: string[] = [];

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    if (Array.isArray(value)) {
      values.push(...value);
    } else {
      values.push(value);
    }
  }

  return values;
}

/** First value of `name`, or undefined when the header is absent. */
export function getHeader(headers: ResponseHeaders, name: string): string | undefined {
  return getHeaderValues(headers, name)[0];
}

export function hasHeader(headers: ResponseHeaders, name: string): boolean {
  return getHeaderValues(headers, name).length > 0;
}
