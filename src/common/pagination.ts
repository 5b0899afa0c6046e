import { InvalidParameterError } from "./errors.ts";
import { DEFAULT_PAGE_SIZE } from "./types.ts";

export interface Page<T> {
  items: T[];
  nextToken?: string;
}

/**
 * Offset pagination over an ordered collection. The token is the integer offset
 * of the next page; a full page always yields a token, even when it is the last one.
 */
export function paginate<T>(
  values: Iterable<T>,
  nextToken: string | undefined,
  pageSize: number = DEFAULT_PAGE_SIZE,
): Page<T> {
  const offset = parseToken(nextToken);
  const items = Array.from(values).slice(offset, offset + pageSize);
  if (items.length === pageSize) {
    return { items, nextToken: String(offset + pageSize) };
  }
  return { items };
}

function parseToken(nextToken: string | undefined): number {
  if (!nextToken) return 0;
  if (!/^\d+$/.test(nextToken)) {
    throw new InvalidParameterError("Invalid parameter: NextToken");
  }
  return parseInt(nextToken, 10);
}
