/**
 * Paginator
 *
 * Splits an ordered list into fixed-size, 1-based pages. Requests for a page
 * that does not exist are clamped rather than rejected:
 *
 * - a missing or non-integer page number yields the first page
 * - a number below 1 or past the end yields the last page
 *
 * An empty list still has one (empty) page.
 */

export interface Page<T> {
  items: T[];
  number: number;
  totalPages: number;
  total: number;
  pageSize: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

const INTEGER = /^\s*[+-]?\d+\s*$/;

/**
 * Resolve a raw page number (for example a query-string value) against a
 * page count, with the clamping rules above
 */
export function resolvePageNumber(raw: string | number | null | undefined, totalPages: number): number {
  let number: number;
  if (typeof raw === 'number') {
    if (!Number.isInteger(raw)) return 1;
    number = raw;
  } else if (typeof raw === 'string' && INTEGER.test(raw)) {
    number = parseInt(raw, 10);
  } else {
    return 1;
  }

  if (number < 1 || number > totalPages) {
    return totalPages;
  }
  return number;
}

/**
 * Number of pages `total` items fill; never less than one
 */
export function pageCount(total: number, pageSize: number): number {
  return Math.max(1, Math.ceil(total / pageSize));
}

export class Paginator<T> {
  constructor(
    private readonly items: readonly T[],
    readonly pageSize: number
  ) {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
    }
  }

  get total(): number {
    return this.items.length;
  }

  get totalPages(): number {
    return pageCount(this.items.length, this.pageSize);
  }

  resolve(raw: string | number | null | undefined): number {
    return resolvePageNumber(raw, this.totalPages);
  }

  /**
   * Get a page, clamping out-of-range requests
   */
  getPage(raw: string | number | null | undefined): Page<T> {
    const number = this.resolve(raw);
    const start = (number - 1) * this.pageSize;

    return {
      items: this.items.slice(start, start + this.pageSize),
      number,
      totalPages: this.totalPages,
      total: this.total,
      pageSize: this.pageSize,
      hasNext: number < this.totalPages,
      hasPrevious: number > 1,
    };
  }
}
