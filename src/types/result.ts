/**
 * Result 型別
 * Fetch and parse boundaries return these instead of throwing
 */

export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function err<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * A page or document could not be downloaded
 */
export class FetchFailedError extends Error {
  public readonly code = 'FETCH_FAILED';
  public readonly url: string;
  public readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = 'FetchFailedError';
    this.url = url;
    this.status = status;
  }
}

/**
 * A downloaded document could not be turned into text or rows
 */
export class ParseFailedError extends Error {
  public readonly code = 'PARSE_FAILED';
  public readonly url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = 'ParseFailedError';
    this.url = url;
  }
}
