/**
 * Raised when a cursor move would leave the cursor at row or column 0 or below.
 *
 * This is a logic error in the calling traversal (e.g. moving up past the top
 * of the table), so the builder never recovers from it.
 */
export class CursorBoundsError extends Error {
  constructor(
    public readonly operation: string,
    public readonly nrow: number,
    public readonly ncol: number
  ) {
    super(`${operation} beyond available cells (row ${nrow}, col ${ncol})`);
    this.name = 'CursorBoundsError';
  }
}
