export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

/** Input has no valid metadata/numeric split; the run must not start. */
export class TableShapeError extends Error {
  override name = "TableShapeError";
}

export class UnsupportedInputError extends Error {
  override name = "UnsupportedInputError";
}
