/** HTTP status dockerode attaches to daemon errors, if any. */
export function dockerStatusCode(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return dockerStatusCode(err) === 404;
}
