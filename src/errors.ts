/**
 * Build failures.
 *
 * Every failure that can end a build is a BuildError. The CLI only needs to
 * tell PathNotFoundError apart; everything else is reported by message.
 */

export class BuildError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BuildError";
  }
}

export class PathNotFoundError extends BuildError {
  constructor(public readonly path: string) {
    super(`Path does not exist: ${path}`);
    this.name = "PathNotFoundError";
  }
}

export class LayoutNotFoundError extends BuildError {
  constructor(public readonly layout: string) {
    super(`Layout ${layout} does not exist`);
    this.name = "LayoutNotFoundError";
  }
}

export type IOOperation = "read" | "write" | "copy" | "create directory";

export class IOError extends BuildError {
  public readonly code: string;

  constructor(
    public readonly operation: IOOperation,
    public readonly path: string,
    cause: unknown
  ) {
    const code = errorCode(cause) ?? "EUNKNOWN";
    super(`Could not ${operation} ${path} (${code})`, { cause });
    this.name = "IOError";
    this.code = code;
  }
}

export class RenderError extends BuildError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
  }
}

/**
 * Several sibling failures from one parallel phase.
 * Nested aggregates are flattened, so `errors` only holds leaf failures.
 */
export class AggregateBuildError extends BuildError {
  public readonly errors: readonly BuildError[];

  constructor(errors: readonly BuildError[]) {
    const leaves = errors.flatMap((error) =>
      error instanceof AggregateBuildError ? error.errors : [error]
    );
    super(leaves.map((error) => error.message).join(", "));
    this.name = "AggregateBuildError";
    this.errors = leaves;
  }
}

/**
 * Read the system error code (ENOENT, EEXIST, ...) off a thrown value.
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function toBuildError(err: unknown): BuildError {
  if (err instanceof BuildError) {
    return err;
  }
  if (err instanceof Error) {
    return new RenderError(err.message, { cause: err });
  }
  return new RenderError(String(err));
}
