export type ToolErrorKind =
  | 'PathTraversal'
  | 'PathNotFound'
  | 'WhitelistViolation'
  | 'ManagerNotFound'
  | 'CommandBuildError'
  | 'ExecutionTimeout'
  | 'ExecutionFailed'
  | 'Busy'
  | 'InternalError';

/**
 * A failure with a kind the dispatcher can surface to the caller as-is.
 * Anything thrown that is not a ToolError is reported as InternalError.
 */
export class ToolError extends Error {
  constructor(
    readonly kind: ToolErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

export function isToolError(err: unknown): err is ToolError {
  return err instanceof ToolError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The `code` of a Node system error (`ENOENT`, `ESRCH`, ...). */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
