/**
 * Error codes for PathSource operations.
 */
export type PathSourceErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'NOT_A_DIRECTORY'
  | 'READ_ERROR';

/**
 * Error thrown when a location cannot be resolved or a directory cannot be listed.
 */
export class PathSourceError extends Error {
  constructor(
    message: string,
    public readonly code: PathSourceErrorCode,
    public readonly path: string
  ) {
    super(message);
    this.name = 'PathSourceError';
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Maps a Node.js system error onto a PathSourceError.
 */
export function toPathSourceError(error: unknown, path: string): PathSourceError {
  if (error instanceof PathSourceError) {
    return error;
  }
  switch (errnoCode(error)) {
    case 'ENOENT':
      return new PathSourceError(`No such file or directory: ${path}`, 'NOT_FOUND', path);
    case 'EACCES':
    case 'EPERM':
      return new PathSourceError(`Permission denied: ${path}`, 'PERMISSION_DENIED', path);
    case 'ENOTDIR':
      return new PathSourceError(`Not a directory: ${path}`, 'NOT_A_DIRECTORY', path);
    default:
      return new PathSourceError(
        `Read error: ${error instanceof Error ? error.message : String(error)}`,
        'READ_ERROR',
        path
      );
  }
}
