// Classification of filesystem errors

/**
 * True for fs errors meaning the path does not exist
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
