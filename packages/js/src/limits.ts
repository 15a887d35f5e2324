/**
 * Resource limits for conversion and expansion.
 */

import { ResourceLimitError } from './errors.js';
import { ResourceLimits } from './types.js';
import { DEFAULT_RESOURCE_LIMITS } from './config.js';

/**
 * Reject input larger than `maxDocumentSize` bytes before parsing.
 *
 * @throws ResourceLimitError if the limit is exceeded
 */
export function enforceDocumentSize(
  input: string | object,
  limits: ResourceLimits = DEFAULT_RESOURCE_LIMITS
): void {
  const maxDocumentSize = limits.maxDocumentSize ?? DEFAULT_RESOURCE_LIMITS.maxDocumentSize;
  const content = typeof input === 'string' ? input : JSON.stringify(input);
  const size = Buffer.byteLength(content, 'utf8');

  if (size > maxDocumentSize) {
    throw new ResourceLimitError(
      `Document size ${size} bytes exceeds limit of ${maxDocumentSize} bytes`
    );
  }
}

/**
 * Creates a processing timeout wrapper.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string = 'processing'
): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new ResourceLimitError(`${operation} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
