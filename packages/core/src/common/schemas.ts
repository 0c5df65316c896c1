/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

/**
 * A knowledge base name is a single relative path segment. Anything that could
 * escape the base directory (separators, `.`, `..`, absolute paths) is refused.
 */
export const KnowledgeBaseNameSchema = z
  .string()
  .trim()
  .min(1, 'Knowledge base name cannot be empty')
  .refine((name) => !/[\\/]/.test(name) && name !== '.' && name !== '..', {
    message: 'Knowledge base name must be a single path segment',
  })

export const RelativePathSchema = z.string().min(1, 'File path cannot be empty')

/** Lowercase hex SHA-256 digest. */
export const ContentHashSchema = z.string().regex(/^[0-9a-f]{64}$/, 'Expected a SHA-256 hex digest')
