/**
 * Common utilities: shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr, attempt } from './result.js'
export type { Result } from './result.js'

export { KnowledgeError, errorMessage } from './errors.js'
export type { ErrorCode } from './errors.js'

export { KnowledgeBaseNameSchema, RelativePathSchema, ContentHashSchema } from './schemas.js'

export { trimText, toPosixPath } from './text.js'
