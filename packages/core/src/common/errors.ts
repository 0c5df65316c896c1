/**
 * Typed error class for knowledge base operations.
 *
 * Codes map onto the failure stages callers need to tell apart: a scan that
 * could not read a file, an embedding or rerank request that failed, a vector
 * store write or query that failed, or a request that had to be corrected.
 */

export type ErrorCode =
  | 'IO_ERROR'
  | 'NOT_FOUND'
  | 'NOT_INDEXED'
  | 'VALIDATION_ERROR'
  | 'CONSTRAINT_VIOLATION'
  | 'EMBEDDING_ERROR'
  | 'RERANK_ERROR'
  | 'VECTOR_STORE_ERROR'
  | 'CANCELLED'

export class KnowledgeError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'KnowledgeError'
    this.code = code
  }

  static notFound(entity: string, id: string): KnowledgeError {
    return new KnowledgeError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static notIndexed(kbName: string, detail?: string): KnowledgeError {
    const message = `Knowledge base has not been indexed yet: ${kbName}`
    return new KnowledgeError('NOT_INDEXED', detail ? `${message} (${detail})` : message)
  }

  static validation(message: string): KnowledgeError {
    return new KnowledgeError('VALIDATION_ERROR', message)
  }

  static constraint(message: string): KnowledgeError {
    return new KnowledgeError('CONSTRAINT_VIOLATION', message)
  }

  static scanIO(message: string, cause?: unknown): KnowledgeError {
    return new KnowledgeError('IO_ERROR', message, { cause })
  }

  static embedding(message: string, cause?: unknown): KnowledgeError {
    return new KnowledgeError('EMBEDDING_ERROR', message, { cause })
  }

  static rerank(message: string, cause?: unknown): KnowledgeError {
    return new KnowledgeError('RERANK_ERROR', message, { cause })
  }

  static vectorStore(message: string, cause?: unknown): KnowledgeError {
    return new KnowledgeError('VECTOR_STORE_ERROR', message, { cause })
  }

  static cancelled(message = 'Cancelled'): KnowledgeError {
    return new KnowledgeError('CANCELLED', message)
  }
}

/** Message text of anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
