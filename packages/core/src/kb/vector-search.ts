/**
 * Vector math: Float32 packing, L2 normalization, cosine similarity.
 */

/** Pack a number array into a little-endian Float32 Buffer. */
export function packFloat32(vec: ArrayLike<number>): Buffer {
  const buf = Buffer.alloc(vec.length * 4)
  for (let i = 0; i < vec.length; i++) {
    buf.writeFloatLE(vec[i], i * 4)
  }
  return buf
}

/** Unpack a little-endian Float32 Buffer into a Float32Array. Returns null on corrupt data. */
export function unpackFloat32(blob: Buffer, dims: number): Float32Array | null {
  if (blob.byteLength !== dims * 4) {
    console.warn(`[vector-store] corrupt embedding blob: expected ${dims * 4} bytes, got ${blob.byteLength}`)
    return null
  }
  const arr = new Float32Array(dims)
  for (let i = 0; i < dims; i++) {
    arr[i] = blob.readFloatLE(i * 4)
  }
  return arr
}

export function l2Normalize(vec: ArrayLike<number>): Float32Array {
  let norm = 0
  for (let i = 0; i < vec.length; i++) {
    norm += vec[i] * vec[i]
  }
  norm = Math.sqrt(norm)
  const out = new Float32Array(vec.length)
  for (let i = 0; i < vec.length; i++) {
    out[i] = norm === 0 ? 0 : vec[i] / norm
  }
  return out
}

/** Cosine similarity between two L2-normalized vectors: the dot product. */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  let dot = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
  }
  return dot
}

/** Cosine distance in [0, 2]; 0 for identical directions. */
export function cosineDistance(a: Float32Array, b: Float32Array): number {
  return 1 - cosineSimilarity(a, b)
}
