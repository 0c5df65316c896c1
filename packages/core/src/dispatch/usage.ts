/**
 * In-memory token usage ledger for embedding and rerank calls.
 * Services that omit usage get a local estimate, flagged `estimated`.
 */

export type CallType = 'embedding' | 'rerank'

export interface UsageRecord {
  timestamp: string
  callType: CallType
  modelName: string
  promptTokens: number
  completionTokens: number
  totalTokens: number
  durationMs: number
  estimated: boolean
}

export interface UsageSummary {
  callType: CallType
  modelName: string
  calls: number
  promptTokens: number
  completionTokens: number
  totalTokens: number
  estimatedCalls: number
  totalDurationMs: number
}

/** Rough token count: one token per four characters. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}

const DEFAULT_MAX_RECORDS = 1000

export class UsageLedger {
  private entries: UsageRecord[] = []
  private totals = new Map<string, UsageSummary>()
  private readonly maxRecords: number

  constructor(options?: { maxRecords?: number }) {
    this.maxRecords = options?.maxRecords ?? DEFAULT_MAX_RECORDS
  }

  record(entry: UsageRecord): void {
    this.entries.push(entry)
    if (this.entries.length > this.maxRecords) {
      this.entries.splice(0, this.entries.length - this.maxRecords)
    }

    const key = `${entry.callType}\u0000${entry.modelName}`
    const summary = this.totals.get(key) ?? {
      callType: entry.callType,
      modelName: entry.modelName,
      calls: 0,
      promptTokens: 0,
      completionTokens: 0,
      totalTokens: 0,
      estimatedCalls: 0,
      totalDurationMs: 0,
    }
    summary.calls += 1
    summary.promptTokens += entry.promptTokens
    summary.completionTokens += entry.completionTokens
    summary.totalTokens += entry.totalTokens
    summary.estimatedCalls += entry.estimated ? 1 : 0
    summary.totalDurationMs += entry.durationMs
    this.totals.set(key, summary)
  }

  /** Most recent records, oldest first. */
  records(): readonly UsageRecord[] {
    return [...this.entries]
  }

  /** Totals per (call type, model) since creation or the last `clear()`. */
  summary(): UsageSummary[] {
    return [...this.totals.values()]
      .map((s) => ({ ...s }))
      .sort((a, b) => a.callType.localeCompare(b.callType) || a.modelName.localeCompare(b.modelName))
  }

  clear(): void {
    this.entries = []
    this.totals.clear()
  }
}
