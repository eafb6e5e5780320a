import type { Role, Turn } from "./types.js"

/**
 * Ordered, session-scoped list of committed turns.
 *
 * Only the commit guard and the failure normalizer append assistant turns; the
 * session appends user turns. Readers get copies from `all()`, so nothing
 * outside the store can reorder or edit a committed turn.
 */
export class TranscriptStore {
  private turns: Turn[] = []
  private revisionCounter = 0

  append(turn: Turn): void {
    this.turns.push({ role: turn.role, content: turn.content })
    this.revisionCounter += 1
  }

  clear(): void {
    if (this.turns.length === 0) return
    this.turns = []
    this.revisionCounter += 1
  }

  lastRole(): Role | null {
    return this.turns.at(-1)?.role ?? null
  }

  all(): ReadonlyArray<Turn> {
    return this.turns.map((turn) => ({ ...turn }))
  }

  get size(): number {
    return this.turns.length
  }

  get revision(): number {
    return this.revisionCounter
  }
}

export type TranscriptView = Pick<TranscriptStore, "all" | "lastRole" | "size" | "revision">
