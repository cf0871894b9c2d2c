import type { FieldMatch } from '../types/match.js'

/**
 * Immutable aggregate of all field matches for one candidate against one query.
 */
export class SimilarityResult {
  readonly address: string
  readonly score: number
  readonly coverage: readonly boolean[]
  readonly matches: readonly FieldMatch[]

  constructor(
    address: string,
    score: number,
    coverage: readonly boolean[],
    matches: readonly FieldMatch[]
  ) {
    this.address = address
    this.score = score
    this.coverage = Object.freeze([...coverage])
    this.matches = Object.freeze(matches.map((m) => Object.freeze({ ...m })))
    Object.freeze(this)
  }

  /**
   * The query with every character not claimed by a field match replaced by `?`.
   */
  coverageLine(): string {
    return Array.from(this.address)
      .map((ch, i) => (this.coverage[i] ? ch : '?'))
      .join('')
  }

  /**
   * Multi-line diagnostic rendering of the comparison.
   */
  describe(): string {
    const matchLines = this.matches.map((m) => {
      const span = m.matchSpan ? `[${m.matchSpan[0]}, ${m.matchSpan[1]})` : 'none'
      const goodness = m.goodness === null ? 'none' : m.goodness.toFixed(2)
      return `  ${m.fieldName}=${m.fieldValue} span=${span} goodness=${goodness}`
    })
    return [
      `query: ${this.address}`,
      `match: ${this.coverageLine()}`,
      'fieldMatches:',
      ...matchLines,
      `score: ${this.score}`,
    ].join('\n')
  }
}
