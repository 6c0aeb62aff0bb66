/**
 * Paths the access log stays silent for: exact matches plus any number of
 * patterns. Paths are compared as given, without normalization.
 */
export class ExclusionFilter {
  private paths = new Set<string>()
  private patterns: RegExp[] = []

  add(path: string): void {
    this.paths.add(path)
  }

  addPattern(pattern: string | RegExp): void {
    if (typeof pattern !== 'string') {
      // global and sticky regexes keep lastIndex between test() calls
      this.patterns.push(
        new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')),
      )
      return
    }
    try {
      this.patterns.push(new RegExp(pattern))
    } catch (err) {
      throw new Error(`Invalid exclusion pattern: ${pattern}`, { cause: err })
    }
  }

  matches(path: string): boolean {
    return (
      this.paths.has(path) || this.patterns.some((re) => re.test(path))
    )
  }

  get size(): number {
    return this.paths.size + this.patterns.length
  }
}
