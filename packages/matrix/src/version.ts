const PYTHON_TAG = /^cp(?<major>\d)(?<minor>\d{1,2})$/

export function isPythonTag(tag: string): boolean {
  return PYTHON_TAG.test(tag)
}

/**
 * `cp311` → `3.11`
 */
export function pythonTagToVersion(tag: string): string {
  const match = PYTHON_TAG.exec(tag)
  if (!match?.groups)
    throw new Error(`invalid python tag ${tag}`)
  return `${match.groups.major}.${match.groups.minor}`
}

/**
 * `cp311` → `python3.11`
 */
export function pythonTagToInterpreter(tag: string): string {
  return `python${pythonTagToVersion(tag)}`
}

const VERSION_PATTERN = /^v?(?:(?<epoch>\d+)!)?(?<release>\d+(?:\.\d+)*)(?:[-_.]?(?<preLabel>alpha|a|beta|b|preview|pre|c|rc)[-_.]?(?<preNumber>\d*))?(?:-(?<postImplicit>\d+)|[-_.]?(?:post|rev|r)[-_.]?(?<postNumber>\d*))?(?:[-_.]?dev[-_.]?(?<devNumber>\d*))?(?:\+[a-z0-9]+(?:[-_.][a-z0-9]+)*)?$/

const PRE_PHASES: Record<string, number> = {
  alpha: 0,
  a: 0,
  beta: 1,
  b: 1,
  preview: 2,
  pre: 2,
  c: 2,
  rc: 2,
}

interface ParsedVersion {
  epoch: number
  release: number[]
  /** Phase (0 = a, 1 = b, 2 = rc) and number */
  pre?: [number, number]
  post?: number
  dev?: number
}

function parseVersion(version: string): ParsedVersion | undefined {
  const groups = VERSION_PATTERN.exec(version.trim().toLowerCase())?.groups
  if (!groups)
    return undefined

  const parsed: ParsedVersion = {
    epoch: groups.epoch ? Number(groups.epoch) : 0,
    release: groups.release.split('.').map(Number),
  }
  if (groups.preLabel)
    parsed.pre = [PRE_PHASES[groups.preLabel], Number(groups.preNumber || 0)]
  if (groups.postImplicit !== undefined)
    parsed.post = Number(groups.postImplicit)
  else if (groups.postNumber !== undefined)
    parsed.post = Number(groups.postNumber || 0)
  if (groups.devNumber !== undefined)
    parsed.dev = Number(groups.devNumber || 0)
  return parsed
}

function isPreRelease(version: ParsedVersion): boolean {
  return version.pre !== undefined || version.dev !== undefined
}

function compareRelease(a: number[], b: number[]): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const na = a[i] ?? 0
    const nb = b[i] ?? 0
    if (na !== nb)
      return na - nb
  }
  return 0
}

/**
 * Sort key of everything after the release segments:
 * dev < a < b < rc < release < post, numeric within a phase
 */
function suffixKey(version: ParsedVersion): number[] {
  const pre = version.pre ?? (version.dev !== undefined && version.post === undefined
    ? [-1, 0]
    : [Number.POSITIVE_INFINITY, 0])
  const post = version.post ?? Number.NEGATIVE_INFINITY
  const dev = version.dev ?? Number.POSITIVE_INFINITY
  return [...pre, post, dev]
}

function compareParsed(a: ParsedVersion, b: ParsedVersion): number {
  if (a.epoch !== b.epoch)
    return a.epoch - b.epoch
  const release = compareRelease(a.release, b.release)
  if (release !== 0)
    return release

  const ka = suffixKey(a)
  const kb = suffixKey(b)
  for (let i = 0; i < ka.length; i++) {
    if (ka[i] !== kb[i])
      return ka[i] < kb[i] ? -1 : 1
  }
  return 0
}

/**
 * Compare versions in PEP 440 order. Returns <0 if a<b, 0 if equal, >0 if a>b.
 * Trailing zeros are insignificant (`6.0` equals `6`). Strings that are not
 * valid versions sort as plain text after valid ones.
 */
export function compareVersions(a: string, b: string): number {
  const pa = parseVersion(a)
  const pb = parseVersion(b)
  if (pa && pb)
    return compareParsed(pa, pb)
  if (pa)
    return -1
  if (pb)
    return 1
  return a < b ? -1 : a > b ? 1 : 0
}

const OPERATORS = ['~=', '==', '!=', '>=', '<=', '>', '<'] as const
type Operator = typeof OPERATORS[number]

interface Clause {
  op: Operator
  text: string
  target: ParsedVersion
  /** `==1.4.*` style prefix match */
  wildcard: boolean
}

function parseClause(clause: string): Clause {
  const trimmed = clause.trim()
  const op = OPERATORS.find(o => trimmed.startsWith(o))
  if (!op)
    throw new Error(`invalid version specifier clause "${trimmed}"`)
  const text = trimmed.slice(op.length).trim()
  if (!text)
    throw new Error(`version specifier clause "${trimmed}" has no version`)

  const wildcard = text.endsWith('.*')
  if (wildcard && op !== '==' && op !== '!=')
    throw new Error(`version specifier clause "${trimmed}" uses .* with ${op}`)
  const target = parseVersion(wildcard ? text.slice(0, -2) : text)
  if (!target)
    throw new Error(`version specifier clause "${trimmed}" has an invalid version "${text}"`)
  if (op === '~=' && target.release.length < 2)
    throw new Error(`~= needs at least two release segments, got ${text}`)
  return { op, text, target, wildcard }
}

function hasReleasePrefix(version: ParsedVersion, prefix: ParsedVersion, length = prefix.release.length): boolean {
  if (version.epoch !== prefix.epoch)
    return false
  return compareRelease(version.release.slice(0, length), prefix.release.slice(0, length)) === 0
}

function sameBase(a: ParsedVersion, b: ParsedVersion): boolean {
  return a.epoch === b.epoch && compareRelease(a.release, b.release) === 0
}

function matchesClause(version: ParsedVersion, { op, target, wildcard }: Clause): boolean {
  const cmp = compareParsed(version, target)
  switch (op) {
    case '==': return wildcard ? hasReleasePrefix(version, target) : cmp === 0
    case '!=': return wildcard ? !hasReleasePrefix(version, target) : cmp !== 0
    case '>=': return cmp >= 0
    case '<=': return cmp <= 0
    // `>6.0` leaves out 6.0.post1 and `<6.0` leaves out 6.0rc1
    case '>': return cmp > 0 && !(target.post === undefined && version.post !== undefined && sameBase(version, target))
    case '<': return cmp < 0 && !(!isPreRelease(target) && isPreRelease(version) && sameBase(version, target))
    case '~=': return cmp >= 0 && hasReleasePrefix(version, target, target.release.length - 1)
  }
}

function parseSpecifier(specifier: string): Clause[] {
  const clauses = specifier.split(',').filter(clause => clause.trim()).map(parseClause)
  if (clauses.length === 0)
    throw new Error('empty version specifier')
  return clauses
}

/**
 * Check a version against a comma separated specifier such as `>= 5.4, <= 6.0`.
 * Every clause must hold. Pre-releases only match when a clause names one.
 */
export function satisfiesSpecifier(version: string, specifier: string): boolean {
  const parsed = parseVersion(version)
  if (!parsed)
    return false

  const clauses = parseSpecifier(specifier)
  if (isPreRelease(parsed) && !clauses.some(clause => isPreRelease(clause.target)))
    return false
  return clauses.every(clause => matchesClause(parsed, clause))
}

/**
 * Throws when `specifier` cannot be parsed
 */
export function assertSpecifier(specifier: string): void {
  parseSpecifier(specifier)
}
