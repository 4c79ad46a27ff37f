import type { Logger } from './logging'
import type { BuildMatrix, JobData, MatrixEntry, PackageBuild, ResolvedBuildRequest } from './types'
import { silentLogger } from './logging'
import { compareVersions, pythonTagToInterpreter, pythonTagToVersion } from './version'
import { artifactId, artifactKey, sdistDir, wheelFilename } from './wheel'

function jobName(instance: string): string {
  return `wheel_${instance.replace(/\W/g, '_')}`
}

function sameFlags(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((flag, i) => flag === b[i])
}

/**
 * Drop requests that build the same artifact on the same instance, keeping
 * the first in manifest order. The same artifact on two instances stays two
 * requests.
 */
export function dedupeRequests(requests: ResolvedBuildRequest[], logger: Logger = silentLogger): ResolvedBuildRequest[] {
  const seen = new Map<string, ResolvedBuildRequest>()
  const sorted = [...requests].sort((a, b) => a.ordinal - b.ordinal)

  for (const request of sorted) {
    const key = `${request.instance}\0${artifactId(artifactKey(request))}`
    const first = seen.get(key)
    if (!first) {
      seen.set(key, request)
      continue
    }
    if (!sameFlags(first.buildFlags, request.buildFlags))
      logger.warn(`${wheelFilename(request)} is requested twice for ${request.instance} with different build flags; keeping [${first.buildFlags.join(' ')}]`)
    else
      logger.debug(`${wheelFilename(request)} is requested twice for ${request.instance}, building it once`)
  }

  return Array.from(seen.values())
}

export function toPackageBuild(request: ResolvedBuildRequest): PackageBuild {
  return {
    name: request.package,
    version: request.version,
    requested_version: request.requestedVersion,
    python: pythonTagToInterpreter(request.pythonTag),
    python_version: pythonTagToVersion(request.pythonTag),
    python_tag: request.pythonTag,
    abi: request.abi ?? '',
    platform_tag: request.platformTag,
    sdist_dir: sdistDir(request.package, request.version),
    sdist_url: request.sdistUrl,
    expected_output_filename: wheelFilename(request),
    constraints: request.constraints,
    build_flags: [...request.buildFlags],
    ordinal: request.ordinal,
  }
}

function buildEntry(name: string, group: ResolvedBuildRequest[]): MatrixEntry {
  const { instance, arch } = group[0]
  const jobData: JobData = { instance, arch, packages: group.map(toPackageBuild) }

  const pythons = Array.from(new Set(jobData.packages.map(p => p.python_version))).sort(compareVersions)
  const [python, ...rest] = pythons

  return {
    name,
    instance,
    arch,
    python,
    pythons: rest.join(' '),
    jobData: JSON.stringify(jobData),
  }
}

/**
 * Group requests into one matrix entry per instance.
 *
 * Requests inside an entry keep manifest order; entries are sorted by name so
 * that identical inputs always serialize identically.
 */
export function generateMatrix(requests: ResolvedBuildRequest[], logger: Logger = silentLogger): BuildMatrix {
  const groups = new Map<string, ResolvedBuildRequest[]>()
  for (const request of dedupeRequests(requests, logger)) {
    const group = groups.get(request.instance)
    if (group)
      group.push(request)
    else
      groups.set(request.instance, [request])
  }

  const used = new Set<string>()
  const entries: BuildMatrix = []
  const instances = Array.from(groups.keys()).sort()

  for (const instance of instances) {
    let name = jobName(instance)
    for (let n = 2; used.has(name); n++)
      name = `${jobName(instance)}_${n}`
    used.add(name)

    const entry = buildEntry(name, groups.get(instance) ?? [])
    logger.debug(`${entry.name} data is ${entry.jobData}`)
    entries.push(entry)
  }

  return entries.sort((a, b) => a.name < b.name ? -1 : a.name > b.name ? 1 : 0)
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

function readPackageBuild(value: unknown, index: number): PackageBuild {
  if (typeof value !== 'object' || value === null)
    throw new Error(`job data package ${index} is not an object`)

  const fields: Record<string, unknown> = { ...value }
  const text = (key: keyof PackageBuild): string => {
    const field = fields[key]
    if (typeof field !== 'string')
      throw new Error(`job data package ${index} has no ${key}`)
    return field
  }
  const { build_flags: buildFlags, ordinal } = fields
  if (!isStringList(buildFlags))
    throw new Error(`job data package ${index} has no build_flags`)
  if (typeof ordinal !== 'number')
    throw new Error(`job data package ${index} has no ordinal`)

  return {
    name: text('name'),
    version: text('version'),
    requested_version: text('requested_version'),
    python: text('python'),
    python_version: text('python_version'),
    python_tag: text('python_tag'),
    abi: text('abi'),
    platform_tag: text('platform_tag'),
    sdist_dir: text('sdist_dir'),
    sdist_url: text('sdist_url'),
    expected_output_filename: text('expected_output_filename'),
    constraints: text('constraints'),
    build_flags: buildFlags,
    ordinal,
  }
}

/**
 * Parse and check a serialized job payload
 */
export function decodeJobData(jobData: string): JobData {
  const parsed: unknown = JSON.parse(jobData)
  if (typeof parsed !== 'object' || parsed === null)
    throw new Error('job data is not an object')

  const { instance, arch, packages }: Record<string, unknown> = { ...parsed }
  if (typeof instance !== 'string' || typeof arch !== 'string')
    throw new Error('job data has no instance or arch')
  if (!Array.isArray(packages))
    throw new Error('job data has no packages list')

  return { instance, arch, packages: packages.map(readPackageBuild) }
}

/**
 * Recover the requests that were grouped into `entry`
 */
export function decodeMatrixEntry(entry: MatrixEntry): ResolvedBuildRequest[] {
  const { instance, arch, packages } = decodeJobData(entry.jobData)

  return packages.map((p) => {
    const request: ResolvedBuildRequest = {
      package: p.name,
      version: p.version,
      instance,
      arch,
      platformTag: p.platform_tag,
      pythonTag: p.python_tag,
      buildFlags: p.build_flags,
      ordinal: p.ordinal,
      requestedVersion: p.requested_version,
      sdistUrl: p.sdist_url,
      constraints: p.constraints,
    }
    if (p.abi)
      request.abi = p.abi
    return request
  })
}
