import type { PublicIndex, PublishedRelease, ResolvedBuildRequest } from '../src/types'
import { VersionResolutionError } from '../src/errors'
import { LATEST } from '../src/types'

export function sdistUrlFor(name: string, version: string): string {
  return `https://files.example.test/${name}-${version}.tar.gz`
}

/**
 * Public index answering from a fixed table of latest versions
 */
export class FakePublicIndex implements PublicIndex {
  readonly calls: string[] = []

  constructor(private latest: Record<string, string> = {}, private missing: string[] = []) {}

  async getRelease(name: string, version: string): Promise<PublishedRelease> {
    this.calls.push(`${name}@${version}`)
    if (this.missing.includes(name))
      throw new VersionResolutionError(name, version, 'not-found', 'no such package')

    const resolved = version === LATEST ? this.latest[name] : version
    if (!resolved)
      throw new VersionResolutionError(name, version, 'not-found', 'no latest release')
    return { version: resolved, sdistUrl: sdistUrlFor(name, resolved) }
  }
}

let ordinal = 0

export function makeRequest(overrides: Partial<ResolvedBuildRequest> = {}): ResolvedBuildRequest {
  const version = overrides.version ?? '1.0'
  return {
    package: 'foo',
    version,
    requestedVersion: version,
    instance: 'linux/x86_64',
    arch: 'x86_64',
    platformTag: 'linux_x86_64',
    pythonTag: 'cp311',
    buildFlags: [],
    sdistUrl: sdistUrlFor(overrides.package ?? 'foo', version),
    constraints: '',
    ordinal: ordinal++,
    ...overrides,
  }
}

export const SAMPLE_MANIFEST = `
packages:
  foo:
    versions:
      1.2.3:
        wheels:
          - platform_instance: A
            platform_arch: x86_64
            platform_tag: linux_x86_64
            python:
              - tag: cp311
  bar:
    versions:
      latest:
        wheels:
          - platform_instance: A
            platform_arch: x86_64
            platform_tag: linux_x86_64
            python:
              - tag: cp311
  baz:
    versions:
      2.0:
        wheels:
          - platform_instance: B
            platform_arch: x86_64
            platform_tag: linux_x86_64
            python:
              - tag: cp311
`
