import type { ArtifactIndex } from '../src/types'
import { describe, expect, it, vi } from 'vitest'
import { InMemoryArtifactIndex } from '../src/artifact-index'
import { VersionResolutionError } from '../src/errors'
import { parseManifest } from '../src/manifest'
import { decodeJobData } from '../src/matrix'
import { generateBuildMatrix } from '../src/pipeline'
import { PyPIClient } from '../src/pypi'
import { FakePublicIndex, SAMPLE_MANIFEST } from './fixtures'

function wheelsPerJob(jobData: string): string[] {
  return decodeJobData(jobData).packages.map(p => p.expected_output_filename)
}

describe('generateBuildMatrix', () => {
  const manifest = parseManifest(SAMPLE_MANIFEST)

  it('builds only the wheels missing from the index, grouped by instance', async () => {
    const { gate, resolved, pending, published } = await generateBuildMatrix(manifest, {
      publicIndex: new FakePublicIndex({ bar: '9.9.9' }),
      artifactIndex: new InMemoryArtifactIndex(['foo-1.2.3-cp311-cp311-linux_x86_64.whl']),
    })

    expect(resolved.map(r => `${r.package}@${r.version}`)).toEqual(['foo@1.2.3', 'bar@9.9.9', 'baz@2.0'])
    expect(published.map(r => r.package)).toEqual(['foo'])
    expect(pending.map(r => r.package)).toEqual(['bar', 'baz'])

    expect(gate.hasJobs).toBe(true)
    expect(gate.matrix.map(e => e.name)).toEqual(['wheel_A', 'wheel_B'])
    expect(wheelsPerJob(gate.matrix[0].jobData)).toEqual(['bar-9.9.9-cp311-cp311-linux_x86_64.whl'])
    expect(wheelsPerJob(gate.matrix[1].jobData)).toEqual(['baz-2.0-cp311-cp311-linux_x86_64.whl'])
  })

  it('reports no jobs when every wheel is published', async () => {
    const { gate } = await generateBuildMatrix(manifest, {
      publicIndex: new FakePublicIndex({ bar: '9.9.9' }),
      artifactIndex: new InMemoryArtifactIndex([
        'foo-1.2.3-cp311-cp311-linux_x86_64.whl',
        'bar-9.9.9-cp311-cp311-linux_x86_64.whl',
        'baz-2.0-cp311-cp311-linux_x86_64.whl',
      ]),
    })

    expect(gate).toEqual({ matrix: [], hasJobs: false })
  })

  it('rebuilds for a newer latest release', async () => {
    const { gate } = await generateBuildMatrix(manifest, {
      publicIndex: new FakePublicIndex({ bar: '10.0' }),
      artifactIndex: new InMemoryArtifactIndex([
        'foo-1.2.3-cp311-cp311-linux_x86_64.whl',
        'bar-9.9.9-cp311-cp311-linux_x86_64.whl',
        'baz-2.0-cp311-cp311-linux_x86_64.whl',
      ]),
    })

    expect(gate.matrix.map(e => wheelsPerJob(e.jobData))).toEqual([['bar-10.0-cp311-cp311-linux_x86_64.whl']])
  })

  it('emits nothing when a latest lookup keeps timing out', async () => {
    const hanging: typeof fetch = (_input, init) => new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
    })
    const listPublished = vi.fn(async (_filenames: string[]) => new Set<string>())
    const artifactIndex: ArtifactIndex = { listPublished }

    const run = generateBuildMatrix(manifest, {
      publicIndex: new PyPIClient({ baseUrl: 'https://pypi.test/pypi', fetch: hanging, timeout: 10, retries: 2, retryDelay: 0 }),
      artifactIndex,
    })

    await expect(run).rejects.toThrow(VersionResolutionError)
    await expect(run).rejects.toThrow(/^Cannot resolve \S+ \(transport\): \S+ timed out after 10ms$/)
    expect(listPublished).not.toHaveBeenCalled()
  })

  it('fails when a pinned version does not exist', async () => {
    const run = generateBuildMatrix(manifest, {
      publicIndex: new FakePublicIndex({ bar: '9.9.9' }, ['baz']),
      artifactIndex: new InMemoryArtifactIndex(),
    })

    await expect(run).rejects.toThrow('Cannot resolve baz@2.0 (not-found): no such package')
  })
})
