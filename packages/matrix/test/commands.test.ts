import type { PipelineDeps } from '../src/pipeline'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import process from 'node:process'
import { Writable } from 'node:stream'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { InMemoryArtifactIndex } from '../src/artifact-index'
import { checkCommand, generateCommand } from '../src/commands'
import { resolveConfig } from '../src/config'
import { ManifestParseError } from '../src/errors'
import { createLogger, silentLogger } from '../src/logging'
import { FakePublicIndex, SAMPLE_MANIFEST } from './fixtures'

describe('commands', () => {
  let dir: string
  let manifestPath: string
  let lines: string[]

  function deps(published: string[] = []): PipelineDeps {
    return {
      publicIndex: new FakePublicIndex({ bar: '9.9.9' }),
      artifactIndex: new InMemoryArtifactIndex(published),
    }
  }

  function context(published: string[] = []) {
    return {
      config: resolveConfig({ manifestPath, index: { directory: dir }, output: { format: 'json' } }, {}),
      logger: silentLogger,
      deps: deps(published),
      write: (line: string) => {
        lines.push(line)
      },
    }
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wheelhouse-cli-'))
    manifestPath = path.join(dir, 'wheel_matrix.yml')
    fs.writeFileSync(manifestPath, SAMPLE_MANIFEST)
    lines = []
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  describe('generateCommand', () => {
    it('prints the matrix and reports pending work', async () => {
      const hasJobs = await generateCommand(context(['foo-1.2.3-cp311-cp311-linux_x86_64.whl']))

      expect(hasJobs).toBe(true)
      expect(lines).toHaveLength(1)
      const printed: { hasJobs: boolean, matrix: Array<{ name: string }> } = JSON.parse(lines[0])
      expect(printed.hasJobs).toBe(true)
      expect(printed.matrix.map(e => e.name)).toEqual(['wheel_A', 'wheel_B'])
    })

    it('reports no work when everything is published', async () => {
      const hasJobs = await generateCommand(context([
        'foo-1.2.3-cp311-cp311-linux_x86_64.whl',
        'bar-9.9.9-cp311-cp311-linux_x86_64.whl',
        'baz-2.0-cp311-cp311-linux_x86_64.whl',
      ]))

      expect(hasJobs).toBe(false)
      expect(lines).toEqual(['{\n  "hasJobs": false,\n  "matrix": []\n}'])
    })

    it('keeps stdout to the JSON matrix and logs through the command logger', async () => {
      const logged: string[] = []
      const stderr = new Writable({
        write(chunk, _encoding, callback) {
          logged.push(String(chunk))
          callback()
        },
      })
      const stdout: string[] = []
      const spy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
        stdout.push(String(chunk))
        return true
      })

      const run = generateCommand({
        ...context(['foo-1.2.3-cp311-cp311-linux_x86_64.whl']),
        write: undefined,
        logger: createLogger({ stream: stderr }),
      })
      const hasJobs = await run.finally(() => spy.mockRestore())

      expect(hasJobs).toBe(true)
      const printed: { hasJobs: boolean, matrix: Array<{ name: string }> } = JSON.parse(stdout.join(''))
      expect(printed.hasJobs).toBe(true)
      expect(printed.matrix.map(e => e.name)).toEqual(['wheel_A', 'wheel_B'])
      expect(logged).toEqual([
        'Manifest requests 3 wheel build(s)\n',
        'Resolving versions\n',
        'bar: latest is 9.9.9\n',
        'Checking wheel index\n',
        '1 already published, 2 to build\n',
        'Build matrix has 2 job(s): wheel_A, wheel_B\n',
      ])
    })

    it('rejects an invalid configuration before doing anything', async () => {
      const ctx = { ...context(), config: resolveConfig({ manifestPath }, {}) }

      await expect(generateCommand(ctx)).rejects.toThrow(
        'Invalid configuration:\n  - index.bucket (WHEELHOUSE_BUCKET) or index.directory (WHEELHOUSE_INDEX_DIR) is required',
      )
      expect(lines).toEqual([])
    })

    it('fails on a missing manifest', async () => {
      const ctx = context()
      ctx.config.manifestPath = path.join(dir, 'missing.yml')

      await expect(generateCommand(ctx)).rejects.toThrow(ManifestParseError)
      expect(lines).toEqual([])
    })
  })

  describe('checkCommand', () => {
    it('lists each wheel as published or to build', async () => {
      const result = await checkCommand(context(['foo-1.2.3-cp311-cp311-linux_x86_64.whl']))

      expect(result).toEqual([
        '  - foo-1.2.3-cp311-cp311-linux_x86_64.whl on A (already published)',
        '  - bar-9.9.9-cp311-cp311-linux_x86_64.whl on A (would build)',
        '  - baz-2.0-cp311-cp311-linux_x86_64.whl on B (would build)',
      ])
      expect(lines).toEqual(result)
    })
  })
})
