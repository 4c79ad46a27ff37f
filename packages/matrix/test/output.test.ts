import type { GateResult } from '../src/types'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { gateMatrix } from '../src/gate'
import { generateMatrix } from '../src/matrix'
import { azureSetVariable, formatSummary, toAzureMatrix, toGitHubMatrix, writeMatrixOutput } from '../src/output'
import { makeRequest } from './fixtures'

const core = vi.hoisted(() => {
  const summary = {
    addRaw: vi.fn(),
    write: vi.fn(async () => {}),
  }
  summary.addRaw.mockReturnValue(summary)
  return { setOutput: vi.fn(), summary }
})

vi.mock('@actions/core', () => core)

function withJobs(): GateResult {
  return gateMatrix(generateMatrix([
    makeRequest({ instance: 'A', ordinal: 0 }),
    makeRequest({ instance: 'A', pythonTag: 'cp38', ordinal: 1 }),
  ]))
}

const EMPTY: GateResult = { matrix: [], hasJobs: false }

describe('matrix formats', () => {
  it('lists GitHub jobs under include', () => {
    const [entry] = withJobs().matrix

    expect(toGitHubMatrix([entry])).toEqual({
      include: [{
        name: 'wheel_A',
        instance: 'A',
        arch: 'x86_64',
        python: '3.8',
        pythons: '3.11',
        job_data: entry.jobData,
      }],
    })
  })

  it('keys Azure jobs by name', () => {
    const [entry] = withJobs().matrix

    expect(toAzureMatrix([entry])).toEqual({
      wheel_A: {
        instance: 'A',
        arch: 'x86_64',
        python: '3.8',
        pythons: '3.11',
        job_data: entry.jobData,
      },
    })
  })

  it('writes Azure output variables', () => {
    expect(azureSetVariable('matrix', '{}')).toBe('##vso[task.setvariable variable=matrix;isOutput=true]{}')
  })
})

describe('formatSummary', () => {
  it('tabulates the wheels of every job', () => {
    expect(formatSummary(withJobs())).toBe([
      '## Wheel Build Matrix',
      '',
      '| Job | Instance | Python | Wheels |',
      '|-----|----------|--------|--------|',
      '| wheel_A | A | 3.8, 3.11 | foo-1.0-cp311-cp311-linux_x86_64.whl<br>foo-1.0-cp38-cp38-linux_x86_64.whl |',
    ].join('\n'))
  })

  it('says when there is nothing to build', () => {
    expect(formatSummary(EMPTY)).toBe('## Wheel Build Matrix\n\nAll requested wheels are already published; nothing to build.')
  })
})

describe('writeMatrixOutput', () => {
  beforeEach(() => {
    vi.stubEnv('GITHUB_STEP_SUMMARY', '')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.clearAllMocks()
  })

  it('sets GitHub step outputs', async () => {
    const result = withJobs()

    await writeMatrixOutput(result, { format: 'github' })

    expect(core.setOutput.mock.calls).toEqual([
      ['matrix', JSON.stringify(toGitHubMatrix(result.matrix))],
      ['matrix_has_jobs', 'true'],
    ])
    expect(core.summary.write).not.toHaveBeenCalled()
  })

  it('sets only the has-jobs output for an empty matrix', async () => {
    await writeMatrixOutput(EMPTY, { format: 'github', variable: 'wheels' })

    expect(core.setOutput.mock.calls).toEqual([['matrix_has_jobs', 'false']])
  })

  it('writes the job summary when GitHub provides one', async () => {
    vi.stubEnv('GITHUB_STEP_SUMMARY', '/tmp/step-summary.md')
    const result = withJobs()

    await writeMatrixOutput(result, { format: 'github' })

    expect(core.summary.addRaw).toHaveBeenCalledWith(formatSummary(result), true)
    expect(core.summary.write).toHaveBeenCalledTimes(1)
  })

  it('prints Azure logging commands', async () => {
    const lines: string[] = []
    const result = withJobs()

    await writeMatrixOutput(result, { format: 'azure', write: line => lines.push(line) })

    expect(lines).toEqual([
      azureSetVariable('matrix', JSON.stringify(toAzureMatrix(result.matrix))),
      '##vso[task.setvariable variable=matrix_has_jobs;isOutput=true]true',
    ])
  })

  it('leaves the Azure has-jobs variable unset for an empty matrix', async () => {
    const lines: string[] = []

    await writeMatrixOutput(EMPTY, { format: 'azure', variable: 'wheels', write: line => lines.push(line) })

    expect(lines).toEqual(['##vso[task.setvariable variable=wheels;isOutput=true]{}'])
  })

  it('prints JSON', async () => {
    const lines: string[] = []

    await writeMatrixOutput(EMPTY, { format: 'json', write: line => lines.push(line) })

    expect(lines).toEqual(['{\n  "hasJobs": false,\n  "matrix": []\n}'])
    expect(core.setOutput).not.toHaveBeenCalled()
  })
})
