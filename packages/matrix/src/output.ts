import type { Logger } from './logging'
import type { BuildMatrix, GateResult, OutputFormat } from './types'
import process from 'node:process'
import * as core from '@actions/core'
import { errorMessage } from './errors'
import { silentLogger } from './logging'
import { decodeJobData } from './matrix'

export const HAS_JOBS_VARIABLE = 'matrix_has_jobs'

export interface OutputOptions {
  format: OutputFormat
  /** Name of the matrix variable */
  variable?: string
  write?: (line: string) => void
  logger?: Logger
}

type MatrixJob = Record<string, string>

function toJob(entry: BuildMatrix[number]): MatrixJob {
  return {
    name: entry.name,
    instance: entry.instance,
    arch: entry.arch,
    python: entry.python,
    pythons: entry.pythons,
    job_data: entry.jobData,
  }
}

/**
 * GitHub Actions `strategy.matrix` value
 */
export function toGitHubMatrix(matrix: BuildMatrix): { include: MatrixJob[] } {
  return { include: matrix.map(toJob) }
}

/**
 * Azure Pipelines matrix: one key per job, every value a string
 */
export function toAzureMatrix(matrix: BuildMatrix): Record<string, MatrixJob> {
  const jobs: Record<string, MatrixJob> = {}
  for (const entry of matrix) {
    const { name, ...fields } = toJob(entry)
    jobs[name] = fields
  }
  return jobs
}

export function azureSetVariable(name: string, value: string): string {
  return `##vso[task.setvariable variable=${name};isOutput=true]${value}`
}

/**
 * Job summary listing what each job builds
 */
export function formatSummary(result: GateResult): string {
  const lines: string[] = ['## Wheel Build Matrix', '']
  if (!result.hasJobs) {
    lines.push('All requested wheels are already published; nothing to build.')
    return lines.join('\n')
  }

  lines.push('| Job | Instance | Python | Wheels |')
  lines.push('|-----|----------|--------|--------|')
  for (const entry of result.matrix) {
    const { packages } = decodeJobData(entry.jobData)
    const pythons = [entry.python, ...entry.pythons.split(' ').filter(Boolean)].join(', ')
    lines.push(`| ${entry.name} | ${entry.instance} | ${pythons} | ${packages.map(p => p.expected_output_filename).join('<br>')} |`)
  }
  return lines.join('\n')
}

/**
 * Publish the matrix and the has-jobs flag in the form the CI platform reads
 */
export async function writeMatrixOutput(result: GateResult, options: OutputOptions): Promise<void> {
  const variable = options.variable ?? 'matrix'
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`))
  const logger = options.logger ?? silentLogger

  switch (options.format) {
    case 'github': {
      if (result.hasJobs)
        core.setOutput(variable, JSON.stringify(toGitHubMatrix(result.matrix)))
      core.setOutput(HAS_JOBS_VARIABLE, String(result.hasJobs))
      if (process.env.GITHUB_STEP_SUMMARY) {
        try {
          await core.summary.addRaw(formatSummary(result), true).write()
        }
        catch (error) {
          logger.warn(`Could not write job summary: ${errorMessage(error)}`)
        }
      }
      break
    }
    case 'azure': {
      logger.info(`dumping build matrix to variable \`${variable}\``)
      write(azureSetVariable(variable, JSON.stringify(toAzureMatrix(result.matrix))))
      if (result.hasJobs)
        write(azureSetVariable(HAS_JOBS_VARIABLE, 'true'))
      break
    }
    case 'json': {
      write(JSON.stringify({ hasJobs: result.hasJobs, matrix: result.matrix }, null, 2))
      break
    }
  }
}
