/**
 * Sentinel used in the manifest for "whatever PyPI currently calls latest"
 */
export const LATEST = 'latest'

/**
 * A single wheel to build, as expanded from the manifest
 */
export interface BuildRequest {
  /** Package name as written in the manifest */
  package: string
  /** Concrete version string or the `latest` sentinel */
  version: string
  /** Build instance the wheel is built on (the matrix grouping key) */
  instance: string
  /** CPU architecture of the instance */
  arch: string
  /** Wheel platform tag, e.g. `freebsd_13_0_amd64` */
  platformTag: string
  /** Python tag, e.g. `cp38` */
  pythonTag: string
  /** ABI tag, e.g. `abi3`; absent means the python tag is reused */
  abi?: string
  /** Extra flags handed to the build job untouched */
  buildFlags: string[]
  /** Position in the manifest, used to keep output order stable */
  ordinal: number
}

/**
 * A build request whose version is always concrete
 */
export interface ResolvedBuildRequest extends BuildRequest {
  /** What the manifest asked for (`latest` or the concrete version) */
  requestedVersion: string
  /** Source distribution the build job downloads */
  sdistUrl: string
  /** pip constraints applied while building, newline separated */
  constraints: string
}

/**
 * Identity of a published wheel
 */
export interface ArtifactKey {
  package: string
  version: string
  /** `python-abi-platform` wheel tag triple */
  tag: string
}

/**
 * One package entry inside a job payload
 */
export interface PackageBuild {
  name: string
  version: string
  requested_version: string
  /** Interpreter binary name, e.g. `python3.8` */
  python: string
  python_version: string
  python_tag: string
  abi: string
  platform_tag: string
  sdist_dir: string
  sdist_url: string
  expected_output_filename: string
  constraints: string
  build_flags: string[]
  /** Position in the manifest */
  ordinal: number
}

/**
 * Structured payload smuggled through the CI matrix as a JSON string
 */
export interface JobData {
  instance: string
  arch: string
  packages: PackageBuild[]
}

/**
 * One CI job: everything built on a single instance type
 */
export interface MatrixEntry {
  /** Job name, unique across the matrix */
  name: string
  instance: string
  arch: string
  /** Lowest Python version in the job, used to request the instance */
  python: string
  /** Remaining Python versions to install, space separated */
  pythons: string
  /** Serialized {@link JobData} */
  jobData: string
}

export type BuildMatrix = MatrixEntry[]

export interface GateResult {
  matrix: BuildMatrix
  hasJobs: boolean
}

// --- Manifest ---

export interface ManifestPythonTarget {
  tag: string
  abi?: string
}

export interface ManifestWheelTarget {
  platform_instance: string
  platform_arch: string
  platform_tag: string
  python: ManifestPythonTarget[]
}

export interface ManifestVersionSpec {
  build_flags?: string[]
  wheels: ManifestWheelTarget[]
}

export interface ManifestPackage {
  versions: Record<string, ManifestVersionSpec>
}

/**
 * Build constraint rule: packages matching `package` at a version inside
 * `specifier` are built with `requirements` pinned
 */
export interface ConstraintRule {
  package: string
  specifier: string
  requirements: string[]
}

export interface BuildManifest {
  packages: Record<string, ManifestPackage>
  constraints?: ConstraintRule[]
}

// --- Collaborators ---

/**
 * A release as reported by the public package index
 */
export interface PublishedRelease {
  version: string
  sdistUrl?: string
}

/**
 * Read-only view of the public package index
 */
export interface PublicIndex {
  getRelease(name: string, version: string): Promise<PublishedRelease>
}

/**
 * Read-only view of the private wheel index
 */
export interface ArtifactIndex {
  /**
   * Return the file names from `filenames` that are already published
   */
  listPublished(filenames: string[]): Promise<Set<string>>
}

export type OutputFormat = 'github' | 'azure' | 'json'

/**
 * Wheelhouse configuration
 */
export interface WheelhouseConfig {
  /** Path to the build manifest */
  manifestPath: string
  /** Log debug output as info */
  verbose: boolean
  /** Max concurrent lookups against either index */
  concurrency: number
  pypi: {
    /** Base URL of the PyPI JSON API */
    baseUrl: string
    /** Per-request timeout in ms */
    timeout: number
    /** Retries after the first attempt, transport errors only */
    retries: number
    /** Initial backoff in ms, doubled on each retry */
    retryDelay: number
  }
  index: {
    /** S3 bucket holding published wheels */
    bucket: string
    region: string
    /** Key prefix the wheels live under */
    prefix: string
    /** Local directory to use instead of S3 */
    directory?: string
    /** Per-request timeout in ms */
    timeout: number
    retries: number
    retryDelay: number
  }
  output: {
    format: OutputFormat
    /** Name of the matrix output variable */
    variable: string
  }
}
