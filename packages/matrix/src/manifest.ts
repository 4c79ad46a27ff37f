import type {
  BuildManifest,
  BuildRequest,
  ConstraintRule,
  ManifestPackage,
  ManifestPythonTarget,
  ManifestVersionSpec,
  ManifestWheelTarget,
} from './types'
import fs from 'node:fs'
import yaml from 'js-yaml'
import { errorMessage, ManifestParseError } from './errors'
import { assertSpecifier, isPythonTag } from './version'

type Fields = Record<string, unknown>

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Collects every problem in one pass so the error lists them all
 */
class ManifestValidator {
  readonly errors: string[] = []

  fail(path: string, message: string): void {
    this.errors.push(`${path}: ${message}`)
  }

  record(value: unknown, path: string, allowed: string[], required: string[] = []): Fields | undefined {
    if (!isRecord(value)) {
      this.fail(path, 'expected a mapping')
      return undefined
    }
    for (const key of Object.keys(value)) {
      if (!allowed.includes(key))
        this.fail(`${path}.${key}`, 'unrecognized field')
    }
    for (const key of required) {
      if (value[key] === undefined || value[key] === null)
        this.fail(`${path}.${key}`, 'required field is missing')
    }
    return value
  }

  /**
   * Mapping keys are used as written, so `1.0` and `'1.0 '` may not both
   * appear
   */
  key(key: string, path: string): boolean {
    if (!key.trim()) {
      this.fail(path, 'key is empty')
      return false
    }
    if (key !== key.trim()) {
      this.fail(path, 'key has leading or trailing whitespace')
      return false
    }
    return true
  }

  string(value: unknown, path: string): string | undefined {
    if (typeof value !== 'string' || !value.trim()) {
      this.fail(path, 'expected a non-empty string')
      return undefined
    }
    return value.trim()
  }

  list(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value) || value.length === 0) {
      this.fail(path, 'expected a non-empty list')
      return []
    }
    return value
  }

  strings(value: unknown, path: string): string[] {
    if (!Array.isArray(value)) {
      this.fail(path, 'expected a list of strings')
      return []
    }
    return value.flatMap((item, i) => this.string(item, `${path}[${i}]`) ?? [])
  }
}

function validatePython(v: ManifestValidator, value: unknown, path: string): ManifestPythonTarget | undefined {
  const raw = v.record(value, path, ['tag', 'abi'], ['tag'])
  if (!raw)
    return undefined

  const tag = raw.tag === undefined ? undefined : v.string(raw.tag, `${path}.tag`)
  if (tag && !isPythonTag(tag))
    v.fail(`${path}.tag`, `invalid python tag "${tag}", expected e.g. cp311`)

  const abi = raw.abi === undefined || raw.abi === null || raw.abi === '' ? undefined : v.string(raw.abi, `${path}.abi`)
  return tag ? { tag, abi } : undefined
}

function validateWheel(v: ManifestValidator, value: unknown, path: string): ManifestWheelTarget | undefined {
  const fields = ['platform_instance', 'platform_arch', 'platform_tag', 'python']
  const raw = v.record(value, path, fields, fields)
  if (!raw)
    return undefined

  const instance = raw.platform_instance === undefined ? undefined : v.string(raw.platform_instance, `${path}.platform_instance`)
  const arch = raw.platform_arch === undefined ? undefined : v.string(raw.platform_arch, `${path}.platform_arch`)
  const platformTag = raw.platform_tag === undefined ? undefined : v.string(raw.platform_tag, `${path}.platform_tag`)
  const python = raw.python === undefined
    ? []
    : v.list(raw.python, `${path}.python`).flatMap((p, i) => validatePython(v, p, `${path}.python[${i}]`) ?? [])

  if (!instance || !arch || !platformTag)
    return undefined
  return { platform_instance: instance, platform_arch: arch, platform_tag: platformTag, python }
}

function validateVersion(v: ManifestValidator, value: unknown, path: string): ManifestVersionSpec | undefined {
  const raw = v.record(value, path, ['wheels', 'build_flags'], ['wheels'])
  if (!raw)
    return undefined

  const wheels = raw.wheels === undefined
    ? []
    : v.list(raw.wheels, `${path}.wheels`).flatMap((w, i) => validateWheel(v, w, `${path}.wheels[${i}]`) ?? [])
  const spec: ManifestVersionSpec = { wheels }
  if (raw.build_flags !== undefined)
    spec.build_flags = v.strings(raw.build_flags, `${path}.build_flags`)
  return spec
}

function validatePackage(v: ManifestValidator, value: unknown, path: string): ManifestPackage | undefined {
  const raw = v.record(value, path, ['versions'], ['versions'])
  if (!raw || raw.versions === undefined)
    return undefined

  const versions = v.record(raw.versions, `${path}.versions`, Object.keys(isRecord(raw.versions) ? raw.versions : {}))
  if (!versions)
    return undefined
  if (Object.keys(versions).length === 0)
    v.fail(`${path}.versions`, 'expected at least one version')

  const out: Record<string, ManifestVersionSpec> = {}
  for (const [version, spec] of Object.entries(versions)) {
    if (!v.key(version, `${path}.versions.${version}`))
      continue
    const validated = validateVersion(v, spec, `${path}.versions.${version}`)
    if (validated)
      out[version] = validated
  }
  return { versions: out }
}

function validateConstraint(v: ManifestValidator, value: unknown, path: string): ConstraintRule | undefined {
  const fields = ['package', 'specifier', 'requirements']
  const raw = v.record(value, path, fields, fields)
  if (!raw)
    return undefined

  const pkg = raw.package === undefined ? undefined : v.string(raw.package, `${path}.package`)
  const specifier = raw.specifier === undefined ? undefined : v.string(raw.specifier, `${path}.specifier`)
  const requirements = raw.requirements === undefined ? [] : v.strings(raw.requirements, `${path}.requirements`)

  if (specifier) {
    try {
      assertSpecifier(specifier)
    }
    catch (error) {
      v.fail(`${path}.specifier`, errorMessage(error))
    }
  }

  if (!pkg || !specifier)
    return undefined
  return { package: pkg, specifier, requirements }
}

/**
 * Each instance runs on a single architecture; declaring it twice with
 * different arches is ambiguous
 */
function checkInstanceArches(v: ManifestValidator, packages: Record<string, ManifestPackage>): void {
  const arches = new Map<string, string>()
  for (const [name, pkg] of Object.entries(packages)) {
    for (const [version, spec] of Object.entries(pkg.versions)) {
      spec.wheels.forEach((wheel, i) => {
        const known = arches.get(wheel.platform_instance)
        if (known === undefined)
          arches.set(wheel.platform_instance, wheel.platform_arch)
        else if (known !== wheel.platform_arch)
          v.fail(`packages.${name}.versions.${version}.wheels[${i}].platform_arch`, `instance ${wheel.platform_instance} is already declared with arch ${known}`)
      })
    }
  }
}

/**
 * Validate an already-parsed manifest document
 */
export function validateManifest(document: unknown, source = '<manifest>'): BuildManifest {
  const v = new ManifestValidator()
  const raw = v.record(document, 'manifest', ['packages', 'constraints'], ['packages'])

  const packages: Record<string, ManifestPackage> = {}
  const constraints: ConstraintRule[] = []

  if (raw) {
    if (raw.packages !== undefined) {
      const pkgs = v.record(raw.packages, 'packages', Object.keys(isRecord(raw.packages) ? raw.packages : {}))
      if (pkgs && Object.keys(pkgs).length === 0)
        v.fail('packages', 'expected at least one package')
      for (const [name, pkg] of Object.entries(pkgs ?? {})) {
        if (!v.key(name, `packages.${name}`))
          continue
        const validated = validatePackage(v, pkg, `packages.${name}`)
        if (validated)
          packages[name] = validated
      }
    }
    if (raw.constraints !== undefined) {
      if (!Array.isArray(raw.constraints))
        v.fail('constraints', 'expected a list')
      else
        raw.constraints.forEach((c, i) => {
          const validated = validateConstraint(v, c, `constraints[${i}]`)
          if (validated)
            constraints.push(validated)
        })
    }
  }

  checkInstanceArches(v, packages)

  if (v.errors.length > 0)
    throw new ManifestParseError(source, v.errors)

  return constraints.length > 0 ? { packages, constraints } : { packages }
}

/**
 * Parse manifest YAML. The failsafe schema keeps every scalar a string, so a
 * version key written as `2.0` is not turned into the number 2.
 */
export function parseManifest(text: string, source = '<manifest>'): BuildManifest {
  let document: unknown
  try {
    document = yaml.load(text, { filename: source, schema: yaml.FAILSAFE_SCHEMA })
  }
  catch (error) {
    throw new ManifestParseError(source, [errorMessage(error)], { cause: error })
  }
  return validateManifest(document, source)
}

export function loadManifest(path: string): BuildManifest {
  let text: string
  try {
    text = fs.readFileSync(path, 'utf-8')
  }
  catch (error) {
    throw new ManifestParseError(path, [`cannot read file: ${errorMessage(error)}`], { cause: error })
  }
  return parseManifest(text, path)
}

/**
 * Flatten the manifest into build requests, in manifest order
 */
export function expandManifest(manifest: BuildManifest): BuildRequest[] {
  const requests: BuildRequest[] = []

  for (const [pkg, spec] of Object.entries(manifest.packages)) {
    for (const [version, versionSpec] of Object.entries(spec.versions)) {
      for (const wheel of versionSpec.wheels) {
        for (const python of wheel.python) {
          requests.push({
            package: pkg,
            version,
            instance: wheel.platform_instance,
            arch: wheel.platform_arch,
            platformTag: wheel.platform_tag,
            pythonTag: python.tag,
            abi: python.abi,
            buildFlags: [...(versionSpec.build_flags ?? [])],
            ordinal: requests.length,
          })
        }
      }
    }
  }

  return requests
}
