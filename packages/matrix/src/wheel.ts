import type { ArtifactKey, BuildRequest } from './types'

type WheelTarget = Pick<BuildRequest, 'package' | 'version' | 'pythonTag' | 'abi' | 'platformTag'>

/**
 * Directory the sdist unpacks into: `typed-ast` 1.5.4 → `typed_ast-1.5.4`
 */
export function sdistDir(pkg: string, version: string): string {
  return `${pkg.replace(/-/g, '_')}-${version}`
}

export function wheelTag(target: Pick<BuildRequest, 'pythonTag' | 'abi' | 'platformTag'>): string {
  return [target.pythonTag, target.abi || target.pythonTag, target.platformTag].join('-')
}

export function artifactKey(target: WheelTarget): ArtifactKey {
  return {
    package: target.package,
    version: target.version,
    tag: wheelTag(target),
  }
}

/**
 * Wheel file name a build of `target` produces; also the identity used to
 * look the artifact up in the wheel index
 */
export function wheelFilename(target: WheelTarget): string {
  return `${sdistDir(target.package, target.version)}-${wheelTag(target)}.whl`
}

/**
 * String form of an artifact key; equal iff all three fields are equal
 */
export function artifactId(key: ArtifactKey): string {
  return JSON.stringify([key.package, key.version, key.tag])
}
