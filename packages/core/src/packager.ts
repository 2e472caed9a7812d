import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {basename, dirname, join, resolve} from 'node:path'
import ignore from 'ignore'
import * as tar from 'tar'
import {PackagingError, RunAbortedError, UploadError} from './errors.js'
import type {ComputePlatform} from './platform/platform.js'
import type {RunIdentity, UploadedArtifact} from './types.js'

/** Version-control metadata never shipped with a project. */
export const EXCLUDED_PATTERNS = ['.git', '.gitignore']

/**
 * Returns a predicate telling whether an archive entry must be left out.
 * Entry paths are relative to the archive root, i.e. prefixed with the
 * project directory name.
 */
export function buildExcludeFilter(rootDir: string): (entryPath: string) => boolean {
  const ig = ignore().add(EXCLUDED_PATTERNS)

  return (entryPath: string) => {
    const normalized = entryPath.replaceAll('\\', '/').replace(/^\.\//, '').replace(/\/+$/, '')
    if (normalized === rootDir) {
      return false
    }

    const relative = normalized.startsWith(`${rootDir}/`) ? normalized.slice(rootDir.length + 1) : normalized
    if (relative === '') {
      return false
    }

    return ig.ignores(relative) || ig.ignores(relative + '/')
  }
}

/**
 * Writes a gzipped tarball of `projectDir` to `archivePath`, rooted at the
 * project directory name.
 */
export async function createProjectArchive(projectDir: string, archivePath: string): Promise<void> {
  const projectPath = resolve(projectDir)
  const rootDir = basename(projectPath)
  const shouldExclude = buildExcludeFilter(rootDir)

  try {
    await tar.create(
      {
        file: archivePath,
        cwd: dirname(projectPath),
        gzip: true,
        portable: true,
        filter(path) {
          return !shouldExclude(path)
        }
      },
      [rootDir]
    )
  } catch (error) {
    throw new PackagingError(`Failed to create tarball: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
  }
}

/**
 * Archives a project into a scoped temporary directory and uploads it to
 * `<destination>/<runToken>`. The archive is named after the run token, so
 * its name never depends on the project directory. The temporary directory
 * is removed on every exit path.
 */
export class ArtifactPackager {
  constructor(
    private readonly platform: ComputePlatform,
    private readonly tmpRoot: string = tmpdir()
  ) {}

  async packageAndUpload(
    projectDir: string,
    destination: string,
    identity: RunIdentity,
    signal?: AbortSignal
  ): Promise<UploadedArtifact> {
    const rootDir = basename(resolve(projectDir))
    const fileName = `${identity.token}.tar.gz`
    const location = `${destination}/${identity.token}`

    const scratchDir = await mkdtemp(join(this.tmpRoot, 'nfsnow-'))
    try {
      const archivePath = join(scratchDir, fileName)
      await createProjectArchive(projectDir, archivePath)

      try {
        await this.platform.upload(identity, archivePath, location, signal)
      } catch (error) {
        if (error instanceof UploadError || error instanceof RunAbortedError) {
          throw error
        }

        throw new UploadError(location, {cause: error})
      }

      return {fileName, rootDir}
    } finally {
      await rm(scratchDir, {recursive: true, force: true})
    }
  }
}
