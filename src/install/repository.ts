import * as fs from 'fs/promises'
import * as path from 'path'
import type { BootstrapConfig } from '../config'
import type { HttpClient } from '../http/types'
import { createStagingDir, type HostFiles } from '../system/HostFiles'
import type { PackageManager } from '../system/PackageManager'
import { CommandError, getErrorMessage } from '../utils/errors'
import { logger } from '../utils/logger'

export interface RepositoryRegistration {
  source: 'remote' | 'manual'
  descriptorPath: string
  keyUrl: string
}

export interface ManualDescriptor {
  id: string
  name: string
  baseUrl: string
}

export function renderRepoDescriptor(descriptor: ManualDescriptor): string {
  return [
    `[${descriptor.id}]`,
    `name=${descriptor.name}`,
    `baseurl=${descriptor.baseUrl}`,
    'gpgcheck=1',
    '',
  ].join('\n')
}

/**
 * Import the first GPG key URL that rpm accepts.
 *
 * The URLs are not checked to carry the same key material; whichever imports
 * first is trusted.
 */
export async function importFirstKey(packages: Pick<PackageManager, 'importKey'>, keyUrls: string[]): Promise<string> {
  for (const [index, url] of keyUrls.entries()) {
    if (await packages.importKey(url)) {
      if (index > 0) {
        logger.warn('Imported GPG key from alternative URL', { url, primary: keyUrls[0] })
      }
      return url
    }
  }

  throw new CommandError(`rpm --import ${keyUrls.join(' | ')}`, null, 'no GPG key URL could be imported')
}

/**
 * Register the package repository, writing the descriptor by hand when the
 * remote one cannot be fetched
 */
export async function registerRepository(
  config: BootstrapConfig,
  deps: { http: HttpClient; files: HostFiles; packages: Pick<PackageManager, 'importKey'> }
): Promise<RepositoryRegistration> {
  let source: RepositoryRegistration['source'] = 'remote'

  // Staged so that only a failed fetch selects the manual descriptor
  const stagingDir = await createStagingDir()
  const staged = path.join(stagingDir, path.basename(config.repoDescriptorPath))

  try {
    let fetched = false
    try {
      await deps.http.download(config.repoDescriptorUrl, staged, { timeoutMs: config.httpTimeoutMs })
      fetched = true
    } catch (error: unknown) {
      logger.warn('Official repository descriptor unavailable, writing it manually', {
        url: config.repoDescriptorUrl,
        error: getErrorMessage(error),
      })
    }

    if (fetched) {
      await deps.files.installFile(staged, config.repoDescriptorPath)
      logger.info('Repository descriptor added from official source', { url: config.repoDescriptorUrl })
    } else {
      await deps.files.writeFile(
        config.repoDescriptorPath,
        renderRepoDescriptor({ id: config.repoId, name: config.repoName, baseUrl: config.repoBaseUrl })
      )
      source = 'manual'
    }
  } finally {
    await fs.rm(stagingDir, { recursive: true, force: true })
  }

  const keyUrl = await importFirstKey(deps.packages, config.gpgKeyUrls)

  return { source, descriptorPath: config.repoDescriptorPath, keyUrl }
}
