/**
 * Install-with-fallback routine
 *
 * The fallback search is an explicit ordered list of (candidate, mirror) pairs,
 * scanned left to right and stopped at the first successful install.
 */
import * as fs from 'fs/promises'
import * as path from 'path'
import type { BootstrapConfig } from '../config'
import type { HttpClient } from '../http/types'
import type { PackageManager } from '../system/PackageManager'
import { InstallExhaustedError, getErrorMessage, type FailedAttempt } from '../utils/errors'
import { logger } from '../utils/logger'

export interface InstallAttempt {
  version: string
  mirror: string
  artifactName: string
  url: string
}

export interface FallbackDependencies {
  http: HttpClient
  packages: Pick<PackageManager, 'installLocal'>
  downloadDir: string
  downloadTimeoutMs?: number
}

export interface FallbackInstallResult {
  version: string
  mirror: string
  artifactPath: string
  /** Failed attempts that preceded the successful one */
  attempts: FailedAttempt[]
}

export type ApplicationInstallResult =
  | { method: 'package-manager'; packageName: string }
  | ({ method: 'fallback' } & FallbackInstallResult)

export function artifactNameFor(template: string, version: string): string {
  return template.split('{version}').join(version)
}

/**
 * Expand candidates × mirrors into the ordered attempt list:
 * every mirror for the first candidate, then every mirror for the next
 */
export function buildAttemptPlan(candidates: string[], mirrors: string[], template: string): InstallAttempt[] {
  return candidates.flatMap(version => {
    const artifactName = artifactNameFor(template, version)
    return mirrors.map(mirror => ({
      version,
      mirror,
      artifactName,
      url: `${mirror.replace(/\/+$/, '')}/${artifactName}`,
    }))
  })
}

/**
 * Try each attempt in order until one downloads and installs.
 * Any download error (DNS, timeout, 404) counts as "candidate unavailable".
 * Artifacts of failed attempts are removed before moving on.
 */
export async function installWithFallback(
  plan: InstallAttempt[],
  deps: FallbackDependencies
): Promise<FallbackInstallResult> {
  const failures: FailedAttempt[] = []

  await fs.mkdir(deps.downloadDir, { recursive: true })

  for (const attempt of plan) {
    const artifactPath = path.join(deps.downloadDir, attempt.artifactName)
    logger.info(`Trying ${attempt.artifactName}`, { version: attempt.version, mirror: attempt.mirror })

    try {
      await deps.http.download(attempt.url, artifactPath, { timeoutMs: deps.downloadTimeoutMs })
    } catch (error: unknown) {
      await discard(artifactPath)
      failures.push({ ...toFailure(attempt), reason: 'download-failed', error: getErrorMessage(error) })
      continue
    }

    if (await deps.packages.installLocal(artifactPath)) {
      logger.info(`Installed ${attempt.version}`, { mirror: attempt.mirror, artifactPath })
      return {
        version: attempt.version,
        mirror: attempt.mirror,
        artifactPath,
        attempts: failures,
      }
    }

    await discard(artifactPath)
    failures.push({ ...toFailure(attempt), reason: 'install-failed', error: `rpm -ivh ${artifactPath} failed` })
  }

  throw new InstallExhaustedError(failures)
}

/**
 * Install through the package manager, falling back to the direct artifact plan
 */
export async function installApplication(
  config: BootstrapConfig,
  deps: Omit<FallbackDependencies, 'packages' | 'downloadDir'> & { packages: PackageManager }
): Promise<ApplicationInstallResult> {
  if (await deps.packages.tryInstall([config.packageName])) {
    logger.info(`${config.packageName} installed via dnf`)
    return { method: 'package-manager', packageName: config.packageName }
  }

  logger.warn('dnf installation failed, trying direct artifact download')

  const plan = buildAttemptPlan(config.fallbackVersions, config.mirrors, config.artifactTemplate)
  const result = await installWithFallback(plan, {
    http: deps.http,
    packages: deps.packages,
    downloadDir: config.downloadDir,
    downloadTimeoutMs: deps.downloadTimeoutMs ?? config.downloadTimeoutMs,
  })

  return { method: 'fallback', ...result }
}

function toFailure(attempt: InstallAttempt): Pick<FailedAttempt, 'version' | 'mirror' | 'url'> {
  return { version: attempt.version, mirror: attempt.mirror, url: attempt.url }
}

async function discard(artifactPath: string): Promise<void> {
  await fs.rm(artifactPath, { force: true })
}
