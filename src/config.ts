import dotenv from 'dotenv'
import * as path from 'path'
import type { LevelWithSilent } from 'pino'
import { parseLevel } from './utils/logLevel'

// Load environment variables from .env file (override existing env vars)
dotenv.config({ override: true })

export interface BootstrapConfig {
  // Packages and service
  packageName: string
  serviceName: string
  runtimePackages: string[]
  vcsPackages: string[]
  supportPackages: string[]

  // Package repository
  repoDescriptorUrl: string
  repoDescriptorPath: string
  repoId: string
  repoName: string
  repoBaseUrl: string
  gpgKeyUrls: string[]

  // Fallback install
  fallbackVersions: string[]
  mirrors: string[]
  artifactTemplate: string
  downloadDir: string

  // Application settings written to the sysconfig file
  appConfigPath: string
  javaOptions: string
  serviceUser: string
  servicePort: number
  appHome: string
  javaCmd: string

  // Readiness
  readinessTimeoutMs: number
  readinessIntervalMs: number
  failOnReadinessTimeout: boolean

  // Host metadata
  metadataUrl: string
  publicHost?: string

  // Timeouts
  httpTimeoutMs: number
  downloadTimeoutMs: number
  commandTimeoutMs: number

  // Privileges
  useSudo: boolean
  requireRoot: boolean

  // Logging
  logLevel: LevelWithSilent
  logFormat: 'json' | 'text'
}

type Env = Record<string, string | undefined>

function list(value: string | undefined, fallback: string): string[] {
  return (value || fallback)
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)
}

function bool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase())
}

/**
 * Load bootstrap configuration from environment variables
 */
export function loadConfig(env: Env = process.env): BootstrapConfig {
  return {
    packageName: env.BOOTSTRAP_PACKAGE || 'jenkins',
    serviceName: env.BOOTSTRAP_SERVICE || 'jenkins',
    runtimePackages: list(env.RUNTIME_PACKAGES, 'java-17-amazon-corretto-devel'),
    vcsPackages: list(env.VCS_PACKAGES, 'git'),
    supportPackages: list(env.SUPPORT_PACKAGES, 'wget,fontconfig'),

    repoDescriptorUrl: env.REPO_DESCRIPTOR_URL || 'https://pkg.jenkins.io/redhat-stable/jenkins.repo',
    repoDescriptorPath: env.REPO_DESCRIPTOR_PATH || '/etc/yum.repos.d/jenkins.repo',
    repoId: env.REPO_ID || 'jenkins',
    repoName: env.REPO_NAME || 'Jenkins-stable',
    repoBaseUrl: env.REPO_BASE_URL || 'https://pkg.jenkins.io/redhat-stable',
    gpgKeyUrls: list(
      env.GPG_KEY_URLS,
      'https://pkg.jenkins.io/redhat-stable/jenkins.io-2023.key,https://pkg.jenkins.io/redhat/jenkins.io-2023.key'
    ),

    fallbackVersions: list(env.FALLBACK_VERSIONS, '2.462.3,2.462.2,2.462.1,2.452.4,2.452.3'),
    mirrors: list(env.MIRRORS, 'https://pkg.jenkins.io/redhat-stable,https://archives.jenkins.io/redhat-stable'),
    artifactTemplate: env.ARTIFACT_TEMPLATE || 'jenkins-{version}-1.1.noarch.rpm',
    downloadDir: env.DOWNLOAD_DIR || '/tmp',

    appConfigPath: env.APP_CONFIG_PATH || '/etc/sysconfig/jenkins',
    javaOptions: env.JAVA_OPTIONS || '-Djava.awt.headless=true -Xms512m -Xmx1024m',
    serviceUser: env.SERVICE_USER || 'jenkins',
    servicePort: parseInt(env.SERVICE_PORT || '8080', 10),
    appHome: env.APP_HOME || '/var/lib/jenkins',
    javaCmd: env.JAVA_CMD || '/usr/bin/java',

    readinessTimeoutMs: parseInt(env.READINESS_TIMEOUT_MS || '120000', 10),
    readinessIntervalMs: parseInt(env.READINESS_INTERVAL_MS || '5000', 10),
    failOnReadinessTimeout: bool(env.FAIL_ON_READINESS_TIMEOUT, false),

    metadataUrl: env.METADATA_URL || 'http://169.254.169.254/latest/meta-data/public-ipv4',
    publicHost: env.PUBLIC_HOST || undefined,

    httpTimeoutMs: parseInt(env.HTTP_TIMEOUT_MS || '30000', 10),
    downloadTimeoutMs: parseInt(env.DOWNLOAD_TIMEOUT_MS || '600000', 10),
    commandTimeoutMs: parseInt(env.COMMAND_TIMEOUT_MS || '1800000', 10),

    useSudo: bool(env.USE_SUDO, false),
    requireRoot: bool(env.REQUIRE_ROOT, true),

    logLevel: parseLevel(env.LOG_LEVEL),
    logFormat: env.LOG_FORMAT === 'json' ? 'json' : 'text',
  }
}

function isHttpUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://')
}

/**
 * Validate bootstrap configuration
 */
export function validateConfig(config: BootstrapConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = []

  if (!config.packageName) {
    errors.push('BOOTSTRAP_PACKAGE must not be empty')
  }

  if (!config.serviceName) {
    errors.push('BOOTSTRAP_SERVICE must not be empty')
  }

  if (!isHttpUrl(config.repoDescriptorUrl)) {
    errors.push('Invalid REPO_DESCRIPTOR_URL (must be a valid URL)')
  }

  if (!isHttpUrl(config.repoBaseUrl)) {
    errors.push('Invalid REPO_BASE_URL (must be a valid URL)')
  }

  if (config.gpgKeyUrls.length === 0 || !config.gpgKeyUrls.every(isHttpUrl)) {
    errors.push('GPG_KEY_URLS must list at least one valid URL')
  }

  if (config.fallbackVersions.length === 0) {
    errors.push('FALLBACK_VERSIONS must list at least one version')
  }

  if (config.mirrors.length === 0 || !config.mirrors.every(isHttpUrl)) {
    errors.push('MIRRORS must list at least one valid URL')
  }

  if (!config.artifactTemplate.includes('{version}')) {
    errors.push('ARTIFACT_TEMPLATE must contain {version}')
  }

  if (!Number.isInteger(config.servicePort) || config.servicePort < 1 || config.servicePort > 65535) {
    errors.push('SERVICE_PORT must be between 1 and 65535')
  }

  if (!(config.readinessIntervalMs > 0) || !(config.readinessTimeoutMs >= config.readinessIntervalMs)) {
    errors.push('READINESS_INTERVAL_MS must be positive and not exceed READINESS_TIMEOUT_MS')
  }

  if (!isHttpUrl(config.metadataUrl)) {
    errors.push('Invalid METADATA_URL (must be a valid URL)')
  }

  const paths: Array<[string, string]> = [
    ['REPO_DESCRIPTOR_PATH', config.repoDescriptorPath],
    ['DOWNLOAD_DIR', config.downloadDir],
    ['APP_CONFIG_PATH', config.appConfigPath],
    ['APP_HOME', config.appHome],
    ['JAVA_CMD', config.javaCmd],
  ]
  for (const [name, value] of paths) {
    if (!path.isAbsolute(value)) {
      errors.push(`${name} must be an absolute path`)
    }
  }

  for (const [name, value] of [
    ['HTTP_TIMEOUT_MS', config.httpTimeoutMs],
    ['DOWNLOAD_TIMEOUT_MS', config.downloadTimeoutMs],
    ['COMMAND_TIMEOUT_MS', config.commandTimeoutMs],
  ] as const) {
    if (!(value > 0)) {
      errors.push(`${name} must be a positive number`)
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  }
}
