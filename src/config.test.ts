import { describe, expect, it } from 'vitest'
import { loadConfig, validateConfig } from './config'

describe('loadConfig', () => {
  it('applies defaults when the environment is empty', () => {
    const config = loadConfig({})

    expect(config.packageName).toBe('jenkins')
    expect(config.fallbackVersions).toEqual(['2.462.3', '2.462.2', '2.462.1', '2.452.4', '2.452.3'])
    expect(config.mirrors).toEqual([
      'https://pkg.jenkins.io/redhat-stable',
      'https://archives.jenkins.io/redhat-stable',
    ])
    expect(config.gpgKeyUrls).toEqual([
      'https://pkg.jenkins.io/redhat-stable/jenkins.io-2023.key',
      'https://pkg.jenkins.io/redhat/jenkins.io-2023.key',
    ])
    expect(config.supportPackages).toEqual(['wget', 'fontconfig'])
    expect(config.servicePort).toBe(8080)
    expect(config.publicHost).toBeUndefined()
    expect(config.failOnReadinessTimeout).toBe(false)
    expect(config.requireRoot).toBe(true)
    expect(validateConfig(config)).toEqual({ valid: true, errors: [] })
  })

  it('parses lists, numbers and flags', () => {
    const config = loadConfig({
      FALLBACK_VERSIONS: ' 2.462.3 , ,2.462.2',
      SERVICE_PORT: '9090',
      USE_SUDO: 'yes',
      FAIL_ON_READINESS_TIMEOUT: 'TRUE',
      REQUIRE_ROOT: 'false',
      LOG_LEVEL: 'verbose',
      LOG_FORMAT: 'json',
    })

    expect(config.fallbackVersions).toEqual(['2.462.3', '2.462.2'])
    expect(config.servicePort).toBe(9090)
    expect(config.useSudo).toBe(true)
    expect(config.failOnReadinessTimeout).toBe(true)
    expect(config.requireRoot).toBe(false)
    expect(config.logLevel).toBe('info')
    expect(config.logFormat).toBe('json')
  })

  it('keeps every Pino level, including trace and silent', () => {
    expect(loadConfig({ LOG_LEVEL: 'trace' }).logLevel).toBe('trace')
    expect(loadConfig({ LOG_LEVEL: 'silent' }).logLevel).toBe('silent')
    expect(loadConfig({ LOG_LEVEL: 'fatal' }).logLevel).toBe('fatal')
  })
})

describe('validateConfig', () => {
  it('collects every problem', () => {
    const config = loadConfig({
      MIRRORS: 'ftp://mirror.test',
      ARTIFACT_TEMPLATE: 'jenkins.rpm',
      SERVICE_PORT: '70000',
      READINESS_TIMEOUT_MS: '1000',
      READINESS_INTERVAL_MS: '5000',
      DOWNLOAD_DIR: 'tmp',
    })

    expect(validateConfig(config)).toEqual({
      valid: false,
      errors: [
        'MIRRORS must list at least one valid URL',
        'ARTIFACT_TEMPLATE must contain {version}',
        'SERVICE_PORT must be between 1 and 65535',
        'READINESS_INTERVAL_MS must be positive and not exceed READINESS_TIMEOUT_MS',
        'DOWNLOAD_DIR must be an absolute path',
      ],
    })
  })

  it('rejects a non-numeric port', () => {
    const { errors } = validateConfig(loadConfig({ SERVICE_PORT: 'http' }))

    expect(errors).toEqual(['SERVICE_PORT must be between 1 and 65535'])
  })
})
