import type { BootstrapConfig } from '../config'
import type { HostFiles } from '../system/HostFiles'

export interface AppSettings {
  javaOptions: string
  user: string
  port: number
  home: string
  javaCmd: string
}

export function appSettingsFrom(config: BootstrapConfig): AppSettings {
  return {
    javaOptions: config.javaOptions,
    user: config.serviceUser,
    port: config.servicePort,
    home: config.appHome,
    javaCmd: config.javaCmd,
  }
}

function quote(value: string | number): string {
  return `"${String(value).replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

/**
 * Render the sysconfig file read by the service unit
 */
export function renderAppConfig(settings: AppSettings): string {
  return [
    '# Jenkins configuration file',
    '',
    '# Java options',
    `JENKINS_JAVA_OPTIONS=${quote(settings.javaOptions)}`,
    '',
    '# Jenkins user',
    `JENKINS_USER=${quote(settings.user)}`,
    '',
    '# Jenkins port (default 8080)',
    `JENKINS_PORT=${quote(settings.port)}`,
    '',
    '# Jenkins home directory',
    `JENKINS_HOME=${quote(settings.home)}`,
    '',
    '# Java command',
    `JAVA_CMD=${quote(settings.javaCmd)}`,
    '',
  ].join('\n')
}

export async function writeAppConfig(files: HostFiles, filePath: string, settings: AppSettings): Promise<string> {
  const content = renderAppConfig(settings)
  await files.writeFile(filePath, content)
  return content
}
