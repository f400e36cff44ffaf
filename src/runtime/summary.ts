import * as path from 'path'
import type { ApplicationInstallResult } from '../install/fallback'
import type { HostFiles } from '../system/HostFiles'
import type { ToolVersions } from '../system/ToolVersions'

export interface SummaryDetails {
  host: string
  port: number
  appHome: string
  serviceUser: string
  serviceName: string
  install: ApplicationInstallResult | null
  ready: boolean
  adminPassword: string | null
  versions: ToolVersions
}

export function adminPasswordPath(appHome: string): string {
  return path.join(appHome, 'secrets', 'initialAdminPassword')
}

/**
 * Read the credentials file the service writes on first start.
 * Returns null until the file exists
 */
export async function readInitialAdminPassword(files: HostFiles, appHome: string): Promise<string | null> {
  const password = (await files.readText(adminPasswordPath(appHome)))?.trim()
  return password || null
}

function heading(title: string): string[] {
  return [title, '-'.repeat(title.length)]
}

function describeInstall(install: ApplicationInstallResult | null): string {
  if (!install) return 'unknown'
  if (install.method === 'package-manager') return `${install.packageName} via dnf`
  return `${install.version} from ${install.mirror}`
}

export function renderSummary(details: SummaryDetails): string {
  const url = `http://${details.host}:${details.port}`
  const passwordFile = adminPasswordPath(details.appHome)
  const svc = details.serviceName

  const password = details.adminPassword
    ? [
        'Initial Admin Password:',
        details.adminPassword,
        '',
        'SAVE THIS PASSWORD! You will need it for first login.',
      ]
    : [
        'Initial password not available yet.',
        'Wait 1-2 minutes, then retrieve it with:',
        `  sudo cat ${passwordFile}`,
      ]

  const lines = [
    '========================================================',
    'Installation Complete!',
    '========================================================',
    '',
    ...heading('Details:'),
    `Installation Path: ${details.appHome}`,
    `Default Port: ${details.port}`,
    `Service User: ${details.serviceUser}`,
    `Installed: ${describeInstall(details.install)}`,
    `Service ready: ${details.ready ? 'yes' : 'not yet (it may still be starting)'}`,
    '',
    ...heading('Web Access:'),
    `URL: ${url}`,
    '',
    ...password,
    '',
    ...heading('Java Version:'),
    details.versions.java ?? 'not found',
    '',
    ...heading('Git Version:'),
    details.versions.git ?? 'not found',
    '',
    ...heading('AWS Security Group Configuration:'),
    'Make sure your Security Group allows inbound traffic on:',
    `  - Port ${details.port} (TCP) from your IP or 0.0.0.0/0`,
    '',
    ...heading('First Time Setup:'),
    `1. Open: ${url}`,
    '2. Enter the Initial Admin Password shown above',
    "3. Click 'Install suggested plugins'",
    '4. Create your first admin user',
    '',
    ...heading('Useful Commands:'),
    `Check status:        sudo systemctl status ${svc}`,
    `Stop:                sudo systemctl stop ${svc}`,
    `Start:               sudo systemctl start ${svc}`,
    `Restart:             sudo systemctl restart ${svc}`,
    `View logs:           sudo journalctl -u ${svc} -f`,
    `Get admin password:  sudo cat ${passwordFile}`,
    '',
    ...heading('Home Directory:'),
    `Jobs:        ${path.join(details.appHome, 'jobs')}/`,
    `Plugins:     ${path.join(details.appHome, 'plugins')}/`,
    `Workspace:   ${path.join(details.appHome, 'workspace')}/`,
    `Config:      ${path.join(details.appHome, 'config.xml')}`,
    '',
    ...heading('Performance Tips for t2.micro/t3.micro:'),
    '- Startup may take 2-3 minutes on micro instances',
    '- Limit concurrent builds to 1-2',
    '- Use lightweight plugins only',
    '- Monitor memory with: free -h',
    '',
    ...heading('Troubleshooting:'),
    'If the service will not start:',
    `  1. Check logs: sudo journalctl -u ${svc} -n 100 --no-pager`,
    '  2. Check Java: java -version',
    '  3. Check memory: free -h',
    `  4. Restart: sudo systemctl restart ${svc}`,
    '',
    'If you cannot reach the web UI:',
    `  1. Verify port ${details.port}: sudo ss -tulpn | grep ${details.port}`,
    `  2. Check Security Group has port ${details.port} open`,
    '  3. Check firewall: sudo firewall-cmd --list-all',
    '',
  ]

  return lines.join('\n')
}
