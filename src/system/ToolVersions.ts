import type { CommandRunner } from './CommandRunner'

export interface ToolVersions {
  java: string | null
  git: string | null
}

function firstLine(output: string): string | null {
  const line = output.split('\n').map(l => l.trim()).find(l => l.length > 0)
  return line ?? null
}

export async function readJavaVersion(runner: CommandRunner): Promise<string | null> {
  // java prints its version banner to stderr
  const result = await runner.run('java', ['-version'], { unprivileged: true })
  return result.ok ? firstLine(result.stderr || result.stdout) : null
}

export async function readGitVersion(runner: CommandRunner): Promise<string | null> {
  const result = await runner.run('git', ['--version'], { unprivileged: true })
  return result.ok ? firstLine(result.stdout) : null
}

export async function readToolVersions(runner: CommandRunner): Promise<ToolVersions> {
  return {
    java: await readJavaVersion(runner),
    git: await readGitVersion(runner),
  }
}
