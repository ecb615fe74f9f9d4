import {execa} from 'execa'

export type ProcessOutput = {
  exitCode?: number
  stdout: string
  stderr: string
  timedOutAfterMs?: number
}

function resolveShell(): string | true {
  const shell = process.env.SHELL?.trim()
  if (shell) return shell
  if (process.platform === 'win32') return process.env.ComSpec || 'cmd.exe'
  return true
}

export function formatProcessOutput(output: ProcessOutput): string {
  const lines = [`exit_code=${output.exitCode ?? 'none'}`]
  if (output.timedOutAfterMs !== undefined) lines.push(`timed_out_after_ms=${output.timedOutAfterMs}`)
  lines.push('Stdout:', output.stdout, 'Stderr:', output.stderr)
  return lines.join('\n')
}

/** Runs one shell statement to completion; a nonzero exit is not an error. */
export async function runShell(command: string, cwd = process.cwd()): Promise<ProcessOutput> {
  const {stdout, stderr, exitCode} = await execa(command, {
    cwd,
    reject: false,
    shell: resolveShell()
  })
  return {exitCode, stdout, stderr}
}

function killProcessGroup(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined || process.platform === 'win32') {
    fallback()
    return
  }

  try {
    process.kill(-pid, 'SIGKILL')
  } catch (error) {
    // ESRCH: the group already exited between the timer firing and the kill.
    const code = error instanceof Error && 'code' in error ? error.code : undefined
    if (code !== 'ESRCH') fallback()
  }
}

/**
 * Like `runShell`, but the whole process group is killed once `timeoutMs`
 * elapses, so servers and watchers started by the command cannot hang the turn.
 */
export async function runShellWithTimeout(command: string, cwd: string, timeoutMs: number): Promise<ProcessOutput> {
  const subprocess = execa(command, {
    cwd,
    reject: false,
    shell: resolveShell(),
    detached: process.platform !== 'win32'
  })

  let timedOut = false
  const timer = setTimeout(() => {
    timedOut = true
    killProcessGroup(subprocess.pid, () => {
      subprocess.kill('SIGKILL')
    })
  }, timeoutMs)

  try {
    const {stdout, stderr, exitCode} = await subprocess
    return {exitCode, stdout, stderr, ...(timedOut ? {timedOutAfterMs: timeoutMs} : {})}
  } finally {
    clearTimeout(timer)
  }
}
