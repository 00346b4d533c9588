import { spawn } from 'node:child_process'

const STDERR_TAIL_LIMIT = 8192

type ProcessArgs = {
  command: string
  args: string[]
  timeoutMs: number
  errorLabel: string
}

function exitError(errorLabel: string, code: number | null, stderr: string): Error {
  const suffix = stderr.trim() ? `: ${stderr.trim()}` : ''
  return new Error(`${errorLabel} exited with code ${code}${suffix}`)
}

/**
 * Runs a tool whose useful output goes to stderr (ffmpeg filters log there).
 * Each complete stderr line is handed to `onStderrLine`.
 */
export async function runProcess({
  command,
  args,
  timeoutMs,
  errorLabel,
  onStderrLine,
}: ProcessArgs & { onStderrLine?: (line: string) => void }): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] })
    let stderr = ''
    let stderrBuffer = ''

    const flushLine = (line: string) => {
      if (onStderrLine) onStderrLine(line)
      if (stderr.length < STDERR_TAIL_LIMIT) {
        stderr += line
        if (!line.endsWith('\n')) stderr += '\n'
      }
    }

    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        stderrBuffer += chunk
        const lines = stderrBuffer.split(/\r?\n/)
        stderrBuffer = lines.pop() ?? ''
        for (const line of lines) {
          if (line) flushLine(line)
        }
      })
    }

    const timeout = setTimeout(() => {
      proc.kill('SIGKILL')
      reject(new Error(`${errorLabel} timed out`))
    }, timeoutMs)

    proc.on('error', (error) => {
      clearTimeout(timeout)
      reject(error)
    })

    proc.on('close', (code) => {
      clearTimeout(timeout)
      if (stderrBuffer.trim().length > 0) {
        flushLine(stderrBuffer.trim())
      }
      if (code === 0) {
        resolve()
        return
      }
      reject(exitError(errorLabel, code, stderr))
    })
  })
}

export async function runProcessCapture({ command, args, timeoutMs, errorLabel }: ProcessArgs): Promise<string> {
  const buffer = await runProcessCaptureBuffer({ command, args, timeoutMs, errorLabel })
  return buffer.toString('utf8')
}

export async function runProcessCaptureBuffer({
  command,
  args,
  timeoutMs,
  errorLabel,
}: ProcessArgs): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    const chunks: Buffer[] = []
    let stderr = ''

    const timeout = setTimeout(() => {
      proc.kill('SIGKILL')
      reject(new Error(`${errorLabel} timed out`))
    }, timeoutMs)

    if (proc.stdout) {
      proc.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk)
      })
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        if (stderr.length < STDERR_TAIL_LIMIT) {
          stderr += chunk
        }
      })
    }

    proc.on('error', (error) => {
      clearTimeout(timeout)
      reject(error)
    })

    proc.on('close', (code) => {
      clearTimeout(timeout)
      if (code === 0) {
        resolve(Buffer.concat(chunks))
        return
      }
      reject(exitError(errorLabel, code, stderr))
    })
  })
}
