import ora from 'ora'

export type Spinner = {
  setText: (next: string) => void
  stop: () => void
  stopAndClear: () => void
  succeed: (text: string) => void
}

const noopSpinner: Spinner = {
  setText: () => {},
  stop: () => {},
  stopAndClear: () => {},
  succeed: () => {},
}

export function startSpinner({
  text,
  enabled,
  stream,
}: {
  text: string
  enabled: boolean
  stream: NodeJS.WritableStream
}): Spinner {
  if (!enabled) return noopSpinner

  const spinner = ora({
    text,
    stream,
    spinner: 'dots',
    color: 'cyan',
    discardStdin: true,
  }).start()

  const stop = () => {
    if (spinner.isSpinning) spinner.stop()
  }

  return {
    setText: (next) => {
      spinner.text = next
    },
    stop,
    stopAndClear: () => {
      stop()
      spinner.clear()
      stream.write('\r\u001b[2K')
    },
    succeed: (message) => {
      spinner.succeed(message)
    },
  }
}
