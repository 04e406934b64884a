import { BuildEventType, type BuildEvent, type LogSink } from '@slipway/kernel'
import { t, type Theme } from './theme.js'

/**
 * ProgressSink — forwards every event to the durable sink, then writes one
 * progress line per step transition.
 */
export class ProgressSink implements LogSink {
  constructor(
    private readonly inner: LogSink,
    private readonly write: (line: string) => void,
    private readonly theme: Theme = t,
  ) {}

  append(entry: BuildEvent): void {
    this.inner.append(entry)
    const line = progressLine(entry, this.theme)
    if (line !== null) this.write(line)
  }
}

export function progressLine(event: BuildEvent, theme: Theme = t): string | null {
  const key = event.key === null ? '' : theme.muted(' ' + event.key.slice(0, 12))
  switch (event.event_type) {
    case BuildEventType.StepCached:
      return `  ${theme.muted('cached')}  ${event.state ?? ''}${key}`
    case BuildEventType.StepApplied:
      return `  ${theme.green('built ')}  ${event.state ?? ''}${key}`
    case BuildEventType.StepFailed:
      return `  ${theme.red('failed')}  ${event.state ?? ''}${key}`
    case BuildEventType.BuildStarted:
    case BuildEventType.BuildSucceeded:
    case BuildEventType.BuildFailed:
      return null
  }
}
