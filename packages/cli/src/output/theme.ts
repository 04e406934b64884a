import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk'
import { BuildEventType } from '@slipway/kernel'

export const NO_COLOR_ENV = 'SLIPWAY_NO_COLOR'

export interface Theme {
  readonly accent: ChalkInstance
  readonly text:   ChalkInstance
  readonly white:  ChalkInstance
  readonly dim:    ChalkInstance
  readonly muted:  ChalkInstance
  readonly amber:  ChalkInstance
  readonly green:  ChalkInstance
  readonly red:    ChalkInstance
}

export function createTheme(level: ColorSupportLevel): Theme {
  const c = new Chalk({ level })
  return {
    accent: c.hex('#4FC3F7'),
    text:   c.hex('#C8C8C0'),
    white:  c.hex('#F2F2EC'),
    dim:    c.hex('#444444'),
    muted:  c.hex('#666666'),
    amber:  c.hex('#D4880A'),
    green:  c.hex('#81C784'),
    red:    c.hex('#CF6679'),
  }
}

export const t: Theme = createTheme(process.env[NO_COLOR_ENV] !== undefined ? 0 : chalk.level)

export const eventColor = (theme: Theme, type: BuildEventType): ChalkInstance => {
  switch (type) {
    case BuildEventType.StepCached:     return theme.muted
    case BuildEventType.StepApplied:    return theme.text
    case BuildEventType.BuildSucceeded: return theme.green
    case BuildEventType.StepFailed:
    case BuildEventType.BuildFailed:    return theme.red
    case BuildEventType.BuildStarted:   return theme.accent
  }
}
