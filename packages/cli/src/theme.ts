import chalk, { Chalk, type ChalkInstance } from 'chalk'

/** Set to any value to disable colored output. */
export const NO_COLOR_ENV = 'MANTLE_NO_COLOR'

const c: ChalkInstance = process.env[NO_COLOR_ENV] === undefined ? chalk : new Chalk({ level: 0 })

export const t = {
  blue:       c.hex('#4FC3F7'),
  blueDim:    c.hex('#0277BD'),
  text:       c.hex('#C8C8C0'),
  white:      c.hex('#F2F2EC'),
  dim:        c.hex('#444444'),
  muted:      c.hex('#666666'),
  amber:      c.hex('#D4880A'),
  green:      c.hex('#81C784'),
  red:        c.hex('#CF6679'),
} as const

const _outcomeColors: Record<string, ChalkInstance> = {
  ok:     t.green,
  failed: t.red,
}

export const outcomeColor = (outcome: string): ChalkInstance =>
  _outcomeColors[outcome] ?? t.muted

const _edgeColors: Record<string, ChalkInstance> = {
  order:  t.text,
  notify: t.amber,
}

export const edgeColor = (kind: string): ChalkInstance =>
  _edgeColors[kind] ?? t.muted
