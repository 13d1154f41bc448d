import chalk from 'chalk'

export const t = {
  text:  chalk.hex('#C8C8C0'),
  muted: chalk.hex('#666666'),
  amber: chalk.hex('#D4880A'),
  green: chalk.hex('#81C784'),
  red:   chalk.hex('#CF6679'),
} as const
