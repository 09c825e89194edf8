import { InvalidArgumentError } from 'commander'

/**
 * Commander parser for non-negative integer options
 */
export function parseCount(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

/**
 * Commander parser for finite numeric options
 */
export function parseScore(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a number.')
  }
  return parsed
}

/**
 * Commander reducer for repeatable options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}
