import { timingSafeEqual } from 'node:crypto'
import { nanoid } from 'nanoid'

/** 43 symbols from a 64-symbol alphabet carry 258 bits. */
const STATE_LENGTH = 43

export const generateState = (): string => nanoid(STATE_LENGTH)

export const statesMatch = (expected: string, received: string): boolean => {
  const a = Buffer.from(expected, 'utf8')
  const b = Buffer.from(received, 'utf8')
  return a.length === b.length && timingSafeEqual(a, b)
}
