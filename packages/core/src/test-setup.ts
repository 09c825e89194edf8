import { beforeAll } from 'vitest'

beforeAll(() => {
  // Keep default loggers quiet unless a test injects its own
  process.env.LOG_LEVEL = 'silent'
})
