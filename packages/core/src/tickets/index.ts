export * from './types'
export * from './file-store'
export * from './jira-client'
export * from './provider'
