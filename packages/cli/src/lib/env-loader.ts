import { config } from 'dotenv-flow'

/**
 * Load `.env`, `.env.local` and their NODE_ENV variants from a directory
 * into process.env. Variables already set in the shell win; missing files
 * are fine.
 */
export function loadEnvFiles(directory: string = process.cwd()): void {
  config({ path: directory, silent: true })
}
