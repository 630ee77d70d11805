import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import path from 'path'
import { z } from 'zod'

// `KEY=` in a .env file counts as unset
function blank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (v === '' ? undefined : v), schema)
}

const envSchema = z.object({
  DASHBOARD_DATA_DIR: blank(z.string().min(1).default('data')),
  PORT: blank(z.coerce.number().int().positive().default(8501)),
  MEDIA_COMPARE_LIMIT: blank(z.coerce.number().int().positive().default(5)),
  RECENT_LIMIT: blank(z.coerce.number().int().positive().default(20))
})

export type DashboardConfig = {
  dataDir: string
  port: number
  mediaCompareLimit: number
  recentLimit: number
}

let envLoaded = false

// Reads .env, .env.local, .env.<NODE_ENV> ... from the project root once.
export function loadEnv() {
  if (envLoaded) return
  dotenv.config({ path: appRootPath.path, silent: true })
  envLoaded = true
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, root = appRootPath.path): DashboardConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }
  const values = parsed.data
  return {
    dataDir: path.resolve(root, values.DASHBOARD_DATA_DIR),
    port: values.PORT,
    mediaCompareLimit: values.MEDIA_COMPARE_LIMIT,
    recentLimit: values.RECENT_LIMIT
  }
}
