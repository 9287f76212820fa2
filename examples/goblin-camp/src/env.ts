import { z } from "zod"

const port = z.coerce.number().int().min(0).max(65535)

export const envSchema = z.object({
  TCP_PORT: port.default(7777),
  WS_PORT: port.default(7778),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warning", "error", "fatal"])
    .default("info"),
})

export type Env = z.infer<typeof envSchema>

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source)
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ")
    throw new Error(`invalid environment: ${problems}`)
  }
  return result.data
}
