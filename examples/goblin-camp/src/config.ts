import { configure, getConsoleSink, getLogger } from "@logtape/logtape"
import { parseEnv } from "./env.js"

export const env = parseEnv(process.env)

// Configure LogTape
await configure({
  sinks: { console: getConsoleSink() },
  loggers: [
    {
      category: ["@arena-wire"],
      lowestLevel: env.LOG_LEVEL,
      sinks: ["console"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
    {
      category: ["goblin-camp"],
      lowestLevel: env.LOG_LEVEL,
      sinks: ["console"],
    },
  ],
})

export const logger = getLogger(["goblin-camp"])
