import fs from "node:fs"
import stream from "node:stream"
import { configure, getConsoleSink, getStreamSink } from "@logtape/logtape"

const LOG_PIPE_PATH = "./log.jsonl"

const logPipeStream = fs.createWriteStream(LOG_PIPE_PATH, { flags: "w" })

// Configure LogTape for tests: everything from the protocol packages goes to
// the log file, LogTape's own complaints to the console
await configure({
  reset: true,
  sinks: {
    console: getConsoleSink(),
    file: getStreamSink(stream.Writable.toWeb(logPipeStream)),
  },
  loggers: [
    {
      category: ["@arena-wire"],
      lowestLevel: "trace",
      sinks: ["file"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
  ],
})
