/**
 * packages/node/src/trace/sinks.ts: Trace sinks backed by Node streams/files.
 *
 * Usage:
 *   FORMWORK_TRACE=1
 *   setTraceSink(createFileTraceSink("/tmp/formwork-trace.ndjson"));
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { TraceSink } from "@formwork/core";

export function createStderrTraceSink(): TraceSink {
  return (line: string) => {
    process.stderr.write(`${line}\n`);
  };
}

/** Append one NDJSON line per record to `path`, creating parent directories. */
export function createFileTraceSink(path: string): TraceSink {
  mkdirSync(dirname(path), { recursive: true });
  return (line: string) => {
    appendFileSync(path, `${line}\n`);
  };
}
