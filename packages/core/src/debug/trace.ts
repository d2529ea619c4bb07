/**
 * packages/core/src/debug/trace.ts: Optional lifecycle trace logging.
 *
 * Purpose:
 * - Record widget lifecycle transitions (init / process / display) as NDJSON.
 * - Stay silent unless explicitly enabled.
 *
 * Enable with either:
 *   FORMWORK_TRACE=1
 *   configureToolkit({ trace: true })
 *
 * Records go to the installed sink (see `setTraceSink`). Without a sink they
 * go to `console.error` when a console exists.
 */

import { getToolkitConfig } from "../config.js";

export type TraceRecord = Readonly<Record<string, unknown>>;

export type TraceSink = (line: string) => void;

export type TraceLogger = Readonly<{
  /** Whether records are currently being emitted. */
  enabled: () => boolean;
  emit: (stage: string, fields?: TraceRecord) => void;
}>;

let activeSink: TraceSink | null = null;

function envFlag(name: "FORMWORK_TRACE"): boolean {
  try {
    const g = globalThis as {
      process?: { env?: { FORMWORK_TRACE?: string } };
    };
    const raw = g.process?.env?.[name];
    if (raw === undefined) return false;
    const value = raw.trim().toLowerCase();
    return value === "1" || value === "true" || value === "yes" || value === "on";
  } catch {
    return false;
  }
}

function consoleSink(line: string): void {
  const c = (globalThis as { console?: { error?: (msg: string) => void } }).console;
  c?.error?.(line);
}

/**
 * Install the sink that receives trace lines. Pass `null` to fall back to the
 * console. Returns the previously installed sink.
 */
export function setTraceSink(sink: TraceSink | null): TraceSink | null {
  const prev = activeSink;
  activeSink = sink;
  return prev;
}

export function isTraceEnabled(): boolean {
  return getToolkitConfig().trace || envFlag("FORMWORK_TRACE");
}

export function createTraceLogger(scope: string): TraceLogger {
  return Object.freeze({
    enabled: isTraceEnabled,
    emit: (stage: string, fields: TraceRecord = Object.freeze({})) => {
      if (!isTraceEnabled()) return;
      try {
        const line = JSON.stringify({
          ts: new Date().toISOString(),
          scope,
          stage,
          ...fields,
        });
        (activeSink ?? consoleSink)(line);
      } catch {
        // Optional diagnostics must never affect rendering.
      }
    },
  });
}

export function warnDev(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}
