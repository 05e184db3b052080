import { getGraphConfig } from "../config";

export type LogChannel = "module" | "function" | "clone" | "verify";

function prefix(channel: LogChannel): string {
  return `[tensorgraph:${channel}]`;
}

/** Mutation tracing; silent unless TENSORGRAPH_DEBUG=1. */
export function debugLog(channel: LogChannel, message: string): void {
  if (!getGraphConfig().debug) return;
  console.log(`${prefix(channel)} ${message}`);
}

export function errorLog(channel: LogChannel, message: string): void {
  console.error(`${prefix(channel)} ${message}`);
}
