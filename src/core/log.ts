/**
 * Namespaced stderr logging.
 *
 * stdout carries command output and the MCP stdio transport, so every
 * diagnostic goes to stderr with a fixed prefix.
 */

const PREFIX = "worklog-sync";

let debugEnabled = false;

/** Called once at startup from the loaded config. */
export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function debug(message: string): void {
  if (!debugEnabled) return;
  write("debug", message);
}

export function info(message: string): void {
  write("info", message);
}

export function warn(message: string): void {
  write("warn", message);
}

export function error(message: string): void {
  write("error", message);
}

function write(level: string, message: string): void {
  const tag = level === "info" ? "" : ` [${level}]`;
  process.stderr.write(`${PREFIX}:${tag} ${message}\n`);
}
