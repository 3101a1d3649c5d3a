// Output formatting utilities for the mailsweep CLI.
// Follows the gogcli pattern: data to stdout, hints/progress to stderr.
//
// All structured data is output as YAML (js-yaml). In TTY mode, keys are
// dimmed and list dashes cyan. In non-TTY mode colors are disabled so piped
// output is plain, machine-parseable YAML.
//
// The engine logs through the Logger interface at the bottom of this file;
// the default implementation writes the same stderr lines as the CLI helpers.

import yaml from 'js-yaml'
import pc from 'picocolors'
import { AuthError } from './api-utils.js'

// ---------------------------------------------------------------------------
// TTY detection (used for coloring decisions)
// ---------------------------------------------------------------------------

const isTTY = process.stdout.isTTY ?? false

// ---------------------------------------------------------------------------
// YAML output
// ---------------------------------------------------------------------------

/**
 * Colorize a YAML string for TTY output.
 * List dashes are cyan, keys are dimmed, values stay at terminal default.
 */
export function colorizeYaml(yamlStr: string): string {
  return yamlStr.replace(
    /^(\s*)(- )?([\w_][\w_ ]*?)(:)/gm,
    (_match, indent: string, dash: string | undefined, key: string, colon: string) => {
      const prefix = dash ? `${indent}${pc.cyan(dash)}` : indent
      return `${prefix}${pc.dim(key)}${pc.dim(colon)}`
    },
  )
}

export function toYaml(data: unknown): string {
  return yaml.dump(data, {
    lineWidth: Infinity,
    noRefs: true,
    quotingType: "'",
    sortKeys: false,
  })
}

/** Print any value as YAML to stdout. */
export function printYaml(data: unknown): void {
  const str = toYaml(data)
  process.stdout.write(isTTY ? colorizeYaml(str) : str)
}

/**
 * Print a list of items as YAML with an optional summary line.
 * Output shape:
 *   items:
 *     - key: value
 *   summary: "..."
 */
export function printList(
  items: Record<string, unknown>[],
  opts?: { summary?: string },
): void {
  const doc: Record<string, unknown> = { items }
  if (opts?.summary) {
    doc.summary = opts.summary
  }
  printYaml(doc)
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatSender(sender: { name?: string; email: string }): string {
  if (sender.name && sender.name !== sender.email) {
    return `${sender.name} <${sender.email}>`
  }
  return sender.email
}

/** "Scanning 1200/5000 (24%)" style progress line. */
export function formatProgress(state: { scannedCount: number; totalToScan: number; totalKnown: boolean }, percent: number): string {
  const total = state.totalKnown ? `${state.totalToScan}` : `${state.totalToScan}+`
  return `Scanned ${state.scannedCount}/${total} (${percent}%)`
}

// ---------------------------------------------------------------------------
// Stderr hints (following gogcli pattern: data to stdout, hints to stderr)
// ---------------------------------------------------------------------------

export function hint(msg: string): void {
  process.stderr.write(pc.dim(`# ${msg}`) + '\n')
}

export function success(msg: string): void {
  process.stderr.write(pc.green(msg) + '\n')
}

export function warn(msg: string): void {
  process.stderr.write(pc.yellow(msg) + '\n')
}

export function error(msg: string): void {
  process.stderr.write(pc.red(msg) + '\n')
}

/** Rewrite a single status line in place on a TTY, plain lines otherwise. */
export function progress(msg: string): void {
  if (process.stderr.isTTY) {
    process.stderr.write(`\r\x1b[2K${pc.cyan(msg)}`)
  } else {
    process.stderr.write(msg + '\n')
  }
}

/** Finish a line left open by progress(). */
export function endProgress(): void {
  if (process.stderr.isTTY) process.stderr.write('\n')
}

// ---------------------------------------------------------------------------
// Centralized command error handler (errore pattern)
// ---------------------------------------------------------------------------

/** Handle any error from an engine or client call in a command context.
 *  Prints a user-friendly message to stderr and exits.
 *  AuthError gets a "Try: mailsweep login" hint; all others print their message. */
export function handleCommandError(err: Error): never {
  if (err instanceof AuthError) {
    error(`${err.message}. Try: mailsweep login`)
  } else {
    error(err.message)
  }
  process.exit(1)
}

// ---------------------------------------------------------------------------
// Engine logging
// ---------------------------------------------------------------------------

export interface Logger {
  debug(msg: string): void
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export function createLogger({ debug = false }: { debug?: boolean } = {}): Logger {
  return {
    debug: (msg) => {
      if (debug) process.stderr.write(pc.dim(`[debug] ${msg}`) + '\n')
    },
    info: hint,
    warn,
    error,
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
