/**
 * bundle.ts - Filesystem helpers for diagnostic bundles
 *
 * A bundle is a directory of numbered .txt/.yaml/.json files. These helpers
 * name it, list it, read from it with size limits, and archive it.
 */

import * as fs from "fs";
import * as path from "path";
import type { CommandRunner } from "../utils/cli-runner";

const DIAGNOSTIC_EXTENSIONS = new Set([".txt", ".yaml", ".json"]);

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

// ---------------------------------------------------------------------------
// Timestamps
// ---------------------------------------------------------------------------

/**
 * `<prefix>-YYYYMMDD-HHMMSS` in local time.
 */
export function defaultBundleDir(prefix: string, now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${prefix}-${date}-${time}`;
}

/**
 * RFC 3339 in local time with a numeric offset, or `Z` at UTC:
 * 2025-03-04T09:05:00+01:00
 */
export function formatTimestamp(now: Date): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  const offsetMinutes = -now.getTimezoneOffset();
  if (offsetMinutes === 0) {
    return `${date}T${time}Z`;
  }
  const sign = offsetMinutes > 0 ? "+" : "-";
  const abs = Math.abs(offsetMinutes);
  return `${date}T${time}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

// ---------------------------------------------------------------------------
// Listing
// ---------------------------------------------------------------------------

function isDiagnosticFile(name: string): boolean {
  return DIAGNOSTIC_EXTENSIONS.has(path.extname(name));
}

/**
 * Sorted basenames of every diagnostic file under `dir`, subdirectories
 * included. An unreadable directory lists as empty.
 */
export function listBundleFiles(dir: string): string[] {
  const names: string[] = [];
  const walk = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (isDiagnosticFile(entry.name)) {
        names.push(entry.name);
      }
    }
  };

  try {
    walk(dir);
  } catch {
    return [];
  }
  return names.sort();
}

/**
 * True when the top level of `dir` holds at least one diagnostic file.
 */
export function hasDiagnosticFiles(dir: string): boolean {
  try {
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .some((entry) => entry.isFile() && isDiagnosticFile(entry.name));
  } catch {
    return false;
  }
}

/**
 * Sorted names of top-level files matching `<prefix>*<suffix>`.
 */
export function matchBundleFiles(
  dir: string,
  prefix: string,
  suffix: string
): string[] {
  try {
    return fs
      .readdirSync(dir)
      .filter((name) => name.startsWith(prefix) && name.endsWith(suffix))
      .sort();
  } catch {
    return [];
  }
}

// ---------------------------------------------------------------------------
// Reading and writing
// ---------------------------------------------------------------------------

/**
 * File contents, or undefined when the file can't be read.
 */
export function readBundleFile(dir: string, name: string): string | undefined {
  try {
    return fs.readFileSync(path.join(dir, name), "utf8");
  } catch {
    return undefined;
  }
}

export function writeBundleFile(dir: string, name: string, content: string): void {
  fs.writeFileSync(path.join(dir, name), content, { mode: 0o644 });
}

export function appendBundleFile(dir: string, name: string, content: string): void {
  fs.appendFileSync(path.join(dir, name), content, { mode: 0o644 });
}

// ---------------------------------------------------------------------------
// Truncation
// ---------------------------------------------------------------------------

// Limits are UTF-8 bytes, and cuts move to the nearest character boundary
// inside the kept range so no character is split.

export function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

function headBytes(buf: Buffer, max: number): string {
  let end = max;
  while (end > 0 && isContinuationByte(buf[end])) {
    end--;
  }
  return buf.subarray(0, end).toString("utf8");
}

function tailBytes(buf: Buffer, keep: number): string {
  let start = buf.length - keep;
  while (start < buf.length && isContinuationByte(buf[start])) {
    start++;
  }
  return buf.subarray(start).toString("utf8");
}

/** Keeps the first `max` bytes of anything longer. */
export function truncate(text: string, max: number): string {
  const buf = Buffer.from(text, "utf8");
  if (buf.length <= max) {
    return text;
  }
  return `${headBytes(buf, max)}\n... (truncated)`;
}

/**
 * Keeps both ends of a long log: installers tend to report the cause at the
 * end while the beginning shows what was attempted.
 */
export function truncateMiddle(text: string, keep: number): string {
  const buf = Buffer.from(text, "utf8");
  if (buf.length <= keep * 2) {
    return text;
  }
  return `${headBytes(buf, keep)}\n\n... (middle section truncated) ...\n\n${tailBytes(buf, keep)}`;
}

// ---------------------------------------------------------------------------
// Archive
// ---------------------------------------------------------------------------

export function archivePath(dir: string): string {
  return `${dir}.tar.gz`;
}

/**
 * Writes `<dir>.tar.gz` beside the bundle with `tar -czf`.
 *
 * @throws Error carrying tar's output when tar fails
 */
export function createArchive(dir: string, tar: CommandRunner): void {
  const result = tar.run(["-czf", archivePath(dir), dir]);
  if (result.isError) {
    throw new Error(result.output.trim() || `tar exited with status ${result.exitCode}`);
  }
}
