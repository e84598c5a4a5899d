import { open, readFile, stat } from "fs/promises";
import { resolve, normalize, relative, isAbsolute, sep } from "path";
import { homedir } from "os";

const DEFAULT_MAX_BYTES = 5 * 1024 * 1024; // 5MB

/** True for any entry (file, directory or link target) at `path`. */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Sanitize and normalize a file path
 * - Removes null bytes
 * - Expands home directory (~)
 * - Normalizes path (resolves .., ., etc.)
 * - Converts to absolute path
 */
export function sanitizePath(path: string): string {
  // Remove null bytes
  let cleaned = path.replace(/\0/g, "");

  // Expand home directory
  if (cleaned.startsWith("~/") || cleaned === "~") {
    cleaned = cleaned.replace(/^~/, homedir());
  }

  // Normalize and resolve to absolute path
  return resolve(normalize(cleaned));
}

/** True when `path` is `dir` itself or lies somewhere below it. */
export function isWithinDir(path: string, dir: string): boolean {
  const rel = relative(sanitizePath(dir), sanitizePath(path));
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

export async function readText(path: string, maxBytes = DEFAULT_MAX_BYTES): Promise<string> {
  const s = await stat(path);
  if (s.size > maxBytes) {
    throw new Error(`File too large to read: ${path}`);
  }
  // Invalid UTF-8 throws instead of decoding to replacement characters.
  const decoder = new TextDecoder("utf-8", { fatal: true });
  return decoder.decode(await readFile(path));
}

/** Reads at most `length` bytes from the start of the file. */
export async function readHead(path: string, length = 512): Promise<Uint8Array> {
  const handle = await open(path, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return new Uint8Array(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

export function isProbablyBinary(bytes: Uint8Array): boolean {
  if (bytes.length === 0) return false;
  let suspicious = 0;
  const sampleSize = Math.min(bytes.length, 512);

  for (let i = 0; i < sampleSize; i++) {
    const b = bytes[i];
    if (b === 0) return true; // Null byte
    if (b < 9 || (b > 13 && b < 32) || b === 127) {
      suspicious++;
    }
  }

  return suspicious / sampleSize > 0.2;
}
