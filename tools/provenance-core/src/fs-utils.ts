import crypto from "node:crypto";
import * as fs from "node:fs";

export async function ensureDir(p: string): Promise<void> {
  await fs.promises.mkdir(p, { recursive: true });
}

export async function isFile(p: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(p);
    return stats.isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(p);
    return stats.isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Copy a file keeping its permission bits and access/modification times,
 * like `cp -p`.
 */
export async function copyPreserving(source: string, destination: string): Promise<void> {
  const stats = await fs.promises.stat(source);
  await fs.promises.copyFile(source, destination);
  await fs.promises.chmod(destination, stats.mode & 0o7777);
  await fs.promises.utimes(destination, stats.atime, stats.mtime);
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}
