/**
 * Throwaway project trees for tests.
 */

import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import AdmZip from "adm-zip";

export function createTempDir(): string {
  return realpathSync(mkdtempSync(join(tmpdir(), "lint-orchestrator-")));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write `files` (relative path → content) under `root`, creating folders
 * as needed. A path ending in `/` creates an empty folder.
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, relativePath);
    if (relativePath.endsWith("/")) {
      mkdirSync(path, { recursive: true });
      continue;
    }
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }
}

/**
 * Create a project directory (one with a manifest) and the given files.
 */
export function createProject(root: string, name: string, files: Record<string, string> = {}): string {
  const dir = join(root, name);
  writeTree(dir, { "AndroidManifest.xml": "manifest", ...files });
  return dir;
}

/**
 * Write a jar whose entries are `entries` (entry name → content).
 */
export function writeJar(path: string, entries: Record<string, string>): void {
  mkdirSync(dirname(path), { recursive: true });
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, Buffer.from(content, "utf-8"));
  }
  zip.writeZip(path);
}
