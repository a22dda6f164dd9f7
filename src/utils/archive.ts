/**
 * Archive Reading
 *
 * Thin wrapper over adm-zip exposing the entries of a jar as lazily read
 * byte buffers, with failures reported as Results.
 */

import AdmZip from "adm-zip";
import { type Result, ok, err } from "../types/result.js";
import type { FileReadError } from "./fileUtils.js";

export interface ArchiveEntry {
  /** Entry path inside the archive, e.g. `com/example/Foo.class` */
  name: string;
  read(): Result<Buffer, FileReadError>;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Open an archive and list its file entries in archive order.
 */
export function readArchiveEntries(archivePath: string): Result<ArchiveEntry[], FileReadError> {
  let zip: AdmZip;
  try {
    zip = new AdmZip(archivePath);
  } catch (error) {
    return err({
      code: "ARCHIVE_UNREADABLE",
      message: `Could not read archive ${archivePath}: ${describe(error)}`,
      path: archivePath,
    });
  }

  const entries = zip
    .getEntries()
    .filter((entry) => !entry.isDirectory)
    .map(
      (entry): ArchiveEntry => ({
        name: entry.entryName,
        read: () => {
          try {
            return ok(entry.getData());
          } catch (error) {
            return err({
              code: "READ_FAILED",
              message: `Could not read ${entry.entryName} from ${archivePath}: ${describe(error)}`,
              path: `${archivePath}!/${entry.entryName}`,
            });
          }
        },
      })
    );

  return ok(entries);
}
