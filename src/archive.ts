// CHANGE: Present one zip file as a mutable directory of repository resources.
// WHY: The whole remote repository lives in a single archive that is read, patched in memory and rewritten.

import AdmZip from "adm-zip";
import fs from "fs-extra";
import { CacheCorruptionError, InvalidResourcePathError, SessionClosedError } from "./errors.js";
import { debug } from "./logger.js";

/**
 * Normalise a repository path into an archive entry name.
 *
 * Leading slashes are ignored, backslashes become slashes, `.` and empty segments are dropped.
 *
 * @throws InvalidResourcePathError for empty paths and `..` segments.
 */
export function normaliseEntryPath(path: string): string {
  const segments = path
    .replace(/\\/g, "/")
    .split("/")
    .filter(segment => segment !== "" && segment !== ".");
  if (segments.length === 0) {
    throw new InvalidResourcePathError(path, "path is empty");
  }
  if (segments.includes("..")) {
    throw new InvalidResourcePathError(path, "parent directory segments are not allowed");
  }
  return segments.join("/");
}

/**
 * Normalise a listing prefix: `""`, `"/"` and `"."` mean the archive root, otherwise a directory ending in `/`.
 *
 * @throws InvalidResourcePathError for `..` segments.
 */
export function normaliseDirectoryPrefix(prefix: string): string {
  const segments = prefix.replace(/\\/g, "/").split("/");
  if (segments.includes("..")) {
    throw new InvalidResourcePathError(prefix, "parent directory segments are not allowed");
  }
  return segments.every(segment => segment === "" || segment === ".") ? "" : `${normaliseEntryPath(prefix)}/`;
}

function loadZip(file: string, bytes: Buffer): AdmZip {
  if (bytes.length === 0) {
    throw new CacheCorruptionError(file);
  }
  try {
    const zip = new AdmZip(bytes);
    zip.getEntries();
    return zip;
  } catch (cause) {
    throw new CacheCorruptionError(file, { cause });
  }
}

/**
 * In-memory view of a local archive file.
 *
 * Invariant: at most one entry per normalised path; mutations reach disk only through `flush()`.
 */
export class LocalArchive {
  private dirty = false;
  private closed = false;

  private constructor(readonly file: string, private readonly zip: AdmZip, private persisted: boolean) {}

  /**
   * Open `file`; a missing file yields an empty archive.
   *
   * @throws CacheCorruptionError when the file exists but is not a readable zip.
   */
  static async open(file: string): Promise<LocalArchive> {
    if (!(await fs.pathExists(file))) {
      debug(`Archive ${file} absent, starting empty.`);
      return new LocalArchive(file, new AdmZip(), false);
    }
    const bytes = await fs.readFile(file);
    return new LocalArchive(file, loadZip(file, bytes), true);
  }

  /**
   * Wrap downloaded bytes destined for `file`. Nothing is written until `flush()`.
   */
  static fromBuffer(file: string, bytes: Buffer): LocalArchive {
    const archive = new LocalArchive(file, loadZip(file, bytes), false);
    archive.dirty = true;
    return archive;
  }

  static empty(file: string): LocalArchive {
    return new LocalArchive(file, new AdmZip(), false);
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  read(path: string): Buffer | null {
    this.assertOpen();
    const name = normaliseEntryPath(path);
    const entry = this.zip.getEntry(name);
    if (!entry || entry.isDirectory) {
      return null;
    }
    try {
      return entry.getData();
    } catch (cause) {
      throw new CacheCorruptionError(this.file, { cause });
    }
  }

  has(path: string): boolean {
    this.assertOpen();
    const entry = this.zip.getEntry(normaliseEntryPath(path));
    return entry !== null && !entry.isDirectory;
  }

  /**
   * Replace or create the entry at `path`.
   */
  write(path: string, content: Buffer): void {
    this.assertOpen();
    const name = normaliseEntryPath(path);
    const entry = this.zip.getEntry(name);
    if (entry) {
      this.zip.updateFile(entry, content);
    } else {
      this.zip.addFile(name, content);
    }
    this.dirty = true;
  }

  /**
   * File entry names below `prefix`, sorted.
   */
  list(prefix = ""): string[] {
    this.assertOpen();
    const directory = normaliseDirectoryPrefix(prefix);
    return this.zip
      .getEntries()
      .filter(entry => !entry.isDirectory && entry.entryName.startsWith(directory))
      .map(entry => entry.entryName)
      .sort();
  }

  toBuffer(): Buffer {
    this.assertOpen();
    return this.zip.toBuffer();
  }

  /**
   * Rewrite the archive file atomically (temporary file, then rename) when it has unsaved changes.
   */
  async flush(): Promise<void> {
    this.assertOpen();
    if (!this.dirty && this.persisted) {
      return;
    }
    const tempFile = `${this.file}.${process.pid}.tmp`;
    await fs.outputFile(tempFile, this.zip.toBuffer());
    await fs.move(tempFile, this.file, { overwrite: true });
    this.dirty = false;
    this.persisted = true;
    debug(`Archive written to ${this.file}.`);
  }

  /**
   * Flush and refuse further use. Closing twice is a no-op.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    await this.flush();
    this.closed = true;
  }

  /**
   * Refuse further use without writing anything.
   */
  dispose(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SessionClosedError(`Archive ${this.file} is closed`);
    }
  }
}
