/**
 * Source catalog backed by an export directory:
 *
 *   <exportDir>/<SCHEMA>/tables/<NAME>.sql
 *   <exportDir>/<SCHEMA>/procedures/<NAME>.sql
 *   <exportDir>/<SCHEMA>/functions/<NAME>.sql
 *   <exportDir>/<SCHEMA>/triggers/<NAME>.sql
 *   <exportDir>/<SCHEMA>/packages/<PACKAGE>/<MEMBER>.sql   (decomposed)
 *   <exportDir>/<SCHEMA>/packages/<PACKAGE>.sql            (whole body)
 *
 * Directory and file names match case-insensitively.
 */
import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import type { SourceCatalog, SourceObjectRef } from "../../core/collaborators.js";
import { stripRowData } from "../../core/conversion/row-data-guard.js";
import { isMissingFile } from "../../core/errors.js";
import { qualifiedName, type ObjectKind } from "../../core/types.js";
import type { Logger } from "../../utils/logger.js";

const KIND_DIRS: Record<Exclude<ObjectKind, "PackageMember">, string> = {
  Table: "tables",
  Procedure: "procedures",
  Function: "functions",
  Trigger: "triggers",
};

export class SourceObjectNotFoundError extends Error {
  constructor(ref: SourceObjectRef) {
    super(`No exported definition for ${ref.kind} ${qualifiedName(ref.identity)}`);
    this.name = "SourceObjectNotFoundError";
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Cut one procedure or function out of a package body. The member runs from
 * its PROCEDURE/FUNCTION header to the matching `END <name>;`. Forward
 * declarations have no IS/AS before their `;` and are skipped.
 */
export function extractPackageMember(body: string, member: string): string | null {
  const name = escapeRegExp(member);
  const pattern = new RegExp(
    `\\b(?:PROCEDURE|FUNCTION)\\s+"?${name}"?(?=[\\s("])[^;]*?\\b(?:IS|AS)\\b[\\s\\S]*?\\bEND\\s+"?${name}"?\\s*;`,
    "i"
  );
  const match = pattern.exec(body);
  if (!match) return null;
  return `CREATE OR REPLACE ${match[0]}`;
}

export interface FileSourceCatalogOptions {
  exportDir: string;
  logger: Logger;
}

export class FileSourceCatalog implements SourceCatalog {
  constructor(private options: FileSourceCatalogOptions) {}

  async ping(): Promise<void> {
    const info = await stat(this.options.exportDir);
    if (!info.isDirectory()) {
      throw new Error(`Source export path is not a directory: ${this.options.exportDir}`);
    }
  }

  async fetchDefinition(ref: SourceObjectRef, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const schemaDir = await this.resolveEntry(this.options.exportDir, ref.identity.schema);
    if (!schemaDir) throw new SourceObjectNotFoundError(ref);

    const text =
      ref.kind === "PackageMember"
        ? await this.readPackageMember(schemaDir, ref)
        : await this.readFile(schemaDir, KIND_DIRS[ref.kind], `${ref.identity.name}.sql`, signal);
    if (text === null) throw new SourceObjectNotFoundError(ref);

    if (ref.kind !== "Table") return text;

    const stripped = stripRowData(text);
    if (stripped.length !== text.trim().length) {
      this.options.logger.info({ object: qualifiedName(ref.identity) }, "Dropped row data from table export");
    }
    return stripped;
  }

  private async readPackageMember(schemaDir: string, ref: SourceObjectRef): Promise<string | null> {
    if (!ref.packageName) {
      throw new Error(`PackageMember ${qualifiedName(ref.identity)} has no package name`);
    }
    const packagesDir = await this.resolveEntry(schemaDir, "packages");
    if (!packagesDir) return null;

    const memberDir = await this.resolveEntry(packagesDir, ref.packageName);
    if (memberDir) {
      const member = await this.readFile(memberDir, null, `${ref.identity.name}.sql`);
      if (member !== null) return member;
    }

    const body = await this.readFile(packagesDir, null, `${ref.packageName}.sql`);
    if (body === null) return null;
    const extracted = extractPackageMember(body, ref.identity.name);
    if (!extracted) {
      this.options.logger.warn(
        { package: ref.packageName, member: ref.identity.name },
        "Member not found in package body"
      );
    }
    return extracted;
  }

  private async readFile(
    parent: string,
    subdir: string | null,
    fileName: string,
    signal?: AbortSignal
  ): Promise<string | null> {
    const dir = subdir === null ? parent : await this.resolveEntry(parent, subdir);
    if (!dir) return null;
    const path = await this.resolveEntry(dir, fileName);
    if (!path) return null;
    return readFile(path, { encoding: "utf-8", ...(signal ? { signal } : {}) });
  }

  /** Case-insensitive lookup of `name` inside `dir`. */
  private async resolveEntry(dir: string, name: string): Promise<string | null> {
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    const wanted = name.toLowerCase();
    const hit = entries.find((e) => e.toLowerCase() === wanted);
    return hit ? join(dir, hit) : null;
  }
}
