/**
 * Batch manifest: the ordered list of objects a run migrates.
 *
 * ```yaml
 * objects:
 *   - { schema: HR, name: EMPLOYEES, kind: Table }
 *   - { schema: HR, name: GET_SALARY, kind: PackageMember, package: PAYROLL }
 * ```
 */
import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { createMigrationObject } from "./lifecycle.js";
import { OBJECT_KINDS, type MigrationObject } from "./types.js";

const ManifestEntrySchema = z
  .object({
    schema: z.string().min(1),
    name: z.string().min(1),
    kind: z.enum(OBJECT_KINDS),
    package: z.string().min(1).optional(),
  })
  .refine((e) => e.kind !== "PackageMember" || Boolean(e.package), {
    message: "PackageMember entries need a package",
    path: ["package"],
  });

const ManifestSchema = z.object({
  objects: z.array(ManifestEntrySchema),
});

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

/** Duplicate entries (same schema, name and kind) keep their first position. */
export function parseManifest(raw: unknown): MigrationObject[] {
  const manifest = ManifestSchema.parse(raw);
  const seen = new Set<string>();
  const objects: MigrationObject[] = [];

  for (const entry of manifest.objects) {
    const key = `${entry.kind}:${entry.schema}.${entry.name}`.toUpperCase();
    if (seen.has(key)) continue;
    seen.add(key);
    objects.push(
      createMigrationObject({
        identity: { schema: entry.schema, name: entry.name },
        kind: entry.kind,
        ...(entry.package ? { packageName: entry.package } : {}),
      })
    );
  }
  return objects;
}

export async function loadManifest(path: string): Promise<MigrationObject[]> {
  const loaded: unknown = yaml.load(await readFile(path, "utf-8"));
  return parseManifest(loaded);
}
