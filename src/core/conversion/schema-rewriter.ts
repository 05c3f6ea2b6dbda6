/**
 * Rewrites `SOURCE_SCHEMA.object` qualifiers to the target schema.
 * Quoted qualifiers (`"HR".emp`) are handled too; other schemas are left alone.
 */
export function rewriteSchemaQualifiers(
  text: string,
  sourceSchemas: readonly string[],
  targetSchema: string
): string {
  if (sourceSchemas.length === 0) return text;
  const known = new Set(sourceSchemas.map((s) => s.toUpperCase()));

  return text.replace(
    /(?<![\w."])("?)([A-Za-z_][A-Za-z0-9_$#]*)\1\.(?=["A-Za-z_])/g,
    (match: string, _quote: string, schema: string) =>
      known.has(schema.toUpperCase()) ? `${targetSchema}.` : match
  );
}
