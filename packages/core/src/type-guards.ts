import { TEMPLATE_NAME_PREFIX } from "./framework-types.js";

/**
 * Whether a document entry name marks a documentation-only template.
 */
export function isTemplateName(name: string): boolean {
  return name.startsWith(TEMPLATE_NAME_PREFIX);
}

/**
 * Plain (non-array, non-null) object check used when walking decoded documents.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
