/**
 * URL path for a group or project derived from its display name:
 * lowercased, whitespace runs become "-", anything outside [a-z0-9._-] is dropped.
 */
export function slugify(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "-")
    .replace(/[^a-z0-9._-]/g, "")
    .replace(/-{2,}/g, "-")
    .replace(/^[-.]+|[-.]+$/g, "");
}
