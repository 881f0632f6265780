import { resolve } from "node:path";

function stripPrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

/** Turns a path as printed in a preview header into a project-relative path. */
export function normalizePreviewPath(rawPath: string): string {
  const withoutVcsPrefix = stripPrefix(stripPrefix(rawPath, "a/"), "b/");
  return stripPrefix(withoutVcsPrefix, "./").replaceAll("\\", "/");
}

export function resolvePreviewPath(projectRoot: string, rawPath: string): string {
  return resolve(projectRoot, normalizePreviewPath(rawPath));
}
