import { realpath } from "node:fs/promises";
import path from "node:path";

import { PathEscapeError } from "./errors.js";

function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "") {
    return true;
  }
  return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/** Lexical check only; touches nothing on disk. */
export function assertWithinRoot(root: string, candidate: string): string {
  const absoluteRoot = path.resolve(root);
  const resolved = path.resolve(absoluteRoot, candidate);
  if (!isInside(absoluteRoot, resolved)) {
    throw new PathEscapeError(candidate, absoluteRoot);
  }
  return resolved;
}

export interface ResolvedPath {
  root: string;
  path: string;
}

/**
 * Lexical check followed by a symlink-resolved one. Rejects rather than clamps.
 * Fails with the underlying fs error when the candidate does not exist.
 */
export async function resolveWithinRoot(root: string, candidate: string): Promise<ResolvedPath> {
  const lexical = assertWithinRoot(root, candidate);
  const [realRoot, realCandidate] = await Promise.all([realpath(path.resolve(root)), realpath(lexical)]);
  if (!isInside(realRoot, realCandidate)) {
    throw new PathEscapeError(candidate, realRoot);
  }
  return { root: realRoot, path: realCandidate };
}

/** Object key for a file below the root, always with forward slashes. */
export function relativeKey(root: string, absolutePath: string): string {
  return path.relative(path.resolve(root), absolutePath).split(path.sep).join("/");
}
