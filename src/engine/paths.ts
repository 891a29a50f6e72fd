import { isAbsolute, relative, resolve, sep } from "node:path";

const segmentToRegex = (segment: string): string =>
  segment
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*+/g, "[^/]*")
    .replace(/\?/g, "[^/]");

/** `*` and `?` stay within one segment; a `**` segment spans zero or more directories. */
export const globToRegex = (glob: string): RegExp => {
  const segments = glob.split("/");
  let source = "";
  segments.forEach((segment, index) => {
    const last = index === segments.length - 1;
    if (segment === "**") {
      source += last ? ".*" : "(?:[^/]+/)*";
      return;
    }
    source += `${segmentToRegex(segment)}${last ? "" : "/"}`;
  });
  return new RegExp(`^${source}$`);
};

type Matcher<T> = {
  isStar: (token: T) => boolean;
  compatible: (left: T, right: T) => boolean;
};

// Whether some string is matched by both token sequences, where a star token absorbs any run of tokens.
const intersects = <T>(left: readonly T[], right: readonly T[], matcher: Matcher<T>): boolean => {
  const memo = new Map<number, boolean>();
  const visit = (i: number, j: number): boolean => {
    const key = i * (right.length + 1) + j;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    let result: boolean;
    if (i < left.length && matcher.isStar(left[i])) {
      result = visit(i + 1, j) || (j < right.length && visit(i, j + 1));
    } else if (j < right.length && matcher.isStar(right[j])) {
      result = visit(i, j + 1) || (i < left.length && visit(i + 1, j));
    } else if (i < left.length && j < right.length) {
      result = matcher.compatible(left[i], right[j]) && visit(i + 1, j + 1);
    } else {
      result = i === left.length && j === right.length;
    }
    memo.set(key, result);
    return result;
  };
  return visit(0, 0);
};

const segmentsIntersect = (left: string, right: string): boolean =>
  intersects([...left.replace(/\*+/g, "*")], [...right.replace(/\*+/g, "*")], {
    isStar: (char) => char === "*",
    compatible: (a, b) => a === b || a === "?" || b === "?"
  });

/** Two output patterns overlap when at least one relative path matches both. */
export const patternsOverlap = (left: string, right: string): boolean =>
  intersects(left.split("/"), right.split("/"), {
    isStar: (segment) => segment === "**",
    compatible: segmentsIntersect
  });

export const matchesAny = (path: string, patterns: readonly string[]): boolean =>
  patterns.some((pattern) => globToRegex(pattern).test(path));

/** Normalises an emitted path to posix form; `null` when it is absolute or escapes the output root. */
export const normalizeRelativePath = (path: string): string | null => {
  if (path.length === 0 || isAbsolute(path) || /^[a-zA-Z]:[\\/]/.test(path)) return null;
  const parts: string[] = [];
  for (const segment of path.replace(/\\/g, "/").split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") return null;
    parts.push(segment);
  }
  return parts.length > 0 ? parts.join("/") : null;
};

export const ensureInside = (root: string, target: string): void => {
  const resolvedRoot = resolve(root);
  const resolvedTarget = resolve(target);
  if (resolvedTarget === resolvedRoot) return;

  const rel = relative(resolvedRoot, resolvedTarget);
  if (rel === ".." || rel.startsWith(`..${sep}`) || rel.split(sep).includes("..") || isAbsolute(rel)) {
    throw new Error(`Refusing to write outside output directory: ${resolvedTarget}`);
  }
};
