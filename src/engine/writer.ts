import { createHash } from "node:crypto";
import { constants } from "node:fs";
import { access, mkdir, stat, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { OutputIOError, errorMessage } from "./errors.js";
import { ensureInside } from "./paths.js";
import type { EmittedFile, FileContent, WrittenFile } from "./types.js";

const toBytes = (content: FileContent): Uint8Array =>
  typeof content === "string" ? Buffer.from(content, "utf8") : content;

export const checksumOf = (content: FileContent): string =>
  `sha256:${createHash("sha256").update(toBytes(content)).digest("hex")}`;

const nearestExisting = async (path: string): Promise<{ path: string; isDirectory: boolean }> => {
  let current = resolve(path);
  for (;;) {
    try {
      const info = await stat(current);
      return { path: current, isDirectory: info.isDirectory() };
    } catch (error) {
      const parent = dirname(current);
      if (parent === current) {
        throw new OutputIOError(`no existing ancestor for ${path}: ${errorMessage(error, "stat failed")}`, path);
      }
      current = parent;
    }
  }
};

/**
 * Checks that the output location can be written without creating anything: either an existing
 * writable directory, or a missing path whose nearest existing ancestor is a writable directory.
 */
export const assertOutputUsable = async (outputDir: string): Promise<void> => {
  const existing = await nearestExisting(outputDir);
  if (!existing.isDirectory) {
    throw new OutputIOError(`output location is not a directory: ${existing.path}`, outputDir);
  }
  try {
    await access(existing.path, constants.W_OK);
  } catch (error) {
    throw new OutputIOError(`output location is not writable: ${errorMessage(error, existing.path)}`, outputDir);
  }
};

/** Writes one generator's buffered files. Paths are already normalised and relative to `outputDir`. */
export const flushFiles = async (outputDir: string, generatorId: string, files: EmittedFile[]): Promise<WrittenFile[]> => {
  const root = resolve(outputDir);
  const written: WrittenFile[] = [];

  for (const file of files) {
    const target = join(root, file.path);
    try {
      ensureInside(root, target);
      await mkdir(dirname(target), { recursive: true });
      const bytes = toBytes(file.content);
      await writeFile(target, bytes);
      written.push({
        path: file.path,
        byteLength: bytes.byteLength,
        checksum: checksumOf(bytes),
        generatorId
      });
    } catch (error) {
      throw new OutputIOError(
        `failed to write ${file.path}: ${errorMessage(error, "write failed")}`,
        target,
        { stage: "GENERATE", componentId: generatorId, details: { written: written.map((item) => item.path) } },
        [...written]
      );
    }
  }

  return written;
};
