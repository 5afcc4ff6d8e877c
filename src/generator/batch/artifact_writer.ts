/**
 * Writes the rendered file set as one unit
 */

import fs from "node:fs";
import path from "node:path";
import type { RenderedArtifact } from "../codegen/artifacts.js";
import { GeneratorError } from "../errors/generator_errors.js";

export const STAGING_SUFFIX = ".tmp";
export const BACKUP_SUFFIX = ".bak";

export interface FileSystemOps {
  existsSync(filePath: string): boolean;
  writeFileSync(filePath: string, content: string): void;
  renameSync(from: string, to: string): void;
  rmSync(filePath: string): void;
}

const nodeFileSystem: FileSystemOps = {
  existsSync: (filePath) => fs.existsSync(filePath),
  writeFileSync: (filePath, content) =>
    fs.writeFileSync(filePath, content, "utf8"),
  renameSync: (from, to) => fs.renameSync(from, to),
  rmSync: (filePath) => fs.rmSync(filePath, { force: true }),
};

interface Replacement {
  outputPath: string;
  /** Set once the previous file has been moved aside. */
  backupPath?: string;
  installed: boolean;
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Puts every touched destination back the way it was. Returns the
 * destinations that could not be restored.
 */
function rollBack(replacements: Replacement[], ops: FileSystemOps): string[] {
  const failed: string[] = [];
  for (const replacement of [...replacements].reverse()) {
    try {
      if (replacement.backupPath !== undefined) {
        ops.renameSync(replacement.backupPath, replacement.outputPath);
      } else if (replacement.installed) {
        ops.rmSync(replacement.outputPath);
      }
    } catch (err) {
      failed.push(`${replacement.outputPath} (${message(err)})`);
    }
  }
  return failed;
}

function removeAll(paths: readonly string[], ops: FileSystemOps): void {
  for (const filePath of paths) ops.rmSync(filePath);
}

/**
 * Stages every artifact beside its destination, moves the previous files
 * aside, then moves the staged files into place. On any failure every
 * destination keeps its previous content, or stays absent if it had none.
 */
export function writeArtifacts(
  artifacts: readonly RenderedArtifact[],
  ops: FileSystemOps = nodeFileSystem,
): string[] {
  const staged: string[] = [];
  try {
    for (const artifact of artifacts) {
      fs.mkdirSync(path.dirname(artifact.outputPath), { recursive: true });
      const stagingPath = `${artifact.outputPath}${STAGING_SUFFIX}`;
      staged.push(stagingPath);
      ops.writeFileSync(stagingPath, artifact.content);
    }
  } catch (err) {
    removeAll(staged, ops);
    throw new GeneratorError(
      "WriteFailed",
      `Could not stage generated files: ${message(err)}`,
      { cause: err },
    );
  }

  const replacements: Replacement[] = [];
  for (const artifact of artifacts) {
    const replacement: Replacement = {
      outputPath: artifact.outputPath,
      installed: false,
    };
    replacements.push(replacement);
    try {
      if (ops.existsSync(artifact.outputPath)) {
        const backupPath = `${artifact.outputPath}${BACKUP_SUFFIX}`;
        ops.renameSync(artifact.outputPath, backupPath);
        replacement.backupPath = backupPath;
      }
      ops.renameSync(
        `${artifact.outputPath}${STAGING_SUFFIX}`,
        artifact.outputPath,
      );
      replacement.installed = true;
    } catch (err) {
      const unrestored = rollBack(replacements, ops);
      removeAll(staged, ops);
      const detail =
        unrestored.length > 0
          ? `; could not restore ${unrestored.join(", ")}`
          : "";
      throw new GeneratorError(
        "WriteFailed",
        `Could not move ${artifact.outputPath} into place: ${message(err)}${detail}`,
        { filePath: artifact.outputPath, cause: err },
      );
    }
  }

  for (const replacement of replacements) {
    if (replacement.backupPath !== undefined) {
      ops.rmSync(replacement.backupPath);
    }
  }
  return replacements.map((replacement) => replacement.outputPath);
}
