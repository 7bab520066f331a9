/**
 * Output file writing.
 *
 * All site output goes through these helpers: paths are site-root
 * relative, parent directories are created on demand and existing files
 * are overwritten.
 */

import { cpSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, isAbsolute, normalize, resolve, sep } from "node:path";

export class OutputWriteError extends Error {
  constructor(
    public readonly outputPath: string,
    public readonly failure: unknown
  ) {
    super(
      `Failed to write ${outputPath}: ${failure instanceof Error ? failure.message : String(failure)}`
    );
    this.name = "OutputWriteError";
  }
}

/**
 * Resolve a site-root-relative path inside the output directory.
 *
 * @throws OutputWriteError if the path would leave the output directory
 */
export function outputFilePath(outputDir: string, relativePath: string): string {
  const root = resolve(outputDir);
  const target = resolve(root, normalize(relativePath));
  if (isAbsolute(relativePath) || (target !== root && !target.startsWith(root + sep))) {
    throw new OutputWriteError(relativePath, new Error("path escapes the output directory"));
  }
  return target;
}

/**
 * Write a file below the output directory, creating parent directories.
 *
 * @returns Absolute path of the written file
 * @throws OutputWriteError on any file-system failure
 */
export function writeOutputFile(outputDir: string, relativePath: string, content: string): string {
  const target = outputFilePath(outputDir, relativePath);
  try {
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, "utf-8");
  } catch (err) {
    throw new OutputWriteError(relativePath, err);
  }
  return target;
}

/**
 * Create the fixed top-level output directories.
 */
export function ensureOutputDirs(outputDir: string, directories: readonly string[]): void {
  for (const directory of directories) {
    const target = outputFilePath(outputDir, directory);
    try {
      mkdirSync(target, { recursive: true });
    } catch (err) {
      throw new OutputWriteError(directory, err);
    }
  }
}

/**
 * Copy a static directory into the output tree.
 *
 * @returns false when the source directory does not exist
 */
export function copyStaticDir(sourceDir: string, outputDir: string, relativeTarget: string): boolean {
  const source = resolve(sourceDir);
  if (!existsSync(source)) return false;

  const target = outputFilePath(outputDir, relativeTarget);
  if (target === source) return true;
  try {
    cpSync(source, target, { recursive: true, force: true });
  } catch (err) {
    throw new OutputWriteError(relativeTarget, err);
  }
  return true;
}

