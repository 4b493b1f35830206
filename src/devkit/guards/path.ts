import fs from 'fs-extra';
import path from 'path';
import { ToolError, errnoCode } from '../errors.js';
import { isWithinDir } from '../utils.js';

/**
 * `exists`: the target directory must already be there (install, uninstall, add).
 * `parent`: only its parent must exist and be writable (init, create_venv).
 */
export type PathRequirement = 'exists' | 'parent';

function isMissing(err: unknown): boolean {
  const code = errnoCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

function traversal(rawPath: string, root: string): ToolError {
  return new ToolError('PathTraversal', `Path '${rawPath}' resolves outside the project directory '${root}'. Operation denied.`);
}

async function realpathOr(target: string, onMissing: () => ToolError): Promise<string> {
  try {
    return await fs.realpath(target);
  } catch (err) {
    if (isMissing(err)) throw onMissing();
    throw err;
  }
}

async function canonicalRoot(projectRoot: string): Promise<string> {
  return realpathOr(path.resolve(projectRoot), () =>
    new ToolError('PathNotFound', `Project directory '${projectRoot}' does not exist`));
}

/**
 * Resolves `rawPath` against the project root and returns its canonical form.
 * Symlinks are followed before the containment check, so a link pointing out
 * of the root is rejected the same way `..` is.
 */
export async function confinePath(
  rawPath: string,
  projectRoot: string,
  requirement: PathRequirement = 'exists',
): Promise<string> {
  if (!rawPath.trim() || rawPath.includes('\0')) {
    throw new ToolError('CommandBuildError', `Invalid path '${rawPath}'`);
  }

  const root = await canonicalRoot(projectRoot);
  const absolute = path.resolve(root, rawPath);
  if (!isWithinDir(absolute, root) && !isWithinDir(absolute, path.resolve(projectRoot))) {
    throw traversal(rawPath, root);
  }

  if (requirement === 'exists') {
    const real = await realpathOr(absolute, () =>
      new ToolError('PathNotFound', `Path '${rawPath}' does not exist`));
    if (!isWithinDir(real, root)) throw traversal(rawPath, root);
    if (!(await fs.stat(real)).isDirectory()) {
      throw new ToolError('PathNotFound', `Path '${rawPath}' is not a directory`);
    }
    return real;
  }

  if (await fs.pathExists(absolute)) {
    const real = await fs.realpath(absolute);
    if (!isWithinDir(real, root)) throw traversal(rawPath, root);
    if (!(await fs.stat(real)).isDirectory()) {
      throw new ToolError('PathNotFound', `Path '${rawPath}' exists and is not a directory`);
    }
    return real;
  }

  const parent = await realpathOr(path.dirname(absolute), () =>
    new ToolError('PathNotFound', `Parent directory of '${rawPath}' does not exist`));
  if (!isWithinDir(parent, root)) throw traversal(rawPath, root);
  try {
    await fs.access(parent, fs.constants.W_OK);
  } catch {
    throw new ToolError('PathNotFound', `Parent directory of '${rawPath}' is not writable`);
  }
  return path.join(parent, path.basename(absolute));
}

/** Confines a file named relative to `baseDir`, e.g. a requirements file. */
export async function confineFile(rawFile: string, baseDir: string, projectRoot: string): Promise<string> {
  const root = await canonicalRoot(projectRoot);
  const real = await realpathOr(path.resolve(baseDir, rawFile), () =>
    new ToolError('PathNotFound', `File '${rawFile}' does not exist`));
  if (!isWithinDir(real, root)) throw traversal(rawFile, root);
  if (!(await fs.stat(real)).isFile()) {
    throw new ToolError('PathNotFound', `'${rawFile}' is not a file`);
  }
  return real;
}
