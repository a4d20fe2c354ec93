import fs from 'fs';
import path from 'path';
import { errnoCode, PathEscapeError } from './ErrorHandling.js';

const MAX_SYMLINK_HOPS = 40;

/**
 * Normalize a caller-supplied relative path: backslashes become separators, leading
 * slashes are dropped (absolute paths are read relative to the sandbox root), and
 * `.`/`..` segments are collapsed. Returns '' for the root.
 */
export function normalizeUserPath(userPath: string | undefined): string {
  const raw = (userPath ?? '').trim();
  if (raw.includes('\0')) {
    throw new PathEscapeError(raw.replace(/\0/g, '\\0'), { reason: 'NUL byte in path' });
  }
  const slashed = raw.replace(/\\/g, '/').replace(/^\/+/, '');
  const normalized = path.posix.normalize(slashed || '.');
  return normalized === '.' || normalized === './' ? '' : normalized.replace(/\/+$/, '');
}

function isWithin(root: string, candidate: string): boolean {
  return candidate === root || candidate.startsWith(root.endsWith(path.sep) ? root : root + path.sep);
}

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * Canonical form of a path that may not exist yet. Symlinks are resolved wherever
 * they exist, including dangling ones, whose target is followed as if it existed.
 */
function canonicalize(target: string, hops = 0): string {
  if (hops > MAX_SYMLINK_HOPS) {
    throw new PathEscapeError(target, { reason: 'too many symbolic links' });
  }

  try {
    return fs.realpathSync(target);
  } catch (error) {
    if (!isMissing(error)) {
      throw error;
    }
  }

  let stat: fs.Stats | undefined;
  try {
    stat = fs.lstatSync(target);
  } catch (error) {
    if (!isMissing(error)) {
      throw error;
    }
  }

  if (stat?.isSymbolicLink()) {
    const linkTarget = path.resolve(path.dirname(target), fs.readlinkSync(target));
    return canonicalize(linkTarget, hops + 1);
  }

  const parent = path.dirname(target);
  if (parent === target) {
    return target;
  }
  return path.join(canonicalize(parent, hops), path.basename(target));
}

/**
 * Resolve `userPath` against a sandbox root and fail with PathEscapeError when the
 * canonical result is not the root or a descendant of it.
 */
export function resolveInside(root: string, userPath: string | undefined): string {
  const canonicalRoot = fs.realpathSync(root);
  const normalized = normalizeUserPath(userPath);
  const candidate = path.resolve(canonicalRoot, normalized);

  if (!isWithin(canonicalRoot, candidate)) {
    throw new PathEscapeError(userPath ?? '');
  }

  const canonical = canonicalize(candidate);
  if (!isWithin(canonicalRoot, canonical)) {
    throw new PathEscapeError(userPath ?? '', { reason: 'resolves through a symbolic link' });
  }
  return canonical;
}

/**
 * Re-check an already resolved host path right before it is used. Fails when a
 * symlink swapped in since resolution now carries it outside the root.
 */
export function assertInside(root: string, absolute: string): void {
  const canonicalRoot = fs.realpathSync(root);
  if (!isWithin(canonicalRoot, canonicalize(absolute))) {
    throw new PathEscapeError(toRelative(root, absolute), {
      reason: 'resolves through a symbolic link',
    });
  }
}

/**
 * Resolve the entry named by `userPath` without following its final component, so
 * a symlink inside the sandbox can be removed even when it points elsewhere. The
 * parent directory is still checked in canonical form. The root is not an entry.
 */
export function resolveEntry(root: string, userPath: string): string {
  const normalized = normalizeUserPath(userPath);
  if (normalized === '' || normalized === '..' || normalized.startsWith('../')) {
    throw new PathEscapeError(userPath, { reason: 'not an entry inside the sandbox' });
  }

  const parent = resolveInside(root, path.posix.dirname(normalized));
  return path.join(parent, path.posix.basename(normalized));
}

/**
 * Display form of an absolute path inside the sandbox ('.' for the root)
 */
export function toRelative(root: string, absolute: string): string {
  const relative = path.relative(fs.realpathSync(root), absolute);
  return relative === '' ? '.' : relative.split(path.sep).join('/');
}
