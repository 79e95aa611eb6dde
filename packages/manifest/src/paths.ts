/**
 * Path safety for joining request- or manifest-derived segments onto a root.
 *
 * Every join normalizes `.` and `..`, strips leading slashes, resolves the
 * result against the root and checks it stays inside. Escapes throw
 * `PATH_ESCAPE`; callers serving HTTP turn that into a 404.
 *
 * @packageDocumentation
 */

import { realpath, stat } from 'fs/promises';
import { isAbsolute, posix, relative, resolve, sep } from 'path';
import { toPosixPath } from '@flashless/utils';
import { createPathEscapeError } from './errors.js';

/**
 * Checks whether `candidate` is `root` or lies below it.
 *
 * Both paths must be absolute and resolved.
 */
export function isWithinRoot(root: string, candidate: string): boolean {
    const rel = relative(root, candidate);
    if (rel === '') {
        return true;
    }
    return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Joins a relative segment onto a root without touching the filesystem.
 *
 * @param root - Absolute, resolved root directory
 * @param relativePath - Segment taken from a request or the manifest
 * @returns Absolute path inside `root`
 * @throws \{FlashlessError\} `PATH_ESCAPE` when the segment leaves the root
 *
 * @example
 * ```typescript
 * safeJoin('/srv/dist', '/assets/app.js'); // '/srv/dist/assets/app.js'
 * safeJoin('/srv/dist', 'a/../b.css'); // '/srv/dist/b.css'
 * safeJoin('/srv/dist', '../secret'); // throws
 * ```
 */
export function safeJoin(root: string, relativePath: string): string {
    const normalized = posix
        .normalize(toPosixPath(relativePath.trim()))
        .replace(/^\/+/, '');
    const candidate = resolve(root, normalized);

    if (!isWithinRoot(root, candidate)) {
        throw createPathEscapeError(relativePath);
    }
    return candidate;
}

/**
 * Joins a relative segment onto a root and follows symlinks.
 *
 * When the joined path exists, its real path must also be inside the root.
 * A path that does not exist is returned as joined.
 *
 * @param root - Absolute, symlink-resolved root directory
 * @param relativePath - Segment taken from a request or the manifest
 * @returns Absolute path inside `root`
 * @throws \{FlashlessError\} `PATH_ESCAPE` when the segment or its symlink target leaves the root
 */
export async function resolveWithinRoot(
    root: string,
    relativePath: string,
): Promise<string> {
    const candidate = safeJoin(root, relativePath);

    let real: string;
    try {
        real = await realpath(candidate);
    } catch (error) {
        if (isMissingPathError(error)) {
            return candidate;
        }
        throw error;
    }

    if (!isWithinRoot(root, real)) {
        throw createPathEscapeError(relativePath);
    }
    return real;
}

/**
 * Resolves a manifest path against the project directory and follows
 * symlinks when the target exists.
 *
 * @param projectDir - Absolute project directory
 * @param value - Relative or absolute path from the manifest or the CLI
 * @returns Absolute path
 */
export async function resolveProjectPath(
    projectDir: string,
    value: string,
): Promise<string> {
    const resolved = resolve(projectDir, value);
    try {
        return await realpath(resolved);
    } catch (error) {
        if (isMissingPathError(error)) {
            return resolved;
        }
        throw error;
    }
}

/**
 * Checks if a directory exists at the given path.
 *
 * @param path - Path to check
 * @returns `true` if a directory exists at the path, `false` otherwise
 */
export async function directoryExists(path: string): Promise<boolean> {
    try {
        const stats = await stat(path);
        return stats.isDirectory();
    } catch {
        return false;
    }
}

/**
 * Checks if a regular file exists at the given path.
 *
 * @param path - Path to check
 * @returns `true` if a file exists at the path, `false` otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
    try {
        const stats = await stat(path);
        return stats.isFile();
    } catch {
        return false;
    }
}

/**
 * Checks if anything (file, directory, other) exists at the given path.
 */
export async function pathExists(path: string): Promise<boolean> {
    try {
        await stat(path);
        return true;
    } catch {
        return false;
    }
}

function isMissingPathError(error: unknown): boolean {
    return (
        error instanceof Error &&
        'code' in error &&
        (error.code === 'ENOENT' || error.code === 'ENOTDIR')
    );
}
