/**
 * File path utilities.
 *
 * Cross-cutting helpers for locating template files, used by both the
 * validator and the template resolver.
 */
import { realpathSync, statSync } from 'node:fs';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';

import { attemptSync } from '@logosdx/utils';

/**
 * Resolve a relative path under a root directory.
 *
 * Absolute paths and paths that climb out of the root (`../x.sql`,
 * `a/../../x.sql`) resolve to null, and so do paths that leave the root
 * through a symlink.
 *
 * @param root - Root directory
 * @param filepath - Path relative to the root
 * @returns The absolute path, or null when it is not inside the root
 *
 * @example
 * ```typescript
 * resolveUnderRoot('/project/templates', 'sales/daily.sql')
 * // '/project/templates/sales/daily.sql'
 *
 * resolveUnderRoot('/project/templates', '../secrets.sql')
 * // null
 * ```
 */
export function resolveUnderRoot(root: string, filepath: string): string | null {

    if (isAbsolute(filepath)) {

        return null;

    }

    const base = resolve(root);
    const resolved = resolve(base, filepath);

    if (!isInside(base, resolved)) {

        return null;

    }

    if (!isInside(realpathOfExisting(base), realpathOfExisting(resolved))) {

        return null;

    }

    return resolved;

}

function isInside(base: string, target: string): boolean {

    const rel = relative(base, target);

    return !(rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel));

}

/**
 * Real path of the deepest existing ancestor, with the missing tail
 * appended unchanged.
 */
function realpathOfExisting(filepath: string): string {

    const [real] = attemptSync(() => realpathSync(filepath));

    if (real) {

        return real;

    }

    const parent = dirname(filepath);

    if (parent === filepath) {

        return filepath;

    }

    return join(realpathOfExisting(parent), basename(filepath));

}

/**
 * Check whether a path is an existing regular file.
 *
 * Directories, missing paths and unreadable entries all yield false.
 */
export function isRegularFile(filepath: string): boolean {

    const [stats] = attemptSync(() => statSync(filepath));

    return stats?.isFile() ?? false;

}
