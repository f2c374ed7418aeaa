/**
 * Environment Detection
 *
 * Utilities for detecting the runtime environment (CI, headless, etc.).
 * Used by the logger to decide whether to color its output.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'BUILDKITE',
    'TF_BUILD',
    'BITBUCKET_BUILD_NUMBER',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - SQLJOB_HEADLESS=true environment variable
 * - Common CI environment variables
 * - No TTY on stderr
 *
 * @example
 * ```typescript
 * const logger = new Logger({ color: !isCi() })
 * ```
 */
export function isCi(env: Record<string, string | undefined> = process.env): boolean {

    if (env['SQLJOB_HEADLESS'] === 'true') {

        return true;

    }

    if (CI_ENV_VARS.some((name) => env[name])) {

        return true;

    }

    return !process.stderr.isTTY;

}
