/**
 * Settings module.
 *
 * Resolves tool settings from defaults, `sqljob.yml`, `SQLJOB_*`
 * environment variables and CLI flags.
 */

// Types
export * from './types.js'

// Schema & Validation
export {
    SettingsSchema,
    SettingsFileSchema,
    LogLevelSchema,
    SettingsValidationError,
    SettingsFileError,
    parseSettings,
    parseSettingsFile,
} from './schema.js'

// Resolver
export {
    resolveSettings,
    loadSettingsFile,
    SETTINGS_FILENAME,
    type ResolveSettingsOptions,
} from './resolver.js'

// Environment variables
export { getEnvSettings, getEnvSettingsPath, shouldOutputJson } from './env.js'
