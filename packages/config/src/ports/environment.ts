/**
 * The variables settings are read from and `.env` assignments are written to.
 * `process.env` in production; a plain object in tests.
 */
export type Environment = Record<string, string | undefined>
