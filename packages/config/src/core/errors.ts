import { BaseError } from "@dotsettings/errors"
import type { DotenvScope } from "../ports/source"

export type DotenvParseFailure = "missing_separator" | "empty_key" | "empty_value"

/** A line of a `.env` file that is not a `KEY=VALUE` assignment. */
export class DotenvParseError extends BaseError<"dotenv_parse_error"> {
  readonly file: string
  readonly line: number
  readonly reason: DotenvParseFailure

  constructor(file: string, line: number, reason: DotenvParseFailure) {
    const message =
      reason === "missing_separator"
        ? `unable to parse line ${file}:${line}`
        : `invalid environment variable assignment ${file}:${line}`

    super(message, { code: "dotenv_parse_error", context: { file, line, reason } })

    this.file = file
    this.line = line
    this.reason = reason
  }
}

/** The environment refused a write while applying a `.env` file. */
export class EnvAssignmentError extends BaseError<"env_assignment_failed"> {
  constructor(key: string, value: string, file: string, line: number, cause: unknown) {
    super(`failed to assign ${key} value ${value} (${file}:${line})`, {
      code: "env_assignment_failed",
      context: { key, value, file, line },
      cause,
    })
  }
}

const LOAD_FAILURES = {
  user: { code: "bad_user_file", message: "unable to parse $HOME/.env file" },
  local: { code: "bad_local_file", message: "unable to parse .env file" },
} as const

export type DotenvLoadCode = (typeof LOAD_FAILURES)[DotenvScope]["code"]

/**
 * A present `.env` file could not be applied. The code tells the home-directory
 * file (`bad_user_file`) from the working-directory one (`bad_local_file`);
 * `cause` holds the line-level error.
 */
export class DotenvLoadError extends BaseError<DotenvLoadCode> {
  readonly scope: DotenvScope
  readonly source: string

  constructor(scope: DotenvScope, source: string, cause: unknown) {
    const failure = LOAD_FAILURES[scope]

    super(failure.message, { code: failure.code, context: { source, scope }, cause })

    this.scope = scope
    this.source = source
  }
}

/**
 * A default was registered with an empty name or a value that does not match
 * its kind. This is a programming error, not a runtime condition.
 */
export class InvalidDefaultError extends BaseError<"invalid_default"> {
  constructor(name: string, details: string) {
    super(`invalid default for "${name}": ${details}`, {
      code: "invalid_default",
      context: { name },
      isOperational: false,
    })
  }
}
