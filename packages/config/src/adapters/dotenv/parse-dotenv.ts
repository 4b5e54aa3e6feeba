import { DotenvParseError } from "../../core/errors"
import type { Assignment } from "../../ports/source"

/**
 * Parses `.env` content line by line.
 *
 * Everything from the first `#` is a comment. Remaining non-blank lines must be
 * `KEY=VALUE`, split on the first `=`, with both sides trimmed and non-empty.
 * There is no quoting, escaping or interpolation.
 *
 * Lazy: assignments before a malformed line are yielded before the
 * {@link DotenvParseError} is thrown.
 */
export function* parseDotenv(content: string, file: string): Generator<Assignment> {
  const lines = content.split("\n")

  for (const [index, raw] of lines.entries()) {
    const line = index + 1
    const commentAt = raw.indexOf("#")
    const text = commentAt === -1 ? raw : raw.slice(0, commentAt)

    if (text.trim() === "") continue

    const separatorAt = text.indexOf("=")

    if (separatorAt === -1) {
      throw new DotenvParseError(file, line, "missing_separator")
    }

    const key = text.slice(0, separatorAt).trim()
    const value = text.slice(separatorAt + 1).trim()

    if (key === "") throw new DotenvParseError(file, line, "empty_key")
    if (value === "") throw new DotenvParseError(file, line, "empty_value")

    yield { key, value, line }
  }
}
