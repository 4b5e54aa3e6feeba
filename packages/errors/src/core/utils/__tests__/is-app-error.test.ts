import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  it("accepts BaseError instances", () => {
    expect(isAppError(new BaseError("x", { code: "bad_user_file" }))).toBe(true)
  })

  it("accepts structurally matching objects", () => {
    const shaped = {
      name: "ForeignError",
      message: "from another copy of the package",
      code: "bad_local_file",
      context: {},
      isRetryable: false,
      isOperational: true,
      timestamp: new Date(),
    }

    expect(isAppError(shaped)).toBe(true)
  })

  it("rejects plain errors", () => {
    expect(isAppError(new Error("plain"))).toBe(false)
  })

  it("rejects primitives and null", () => {
    expect(isAppError(null)).toBe(false)
    expect(isAppError("bad_local_file")).toBe(false)
    expect(isAppError(42)).toBe(false)
  })

  it("rejects an invalid timestamp", () => {
    const shaped = {
      name: "E",
      message: "m",
      code: "c",
      context: {},
      isRetryable: false,
      isOperational: true,
      timestamp: new Date("not a date"),
    }

    expect(isAppError(shaped)).toBe(false)
  })

  it("rejects a missing context", () => {
    const shaped = {
      name: "E",
      message: "m",
      code: "c",
      isRetryable: false,
      isOperational: true,
      timestamp: new Date(),
    }

    expect(isAppError(shaped)).toBe(false)
  })
})
