/**
 * Tests for error handling - verify domain errors are converted to user-friendly messages.
 */

import { describe, expect, test } from "vitest"
import {
  AppError,
  fromDomainError,
  remoteUnreachable,
  remoteCommandFailed,
  mirrorDestinationUnavailable,
  hostDirUnavailable,
  rootNotWritable,
  rootReadFailed,
} from "./errors"
import { RemoteCommandFailed, RemoteUnreachable } from "@services/RemoteTransport"
import { HostDirUnavailable } from "@services/LocalConsolidator"
import { RootNotWritable, RootReadFailed } from "@services/ConsolidationRoot"

describe("AppError", () => {
  test("format() produces readable output with title, detail, and suggestion", () => {
    const error = new AppError("Test Error", "Something went wrong.", "Try doing X instead.")

    expect(error.format()).toBe(
      ["ERROR: Test Error", "", "   Something went wrong.", "", "   Hint: Try doing X instead."].join("\n")
    )
  })
})

describe("Domain error constructors", () => {
  test("remoteUnreachable points at ssh setup", () => {
    const error = remoteUnreachable("alice@devbox", "Connection refused")

    expect(error.title).toBe("Remote host unreachable")
    expect(error.detail).toBe('Could not connect to "alice@devbox": Connection refused')
    expect(error.suggestion).toContain("ssh alice@devbox")
  })

  test("remoteCommandFailed includes the command", () => {
    const error = remoteCommandFailed("devbox", "rsync -avz", "spawn rsync ENOENT")

    expect(error.title).toBe("Remote command failed")
    expect(error.detail).toContain("rsync -avz")
    expect(error.detail).toContain("spawn rsync ENOENT")
  })

  test("mirrorDestinationUnavailable suggests --output", () => {
    const error = mirrorDestinationUnavailable("/out/devbox/cursor", "EACCES")

    expect(error.detail).toContain("/out/devbox/cursor")
    expect(error.suggestion).toContain("--output")
  })

  test("hostDirUnavailable names the directory", () => {
    expect(hostDirUnavailable("/out/laptop", "ENOTDIR").detail).toBe('Failed to create "/out/laptop": ENOTDIR')
  })

  test("rootNotWritable and rootReadFailed", () => {
    expect(rootNotWritable("/out", "EROFS").title).toBe("Cannot write consolidated directory")
    expect(rootReadFailed("/out", "EACCES").title).toBe("Cannot read consolidated directory")
  })

})

describe("fromDomainError", () => {
  test("passes through AppError unchanged", () => {
    const original = new AppError("Original", "Detail", "Suggestion")

    expect(fromDomainError(original)).toBe(original)
  })

  test("maps each tagged error to its message", () => {
    expect(fromDomainError(new RemoteUnreachable({ host: "devbox", reason: "timeout" })).title).toBe(
      "Remote host unreachable"
    )
    expect(
      fromDomainError(new RemoteCommandFailed({ host: "devbox", command: "ssh devbox true", reason: "boom" })).title
    ).toBe("Remote command failed")
    expect(fromDomainError(new HostDirUnavailable({ path: "/out/laptop", reason: "ENOTDIR" })).title).toBe(
      "Cannot create host directory"
    )
    expect(fromDomainError(new RootNotWritable({ path: "/out", reason: "EROFS" })).detail).toBe(
      'Failed to write "/out": EROFS'
    )
    expect(fromDomainError(new RootReadFailed({ path: "/out", reason: "EIO" })).detail).toBe(
      'Failed to read "/out": EIO'
    )
  })

  test("converts standard Error to unexpected error", () => {
    const appError = fromDomainError(new Error("Something broke"))

    expect(appError.title).toBe("Unexpected error")
    expect(appError.detail).toBe("Something broke")
  })

  test("converts permission Error to permission denied", () => {
    expect(fromDomainError(new Error("EACCES: permission denied")).title).toBe("Permission denied")
  })

  test("converts unknown value to unexpected error", () => {
    const appError = fromDomainError("just a string")

    expect(appError.title).toBe("Unexpected error")
    expect(appError.detail).toBe("just a string")
  })
})
