import { describe, expect, it } from "vitest";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };
const ttyStream = { isTTY: true };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.registry,
    title: "Registry missing.",
    message: "Registry not found: /project/queries/registry.json",
    hint: "Check registry_path in querydeck.yaml.",
    next: "Run `querydeck registry validate` once the file exists.",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Registry missing.",
        "Registry not found: /project/queries/registry.json",
        "Hint: Check registry_path in querydeck.yaml.",
        "Next: Run `querydeck registry validate` once the file exists.",
      ].join("\n"),
    );
  });

  it("includes debug details and an indented stack when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.smoke,
      title: "Smoke command failed.",
      message: "Dune API key is missing.",
      cause: new Error("boom"),
    });
    error.stack = "UserFacingError: Dune API key is missing.\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Smoke command failed.",
        "Dune API key is missing.",
        "Code: SMOKE_ERROR",
        "Name: UserFacingError",
        "Cause: boom",
        "Stack:",
        "  UserFacingError: Dune API key is missing.",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("falls back to a generic title for unknown errors", () => {
    expect(renderCliError(new Error("socket hang up"), { stream: nonTtyStream })).toBe(
      ["Error: Command failed.", "socket hang up"].join("\n"),
    );
    expect(renderCliError("plain string", { stream: nonTtyStream })).toBe(
      ["Error: Command failed.", "plain string"].join("\n"),
    );
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const output = renderCliError(buildUserFacingError(), {
      stream: nonTtyStream,
      useColor: true,
    });

    expect(output).not.toContain("\u001b[");
  });

  it("colors labels on a TTY", () => {
    const output = renderCliError(new Error("boom"), { stream: ttyStream, useColor: true });

    expect(output.split("\n")[0]).toBe(
      "\u001b[1m\u001b[31mError:\u001b[39m\u001b[22m \u001b[1mCommand failed.\u001b[22m",
    );
  });
});
