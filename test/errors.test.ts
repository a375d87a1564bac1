import test from "node:test";
import assert from "node:assert/strict";
import { CliError, renderCliError, toCliError } from "../src/lib/errors";
import { MachineApiError } from "../src/lib/machines";

test("toCliError preserves existing CliError", () => {
  const input = new CliError({
    kind: "validation",
    message: "bad input",
    hint: "try again"
  });
  const output = toCliError(input);
  assert.equal(output, input);
});

test("toCliError maps MachineApiError to runtime CliError with the AWS code", () => {
  const apiError = new MachineApiError("stop", "i-0123456789abcdef0", "Request limit exceeded.", "RequestLimitExceeded");
  const mapped = toCliError(apiError);
  assert.equal(mapped.kind, "runtime");
  assert.equal(mapped.message, "Machine stop failed for i-0123456789abcdef0: Request limit exceeded.");
  assert.equal(mapped.detail, "AWS error code: RequestLimitExceeded");
  assert.equal(mapped.hint, undefined);
});

test("toCliError adds a credentials hint for authorization failures", () => {
  const mapped = toCliError(new MachineApiError("describe", "i-0123456789abcdef0", "not authorized", "UnauthorizedOperation"));
  assert.equal(mapped.hint, "Check the AWS credentials and the permissions attached to them.");
});

test("toCliError wraps plain errors and non-error values", () => {
  assert.equal(toCliError(new Error("boom")).message, "boom");
  const fromString = toCliError("bare failure");
  assert.equal(fromString.kind, "runtime");
  assert.equal(fromString.message, "bare failure");
  assert.equal(fromString.exitCode, 1);
});

test("renderCliError includes hint and detail on separate lines", () => {
  const err = new CliError({
    kind: "dependency",
    message: "EC2 client unavailable",
    hint: "set DEVBOX_REGION",
    detail: "region is missing"
  });
  const rendered = renderCliError(err);
  assert.equal(rendered, "EC2 client unavailable\nHint: set DEVBOX_REGION\nregion is missing");
});
