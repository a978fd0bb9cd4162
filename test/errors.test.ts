import test from "node:test";
import assert from "node:assert/strict";
import { CommandError } from "../src/lib/exec";
import {
  CliError,
  ConfigurationError,
  ImageResolutionError,
  InvalidDeviceReservationError,
  renderCliError,
  ResourceUnavailableError,
  RuntimeStartupError,
  toCliError
} from "../src/lib/errors";

test("toCliError preserves existing CliError", () => {
  const input = new CliError({
    kind: "validation",
    message: "bad input",
    hint: "try again"
  });
  const output = toCliError(input);
  assert.equal(output, input);
});

test("toCliError maps CommandError to runtime CliError with detail", () => {
  const commandError = new CommandError("foo bar", 7, "std out", "std err");
  const mapped = toCliError(commandError);
  assert.equal(mapped.kind, "runtime");
  assert.equal(mapped.message, "Command failed (7): foo bar");
  assert.equal(mapped.detail, "std out\nstd err");
});

test("CommandError.reason is the last stderr line", () => {
  const commandError = new CommandError("docker start x", 1, "", "first\n\nError: failed to start containers: x\n");
  assert.equal(commandError.reason, "Error: failed to start containers: x");
  assert.equal(new CommandError("docker start x", 1, "", "").reason, "Command failed (1): docker start x");
});

test("toCliError maps ConfigurationError to a validation error naming every service", () => {
  const mapped = toCliError(new ConfigurationError({
    code: "duplicate_host_port",
    message: "host port 9988/tcp is claimed by both 'a' and 'b'",
    services: ["a", "b"],
    source: "docker-compose.yml"
  }));
  assert.equal(mapped.kind, "validation");
  assert.equal(mapped.message, "docker-compose.yml: [a, b] host port 9988/tcp is claimed by both 'a' and 'b' (duplicate_host_port)");
  assert.equal(mapped.hint, "Fix docker-compose.yml and re-run `deckhand validate`.");
});

test("InvalidDeviceReservationError is a ConfigurationError scoped to one service", () => {
  const error = new InvalidDeviceReservationError("tts", "GPU reservation has an empty device index set");
  assert.ok(error instanceof ConfigurationError);
  assert.equal(error.name, "InvalidDeviceReservation");
  assert.equal(error.service, "tts");
  assert.equal(toCliError(error).message, "[tts] GPU reservation has an empty device index set (invalid_device_reservation)");
});

test("toCliError maps host failures to dependency and runtime kinds", () => {
  const resource = toCliError(new ResourceUnavailableError({ service: "tts", message: "GPU devices [2] are not exposed by the host" }));
  assert.equal(resource.kind, "dependency");
  assert.equal(resource.message, "[tts] GPU devices [2] are not exposed by the host");

  const image = toCliError(new ImageResolutionError({ service: "tts", image: "tts:1", message: "image 'tts:1' is not present" }));
  assert.equal(image.kind, "dependency");
  assert.equal(image.hint, "Build or pull 'tts:1' on this host first.");

  const startup = toCliError(new RuntimeStartupError({ service: "tts", message: "exited", detail: "Traceback" }));
  assert.equal(startup.kind, "runtime");
  assert.equal(renderCliError(startup), "[tts] exited\nHint: Inspect the output with `deckhand logs tts`.\nTraceback");
});

test("renderCliError includes hint and detail on separate lines", () => {
  const err = new CliError({
    kind: "dependency",
    message: "docker daemon unreachable",
    hint: "start docker",
    detail: "Cannot connect to the Docker daemon"
  });
  const rendered = renderCliError(err);
  assert.equal(rendered, "docker daemon unreachable\nHint: start docker\nCannot connect to the Docker daemon");
});
