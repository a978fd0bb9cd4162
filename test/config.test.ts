import test from "node:test";
import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "../src/lib/config";
import { CliError } from "../src/lib/errors";

test("loadConfig falls back to defaults", () => {
  assert.deepEqual(loadConfig({}), {
    dockerBin: undefined,
    files: ["docker-compose.yml"],
    project: undefined,
    startTimeoutMs: 15_000
  });
});

test("loadConfig reads DECKHAND_* variables", () => {
  const config = loadConfig({
    DECKHAND_DOCKER_BIN: "/opt/docker/bin/docker",
    DECKHAND_FILE: "deploy/stack.yml",
    DECKHAND_PROJECT: "speech",
    DECKHAND_START_TIMEOUT_MS: "2500"
  });
  assert.deepEqual(config, {
    dockerBin: "/opt/docker/bin/docker",
    files: ["deploy/stack.yml"],
    project: "speech",
    startTimeoutMs: 2500
  });
});

test("flags override the environment and expand ~", () => {
  const config = loadConfig(
    { DECKHAND_FILE: "ignored.yml", DECKHAND_PROJECT: "speech" },
    { file: ["~/stacks/a.yml", "b.yml"], project: "other" }
  );
  assert.deepEqual(config.files, [path.join(os.homedir(), "stacks/a.yml"), "b.yml"]);
  assert.equal(config.project, "other");
});

test("loadConfig rejects an invalid project name", () => {
  assert.throws(
    () => loadConfig({ DECKHAND_PROJECT: "My Project" }),
    (error: unknown) => error instanceof CliError
      && error.kind === "validation"
      && error.message === "Invalid environment: DECKHAND_PROJECT: must be lowercase letters, digits, '_' or '-'"
  );
});

test("loadConfig rejects a negative start timeout", () => {
  assert.throws(
    () => loadConfig({ DECKHAND_START_TIMEOUT_MS: "-1" }),
    (error: unknown) => error instanceof CliError && error.message.startsWith("Invalid environment: DECKHAND_START_TIMEOUT_MS: ")
  );
});
