import test from "node:test";
import assert from "node:assert/strict";
import { CliError } from "../src/lib/errors";
import { formatInstanceNotFoundMessage, listManagedInstances, requireInstanceByName } from "../src/lib/instances";
import { DockerRuntime } from "../src/lib/runtime";
import type { InstanceStatus } from "../src/lib/types";
import { resolveFiles } from "../src/services/deployment";
import { FakeDocker, fixture, THREE_GPUS } from "./helpers/fake-docker";

const instances: InstanceStatus[] = [
  { containerName: "f5-tts", service: "f5-tts", state: "running", ports: [] },
  { containerName: "speech-a", service: "speech", state: "running", ports: [] },
  { containerName: "speech-b", service: "speech", state: "exited", ports: [] },
  { containerName: "loose", state: "created", ports: [] }
];

test("formatInstanceNotFoundMessage includes available names when present", () => {
  const message = formatInstanceNotFoundMessage("alpha", ["one", "two"]);
  assert.equal(message, "Instance 'alpha' not found. Available instances: one, two");
});

test("formatInstanceNotFoundMessage explains empty state", () => {
  const message = formatInstanceNotFoundMessage("alpha", []);
  assert.equal(message, "Instance 'alpha' not found. No deckhand instances exist yet.");
});

test("requireInstanceByName prefers the container name, then a unique service name", () => {
  assert.equal(requireInstanceByName(instances, "speech-b").containerName, "speech-b");
  assert.equal(requireInstanceByName(instances, "f5-tts").containerName, "f5-tts");
});

test("requireInstanceByName rejects a service name shared by several instances", () => {
  assert.throws(
    () => requireInstanceByName(instances, "speech"),
    (error: unknown) => error instanceof CliError
      && error.kind === "validation"
      && error.message === "Service name 'speech' matches several instances: speech-a, speech-b"
  );
});

test("requireInstanceByName throws CliError with kind=not_found", () => {
  assert.throws(
    () => requireInstanceByName([], "alpha"),
    (error: unknown) => error instanceof CliError
      && error.kind === "not_found"
      && error.message.includes("No deckhand instances exist yet")
  );
  assert.throws(
    () => requireInstanceByName(instances, "alpha"),
    (error: unknown) => error instanceof CliError
      && error.message === "Instance 'alpha' not found. Available instances: f5-tts, speech, speech, loose"
  );
});

test("listManagedInstances observes every labelled container sorted by service", async () => {
  const fake = new FakeDocker();
  fake.images.add("f5-tts:1.0");
  fake.gpuCsv = THREE_GPUS;
  const runtime = new DockerRuntime({ bin: "docker", run: fake.run, startTimeoutMs: 0, pollIntervalMs: 0 });
  const { plans } = resolveFiles([fixture("deploy01"), fixture("deploy")]);
  for (const plan of plans) {
    await runtime.applyPlan(plan);
  }

  const listed = await listManagedInstances(runtime);

  assert.deepEqual(listed.map((instance) => [instance.service, instance.project, instance.state]), [
    ["f5-tts", "deploy", "running"],
    ["f5-tts-01", "deploy01", "running"]
  ]);
});
