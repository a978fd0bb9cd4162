import test from "node:test";
import assert from "node:assert/strict";
import { CliError, RuntimeStartupError } from "../src/lib/errors";
import { DockerRuntime, type HostRuntime } from "../src/lib/runtime";
import type { InstanceHandle, InstanceStatus, InstantiationPlan } from "../src/lib/types";
import { applyPlans, resolveFiles, selectPlans } from "../src/services/deployment";
import { FakeDocker, fixture, THREE_GPUS } from "./helpers/fake-docker";

test("resolveFiles resolves several documents against one host", () => {
  const resolved = resolveFiles([fixture("deploy"), fixture("deploy01")]);
  assert.deepEqual(resolved.errors, []);
  assert.deepEqual(resolved.documents.map((document) => document.project), ["deploy", "deploy01"]);
  assert.deepEqual(resolved.plans.map((plan) => plan.containerName), ["f5-tts", "f5-tts-01"]);
});

test("resolveFiles applies a project override to a single document only", () => {
  assert.equal(resolveFiles([fixture("deploy")], { project: "speech" }).plans[0].project, "speech");
  assert.deepEqual(
    resolveFiles([fixture("deploy"), fixture("deploy01")], { project: "speech" }).plans.map((plan) => plan.project),
    ["deploy", "deploy01"]
  );
});

test("resolveFiles reports an unreadable document without throwing", () => {
  const resolved = resolveFiles(["/nonexistent/stack/docker-compose.yml"]);
  assert.deepEqual(resolved.plans, []);
  assert.deepEqual(resolved.errors.map((error) => error.message), ["cannot read document: file not found"]);
});

test("selectPlans matches service or container names and rejects unknown ones", () => {
  const { plans } = resolveFiles([fixture("deploy"), fixture("deploy01")]);

  assert.equal(selectPlans(plans, []).length, 2);
  assert.deepEqual(selectPlans(plans, ["f5-tts-01"]).map((plan) => plan.name), ["f5-tts-01"]);
  assert.throws(
    () => selectPlans(plans, ["f5-tts", "nope"]),
    (error: unknown) => error instanceof CliError && error.kind === "not_found" && error.message === "No valid plan for: nope"
  );
});

class ScriptedRuntime implements HostRuntime {
  readonly applied: string[] = [];

  async applyPlan(plan: InstantiationPlan): Promise<InstanceHandle> {
    this.applied.push(plan.name);
    if (plan.name === "f5-tts") {
      throw new RuntimeStartupError({ service: plan.name, message: "container 'f5-tts' exited before becoming ready" });
    }
    return {
      service: plan.name,
      containerName: plan.containerName,
      containerId: "abc",
      action: "created",
      status: { containerName: plan.containerName, state: "running", ports: [] }
    };
  }

  async observe(containerName: string): Promise<InstanceStatus> {
    return { containerName, state: "missing", ports: [] };
  }
}

test("applyPlans keeps going after one plan fails and reports outcomes in plan order", async () => {
  const { plans } = resolveFiles([fixture("deploy"), fixture("deploy01")]);
  const runtime = new ScriptedRuntime();
  const started: string[] = [];
  const settled: boolean[] = [];

  const outcomes = await applyPlans(runtime, plans, {
    onStart: (plan) => started.push(plan.name),
    onSettled: (outcome) => settled.push(outcome.ok)
  });

  assert.deepEqual(runtime.applied.sort(), ["f5-tts", "f5-tts-01"]);
  assert.deepEqual(started, ["f5-tts", "f5-tts-01"]);
  assert.equal(settled.length, 2);
  assert.deepEqual(outcomes.map((outcome) => [outcome.plan.name, outcome.ok]), [
    ["f5-tts", false],
    ["f5-tts-01", true]
  ]);
  const [failed] = outcomes;
  assert.ok(!failed.ok && failed.error instanceof RuntimeStartupError);
});

test("applyPlans brings up both fixture plans on a fake docker host", async () => {
  const fake = new FakeDocker();
  fake.images.add("f5-tts:1.0");
  fake.gpuCsv = THREE_GPUS;
  const runtime = new DockerRuntime({ bin: "docker", run: fake.run, startTimeoutMs: 0, pollIntervalMs: 0 });
  const { plans } = resolveFiles([fixture("deploy"), fixture("deploy01")]);

  const outcomes = await applyPlans(runtime, plans);

  assert.deepEqual(
    outcomes.map((outcome) => (outcome.ok ? [outcome.handle.containerName, outcome.handle.action] : [outcome.plan.name, "failed"])),
    [
      ["f5-tts", "created"],
      ["f5-tts-01", "created"]
    ]
  );
  assert.deepEqual([...fake.containers.keys()].sort(), ["f5-tts", "f5-tts-01"]);
});
