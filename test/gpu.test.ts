import test from "node:test";
import assert from "node:assert/strict";
import type { CommandRunner } from "../src/lib/exec";
import { listHostGpus, missingDeviceIds, parseGpuCsv } from "../src/lib/gpu";
import { FakeDocker, THREE_GPUS } from "./helpers/fake-docker";

test("parseGpuCsv reads nvidia-smi csv output and skips noise", () => {
  assert.deepEqual(parseGpuCsv("0, GPU-aaaa, NVIDIA A100-SXM4-80GB\n\nNo devices were found\n1, GPU-bbbb, NVIDIA L4\n"), [
    { index: "0", uuid: "GPU-aaaa", name: "NVIDIA A100-SXM4-80GB" },
    { index: "1", uuid: "GPU-bbbb", name: "NVIDIA L4" }
  ]);
});

test("missingDeviceIds matches reservations by index or uuid", () => {
  const gpus = parseGpuCsv(THREE_GPUS);
  assert.deepEqual(missingDeviceIds(["0", "GPU-cccc", "3", "GPU-zzzz"], gpus), ["3", "GPU-zzzz"]);
});

test("listHostGpus returns null when nvidia-smi fails", async () => {
  const fake = new FakeDocker();
  fake.gpuCsv = null;
  assert.equal(await listHostGpus(fake.run), null);
});

test("listHostGpus returns null when nvidia-smi is not installed", async () => {
  const missing: CommandRunner = async () => {
    throw Object.assign(new Error("spawn nvidia-smi ENOENT"), { code: "ENOENT" });
  };
  assert.equal(await listHostGpus(missing), null);
});

test("listHostGpus relays other spawn failures", async () => {
  const broken: CommandRunner = async () => {
    throw new Error("spawn EACCES");
  };
  await assert.rejects(listHostGpus(broken), /spawn EACCES/);
});
