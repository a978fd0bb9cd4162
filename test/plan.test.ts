import test from "node:test";
import assert from "node:assert/strict";
import { loadDocument, parseDocument } from "../src/lib/document";
import { deviceIndexWarnings, formatGpus, formatPort, formatVolume, secondaryNetworks, toCreateArgs } from "../src/lib/plan";
import { resolveDocument } from "../src/lib/resolver";
import type { InstantiationPlan } from "../src/lib/types";
import { fixture } from "./helpers/fake-docker";

function planOf(text: string): InstantiationPlan {
  const { plans, errors } = resolveDocument(parseDocument(text, { project: "demo" }));
  assert.deepEqual(errors, []);
  return plans[0];
}

test("toCreateArgs renders the GPU speech service plan", () => {
  const [plan] = resolveDocument(loadDocument(fixture("deploy"))).plans;

  assert.deepEqual(toCreateArgs(plan), [
    "create",
    "--name",
    "f5-tts",
    "--restart",
    "always",
    "--privileged",
    "--tty",
    "--runtime",
    "nvidia",
    "--shm-size",
    "32g",
    "--network",
    "ai_network",
    "--network-alias",
    "f5-tts",
    "--publish",
    "9988:9988/tcp",
    "--volume",
    "d:/tts/results:/code/results",
    "--volume",
    "d:/tts/error:/code/error",
    "--volume",
    "d:/tts/logs:/code/logs",
    "--env",
    "TQDM_DISABLE=1",
    "--env",
    "PYTHONUNBUFFERED=1",
    "--env",
    "CUDA_VISIBLE_DEVICES=0",
    "--env",
    "PYTORCH_CUDA_ALLOC_CONF=max_split_size_mb:1024",
    "--env",
    "ASR_URL=http://host.docker.internal:7868/api/v1/asr",
    "--add-host",
    "host.docker.internal:host-gateway",
    "--gpus",
    "device=0",
    "--label",
    `io.deckhand.fingerprint=${plan.fingerprint}`,
    "--label",
    "io.deckhand.managed=true",
    "--label",
    "io.deckhand.project=deploy",
    "--label",
    "io.deckhand.service=f5-tts",
    "f5-tts:1.0",
    "python",
    "/code/src/f5_tts/infer/infer_fastapi.py"
  ]);
});

test("toCreateArgs maps the never policy to docker's 'no' and keeps a minimal plan short", () => {
  const plan = planOf("networks:\n  front:\nservices:\n  api:\n    image: api:1\n    networks: [front]\n");

  assert.deepEqual(toCreateArgs(plan), [
    "create",
    "--name",
    "api",
    "--restart",
    "no",
    "--network",
    "front",
    "--network-alias",
    "api",
    "--label",
    `io.deckhand.fingerprint=${plan.fingerprint}`,
    "--label",
    "io.deckhand.managed=true",
    "--label",
    "io.deckhand.project=demo",
    "--label",
    "io.deckhand.service=api",
    "api:1"
  ]);
});

test("only the first network is attached at create time", () => {
  const plan = planOf(
    "networks:\n  front:\n  back:\nservices:\n  api:\n    image: api:1\n    networks: [front, back]\n"
  );
  assert.deepEqual(secondaryNetworks(plan), ["back"]);
  assert.equal(toCreateArgs(plan).filter((arg) => arg === "--network").length, 1);
});

test("several GPU ids are passed as one quoted device list", () => {
  const plan = planOf(
    [
      "networks:",
      "  front:",
      "services:",
      "  tts:",
      "    image: tts:1",
      "    networks: [front]",
      "    deploy:",
      "      resources:",
      "        reservations:",
      "          devices:",
      "            - capabilities: [gpu]",
      "              device_ids: ['0', '2']",
      ""
    ].join("\n")
  );
  assert.equal(formatGpus(plan), "\"device=0,2\"");
});

test("formatPort and formatVolume use docker's flag syntax", () => {
  assert.equal(formatPort({ hostIp: "127.0.0.1", hostPort: 5353, containerPort: 53, protocol: "udp" }), "127.0.0.1:5353:53/udp");
  assert.equal(formatVolume({ hostPath: "/srv/models", containerPath: "/models", readOnly: true }), "/srv/models:/models:ro");
  assert.equal(formatVolume({ hostPath: "/srv/out", containerPath: "/out", readOnly: false }), "/srv/out:/out");
});

function gpuPlan(environment: string, privileged = false): InstantiationPlan {
  return planOf(
    [
      "networks:",
      "  front:",
      "services:",
      "  tts:",
      "    image: tts:1",
      "    networks: [front]",
      `    privileged: ${privileged}`,
      `    environment: [${environment}]`,
      "    deploy:",
      "      resources:",
      "        reservations:",
      "          devices:",
      "            - capabilities: [gpu]",
      ""
    ].join("\n")
  );
}

test("host GPU indices in CUDA_VISIBLE_DEVICES warn on an unprivileged service", () => {
  assert.deepEqual(deviceIndexWarnings(gpuPlan("CUDA_VISIBLE_DEVICES=2")), [
    "tts: CUDA_VISIBLE_DEVICES=2 names host GPUs, but the container numbers its reserved GPUs 0; use those indices or run privileged"
  ]);
  assert.deepEqual(deviceIndexWarnings(gpuPlan("CUDA_VISIBLE_DEVICES=2", true)), []);
  assert.deepEqual(deviceIndexWarnings(gpuPlan("CUDA_VISIBLE_DEVICES=0")), []);
  assert.deepEqual(deviceIndexWarnings(resolveDocument(loadDocument(fixture("deploy01"))).plans[0]), []);
});
