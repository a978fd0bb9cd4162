import { createHash } from "node:crypto";
import {
  ASR_URL_VAR,
  FINGERPRINT_LABEL,
  GPU_CAPABILITY,
  HOST_GATEWAY_ALIAS,
  MANAGED_LABEL,
  PROJECT_LABEL,
  SERVICE_LABEL,
  VISIBLE_DEVICES_VAR
} from "./constants";
import type { DeploymentDocument, DeviceSpec, DocumentService, ServiceSpec } from "./document";
import { ConfigurationError, InvalidDeviceReservationError, type ConfigurationErrorCode } from "./errors";
import type {
  DeviceReservation,
  EnvironmentEntry,
  InstantiationPlan,
  NetworkBinding,
  PortMapping,
  RestartPolicy,
  ServiceInstance,
  VolumeBinding
} from "./types";
import { isAbsoluteHostPath, normalizeHostPath, parseByteSize, splitCommandLine } from "./utils";

export interface ResolveOptions {
  /** When true (default), two services may not reserve the same GPU index. */
  exclusiveDevices?: boolean;
}

export interface ResolutionResult {
  plans: InstantiationPlan[];
  errors: ConfigurationError[];
}

interface ServiceDraft {
  document: DeploymentDocument;
  name: string;
  instance: ServiceInstance;
  extraHosts: string[];
  errors: ConfigurationError[];
}

const RESTART_POLICIES: Record<string, RestartPolicy> = {
  always: "always",
  "on-failure": "on-failure",
  never: "never",
  no: "never"
};

const LOOPBACK_HOSTS = new Set(["localhost", "0.0.0.0", "[::1]", "::1"]);

export function resolveDocument(document: DeploymentDocument, options: ResolveOptions = {}): ResolutionResult {
  return resolveDocuments([document], options);
}

/**
 * Resolves documents that will be applied to the same host. Each document is
 * checked on its own, then host ports, host paths, container names and (when
 * exclusive) GPU indices are checked across every service of every document.
 * A service with any error yields no plan; its siblings are unaffected.
 */
export function resolveDocuments(documents: DeploymentDocument[], options: ResolveOptions = {}): ResolutionResult {
  const errors: ConfigurationError[] = documents.flatMap((document) => document.errors);
  const drafts = documents.flatMap((document) => document.services.map((service) => draftService(document, service)));

  errors.push(...drafts.flatMap((draft) => draft.errors));
  const rejected = new Set(drafts.filter((draft) => draft.errors.length > 0));

  for (const collision of findCollisions(drafts, options.exclusiveDevices !== false)) {
    errors.push(collision.error);
    for (const draft of collision.drafts) {
      rejected.add(draft);
    }
  }

  const plans = drafts.filter((draft) => !rejected.has(draft)).map(finalizePlan);
  return { plans, errors };
}

function draftService(document: DeploymentDocument, service: DocumentService): ServiceDraft {
  const { name, spec } = service;
  const errors: ConfigurationError[] = [];
  const fail = (code: ConfigurationErrorCode, message: string) => {
    errors.push(new ConfigurationError({ code, message, services: [name], source: document.source }));
  };

  const restartKey = spec.restart ?? "never";
  const restart = Object.hasOwn(RESTART_POLICIES, restartKey) ? RESTART_POLICIES[restartKey] : undefined;
  if (!restart) {
    fail("invalid_restart", `restart policy '${spec.restart}' must be one of always, on-failure, never`);
  }

  if (spec.shm_size !== undefined && parseByteSize(spec.shm_size) === undefined) {
    fail("invalid_shm_size", `shm_size '${spec.shm_size}' is not a byte size such as '32g'`);
  }

  let command: string[] = [];
  if (Array.isArray(spec.command)) {
    command = spec.command;
  } else if (typeof spec.command === "string") {
    const split = splitCommandLine(spec.command);
    if (split) {
      command = split;
    } else {
      fail("invalid_command", "command has an unterminated quote");
    }
  }

  const networks = resolveNetworkNames(spec);
  if (networks.length === 0) {
    fail("unknown_network", "service is not attached to any network");
  }
  for (const network of networks) {
    if (!document.networks.has(network)) {
      fail("unknown_network", `network '${network}' is not declared under networks`);
    }
  }

  const ports: PortMapping[] = [];
  const hostPorts = new Set<string>();
  for (const raw of spec.ports ?? []) {
    const parsed = parsePortMapping(raw);
    if (typeof parsed === "string") {
      fail("invalid_port", parsed);
      continue;
    }
    const hostPort = `${parsed.hostPort}/${parsed.protocol}`;
    if (hostPorts.has(hostPort)) {
      fail("duplicate_host_port", `host port ${hostPort} is published more than once`);
    }
    hostPorts.add(hostPort);
    ports.push(parsed);
  }

  const volumes: VolumeBinding[] = [];
  for (const raw of spec.volumes ?? []) {
    const parsed = parseVolumeBinding(raw);
    if (typeof parsed === "string") {
      fail("invalid_volume", parsed);
    } else {
      volumes.push(parsed);
    }
  }

  const environment = resolveEnvironment(spec, fail);
  const devices = resolveDevices(spec, environment, (message) => {
    errors.push(new InvalidDeviceReservationError(name, message, document.source));
  });
  const extraHosts = resolveEndpointHosts(environment, fail);

  const instance: ServiceInstance = {
    name,
    containerName: spec.container_name ?? name,
    image: spec.image,
    restart: restart ?? "never",
    privileged: spec.privileged ?? false,
    tty: spec.tty ?? false,
    runtime: spec.runtime,
    shmSize: spec.shm_size === undefined ? undefined : String(spec.shm_size),
    command,
    networks,
    ports,
    volumes,
    environment,
    devices
  };

  return { document, name, instance, extraHosts, errors };
}

function resolveNetworkNames(spec: ServiceSpec): string[] {
  if (!spec.networks) {
    return [];
  }
  return Array.isArray(spec.networks) ? spec.networks : Object.keys(spec.networks);
}

export function parsePortMapping(raw: string | number): PortMapping | string {
  const text = String(raw).trim();
  const match = text.match(/^(?:(?<ip>[^:]+):)?(?<host>\d+):(?<container>\d+)(?:\/(?<protocol>tcp|udp))?$/);
  if (!match?.groups) {
    return `port mapping '${text}' must have the form [ip:]host:container[/tcp|udp] with an explicit host port`;
  }

  const hostPort = Number(match.groups.host);
  const containerPort = Number(match.groups.container);
  for (const [label, port] of [["host", hostPort], ["container", containerPort]] as const) {
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      return `port mapping '${text}' has ${label} port ${port} outside 1-65535`;
    }
  }

  const mapping: PortMapping = {
    hostPort,
    containerPort,
    protocol: match.groups.protocol === "udp" ? "udp" : "tcp"
  };
  if (match.groups.ip) {
    mapping.hostIp = match.groups.ip;
  }
  return mapping;
}

export function parseVolumeBinding(raw: string): VolumeBinding | string {
  const text = raw.trim();
  const drive = /^[a-zA-Z]:[\\/]/.test(text) ? text.slice(0, 2) : "";
  const [hostRest, containerPath, mode, ...extra] = text.slice(drive.length).split(":");
  const hostPath = `${drive}${hostRest}`;

  if (containerPath === undefined || extra.length > 0) {
    return `volume '${text}' must have the form host-path:container-path[:ro|rw]`;
  }
  if (!isAbsoluteHostPath(hostPath)) {
    return `volume host path '${hostPath}' is not an absolute path`;
  }
  if (!containerPath.startsWith("/")) {
    return `volume container path '${containerPath}' is not an absolute path`;
  }
  if (mode !== undefined && mode !== "ro" && mode !== "rw") {
    return `volume '${text}' has unsupported mode '${mode}'`;
  }

  return { hostPath, containerPath, readOnly: mode === "ro" };
}

function resolveEnvironment(
  spec: ServiceSpec,
  fail: (code: ConfigurationErrorCode, message: string) => void
): EnvironmentEntry[] {
  const entries: EnvironmentEntry[] = [];
  const seen = new Map<string, number>();
  const push = (key: string, value: string) => {
    const index = seen.get(key);
    if (index === undefined) {
      seen.set(key, entries.length);
      entries.push([key, value]);
    } else {
      entries[index] = [key, value];
    }
  };

  if (Array.isArray(spec.environment)) {
    for (const raw of spec.environment) {
      const separator = raw.indexOf("=");
      if (separator <= 0) {
        fail("invalid_service", `environment entry '${raw}' must have the form KEY=VALUE`);
        continue;
      }
      push(raw.slice(0, separator).trim(), raw.slice(separator + 1).trim());
    }
  } else if (spec.environment) {
    for (const [key, value] of Object.entries(spec.environment)) {
      if (value === null) {
        fail("invalid_service", `environment variable '${key}' has no value`);
        continue;
      }
      push(key, String(value));
    }
  }

  return entries;
}

function resolveDevices(
  spec: ServiceSpec,
  environment: EnvironmentEntry[],
  fail: (message: string) => void
): DeviceReservation[] {
  const requested = spec.deploy?.resources?.reservations?.devices ?? [];
  const visible = environment.find(([key]) => key === VISIBLE_DEVICES_VAR)?.[1];
  const visibleIds = visible === undefined ? undefined : splitIndexList(visible);

  const devices: DeviceReservation[] = [];
  for (const device of requested) {
    if (!device.capabilities.includes(GPU_CAPABILITY)) {
      fail(`device reservation with capabilities [${device.capabilities.join(", ")}] is not supported; only '${GPU_CAPABILITY}' is`);
      continue;
    }

    const reservation = resolveGpuReservation(device, visibleIds);
    if (typeof reservation === "string") {
      fail(reservation);
      continue;
    }
    devices.push(reservation);
  }
  return devices;
}

function resolveGpuReservation(device: DeviceSpec, visibleIds: string[] | undefined): DeviceReservation | string {
  if (device.device_ids && device.count !== undefined) {
    return "device reservation may set device_ids or count, not both";
  }

  const explicit = device.device_ids?.map((id) => String(id).trim());
  const deviceIds = explicit ?? visibleIds ?? [];
  if (deviceIds.length === 0) {
    return `GPU reservation has an empty device index set; set device_ids or ${VISIBLE_DEVICES_VAR}`;
  }

  const malformed = deviceIds.filter((id) => !/^\d+$/.test(id) && !/^(GPU|MIG)-[\w-]+$/.test(id));
  if (malformed.length > 0) {
    return `GPU device ids [${malformed.join(", ")}] are neither indices nor GPU UUIDs`;
  }
  if (new Set(deviceIds).size !== deviceIds.length) {
    return `GPU device ids [${deviceIds.join(", ")}] repeat an index`;
  }

  if (explicit && visibleIds) {
    const outside = visibleIds.filter((id) => !explicit.includes(id));
    if (outside.length > 0) {
      return `${VISIBLE_DEVICES_VAR} lists [${outside.join(", ")}] which device_ids [${explicit.join(", ")}] do not reserve`;
    }
  }

  return {
    driver: device.driver ?? "nvidia",
    capabilities: [...device.capabilities],
    deviceIds
  };
}

function splitIndexList(value: string): string[] {
  return value.split(",").map((part) => part.trim()).filter(Boolean);
}

function resolveEndpointHosts(
  environment: EnvironmentEntry[],
  fail: (code: ConfigurationErrorCode, message: string) => void
): string[] {
  const endpoint = environment.find(([key]) => key === ASR_URL_VAR)?.[1];
  if (endpoint === undefined) {
    return [];
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    fail("unreachable_endpoint", `${ASR_URL_VAR} '${endpoint}' is not an absolute URL`);
    return [];
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    fail("unreachable_endpoint", `${ASR_URL_VAR} '${endpoint}' must use http or https`);
    return [];
  }

  const host = url.hostname.toLowerCase();
  if (LOOPBACK_HOSTS.has(host) || host.startsWith("127.")) {
    fail(
      "unreachable_endpoint",
      `${ASR_URL_VAR} '${endpoint}' points at loopback, which the container cannot reach; use ${HOST_GATEWAY_ALIAS}`
    );
    return [];
  }

  return host === HOST_GATEWAY_ALIAS ? [`${HOST_GATEWAY_ALIAS}:host-gateway`] : [];
}

interface Collision {
  error: ConfigurationError;
  drafts: [ServiceDraft, ServiceDraft];
}

function findCollisions(drafts: ServiceDraft[], exclusiveDevices: boolean): Collision[] {
  const collisions: Collision[] = [];

  const checks: Array<{ code: ConfigurationErrorCode; label: string; claims: (draft: ServiceDraft) => string[] }> = [
    {
      code: "duplicate_host_port",
      label: "host port",
      claims: (draft) => draft.instance.ports.map((port) => `${port.hostPort}/${port.protocol}`)
    },
    {
      code: "duplicate_host_path",
      label: "host path",
      claims: (draft) => draft.instance.volumes.map((volume) => normalizeHostPath(volume.hostPath))
    },
    {
      code: "duplicate_container_name",
      label: "container name",
      claims: (draft) => [draft.instance.containerName]
    }
  ];
  if (exclusiveDevices) {
    checks.push({
      code: "duplicate_device",
      label: "GPU device",
      claims: (draft) => draft.instance.devices.flatMap((device) => device.deviceIds)
    });
  }

  for (const check of checks) {
    const owners = new Map<string, ServiceDraft>();
    for (const draft of drafts) {
      for (const claim of new Set(check.claims(draft))) {
        const owner = owners.get(claim);
        if (!owner) {
          owners.set(claim, draft);
          continue;
        }
        const sameDocument = owner.document === draft.document;
        const error = new ConfigurationError({
          code: check.code,
          message: `${check.label} ${claim} is claimed by both ${describe(owner, !sameDocument)} and ${describe(draft, !sameDocument)}`,
          services: [owner.name, draft.name],
          source: sameDocument ? draft.document.source : undefined
        });
        collisions.push({ error, drafts: [owner, draft] });
      }
    }
  }

  return collisions;
}

function describe(draft: ServiceDraft, withSource: boolean): string {
  return withSource ? `'${draft.name}' (${draft.document.source})` : `'${draft.name}'`;
}

function finalizePlan(draft: ServiceDraft): InstantiationPlan {
  const { instance, document } = draft;
  const networkDrivers: Record<string, NetworkBinding["driver"]> = {};
  for (const network of instance.networks) {
    networkDrivers[network] = document.networks.get(network)?.driver ?? "bridge";
  }

  const unsigned: Omit<InstantiationPlan, "fingerprint" | "labels"> = {
    ...instance,
    project: document.project,
    shmSizeBytes: instance.shmSize === undefined ? undefined : parseByteSize(instance.shmSize),
    extraHosts: draft.extraHosts,
    networkDrivers
  };
  const fingerprint = fingerprintOf(unsigned);

  return {
    ...unsigned,
    labels: {
      [FINGERPRINT_LABEL]: fingerprint,
      [MANAGED_LABEL]: "true",
      [PROJECT_LABEL]: document.project,
      [SERVICE_LABEL]: instance.name
    },
    fingerprint
  };
}

export function fingerprintOf(value: unknown): string {
  return createHash("sha256").update(canonicalJson(value)).digest("hex").slice(0, 16);
}

/** JSON with object keys sorted at every depth; undefined members are dropped. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item === undefined ? null : item)).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}
