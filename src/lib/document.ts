import fs from "node:fs";
import path from "node:path";
import { load, YAMLException } from "js-yaml";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { NetworkBinding } from "./types";
import { isRecord } from "./utils";

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const networkSchema = z
  .object({
    driver: z.literal("bridge", { errorMap: () => ({ message: "only the 'bridge' driver is supported" }) }).default("bridge")
  })
  .strict();

const deviceSchema = z
  .object({
    driver: z.string().min(1).optional(),
    capabilities: z.array(z.string().min(1)).min(1, "capabilities must list at least one capability"),
    device_ids: z.array(z.union([z.string(), z.number().int().nonnegative()])).optional(),
    count: z.union([z.number().int().positive(), z.literal("all")]).optional()
  })
  .strict();

const deploySchema = z
  .object({
    resources: z
      .object({
        reservations: z
          .object({
            devices: z.array(deviceSchema).optional()
          })
          .strict()
          .optional()
      })
      .strict()
      .optional()
  })
  .strict();

export const serviceSchema = z
  .object({
    image: z.string().min(1, "image is required"),
    container_name: z
      .string()
      .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, "container_name may contain only letters, digits, '_', '.' and '-'")
      .optional(),
    restart: z.string().optional(),
    runtime: z.string().min(1).optional(),
    privileged: z.boolean().optional(),
    tty: z.boolean().optional(),
    volumes: z.array(z.string()).optional(),
    environment: z.union([z.array(z.string()), z.record(scalarSchema.nullable())]).optional(),
    deploy: deploySchema.optional(),
    shm_size: z.union([z.string(), z.number()]).optional(),
    ports: z.array(z.union([z.string(), z.number()])).optional(),
    command: z.union([z.string(), z.array(z.string())]).optional(),
    networks: z.union([z.array(z.string()), z.record(z.object({}).passthrough().nullable())]).optional()
  })
  .strict();

export type ServiceSpec = z.infer<typeof serviceSchema>;
export type DeviceSpec = z.infer<typeof deviceSchema>;

export interface DocumentService {
  name: string;
  spec: ServiceSpec;
}

export interface DeploymentDocument {
  source: string;
  project: string;
  networks: Map<string, NetworkBinding>;
  services: DocumentService[];
  /** Document-level errors and services whose shape could not be read at all. */
  errors: ConfigurationError[];
}

export interface ParseOptions {
  source?: string;
  project?: string;
}

const KNOWN_SECTIONS = new Set(["networks", "services"]);

export function parseDocument(text: string, options: ParseOptions = {}): DeploymentDocument {
  const source = options.source ?? "<inline>";
  const document: DeploymentDocument = {
    source,
    project: options.project ?? deriveProjectName(source),
    networks: new Map(),
    services: [],
    errors: []
  };

  let root: unknown;
  try {
    root = load(text, { filename: source });
  } catch (error) {
    const message = error instanceof YAMLException ? error.message : String(error);
    document.errors.push(documentError(`document is not valid YAML: ${message}`, source));
    return document;
  }

  if (root === undefined || root === null) {
    return document;
  }
  if (!isRecord(root)) {
    document.errors.push(documentError("document root must be a mapping", source));
    return document;
  }

  for (const key of Object.keys(root)) {
    if (!KNOWN_SECTIONS.has(key)) {
      document.errors.push(documentError(`unknown top-level section '${key}'`, source));
    }
  }

  const networks = sectionEntries(root.networks, "networks", document);
  for (const [name, raw] of networks) {
    const parsed = networkSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      document.errors.push(documentError(`network '${name}': ${formatIssues(parsed.error)}`, source));
      continue;
    }
    document.networks.set(name, { name, driver: parsed.data.driver });
  }

  const services = sectionEntries(root.services, "services", document);
  for (const [name, raw] of services) {
    const parsed = serviceSchema.safeParse(raw);
    if (!parsed.success) {
      document.errors.push(new ConfigurationError({
        code: "invalid_service",
        message: formatIssues(parsed.error),
        services: [name],
        source
      }));
      continue;
    }
    document.services.push({ name, spec: parsed.data });
  }

  return document;
}

export function loadDocument(filePath: string, options: Omit<ParseOptions, "source"> = {}): DeploymentDocument {
  const absolute = path.resolve(filePath);
  let text: string;
  try {
    text = fs.readFileSync(absolute, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    const reason = code === "ENOENT" ? "file not found" : error instanceof Error ? error.message : String(error);
    return {
      source: filePath,
      project: options.project ?? deriveProjectName(absolute),
      networks: new Map(),
      services: [],
      errors: [documentError(`cannot read document: ${reason}`, filePath)]
    };
  }
  return parseDocument(text, { source: filePath, project: options.project ?? deriveProjectName(absolute) });
}

/** The directory holding the document names the project, as compose does. */
export function deriveProjectName(source: string): string {
  const dir = path.basename(path.dirname(path.resolve(source)));
  const normalized = dir.toLowerCase().replace(/[^a-z0-9_-]+/g, "");
  return normalized || "default";
}

function sectionEntries(value: unknown, section: string, document: DeploymentDocument): Array<[string, unknown]> {
  if (value === undefined || value === null) {
    return [];
  }
  if (!isRecord(value)) {
    document.errors.push(documentError(`'${section}' must be a mapping of name to definition`, document.source));
    return [];
  }
  return Object.entries(value);
}

function documentError(message: string, source: string): ConfigurationError {
  return new ConfigurationError({ code: "invalid_document", message, source });
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
