export const CLI_NAME = "deckhand";

export const DEFAULT_DOCUMENT_FILE = "docker-compose.yml";
export const DEFAULT_START_TIMEOUT_MS = 15_000;

export const GPU_CAPABILITY = "gpu";
export const VISIBLE_DEVICES_VAR = "CUDA_VISIBLE_DEVICES";
export const ASR_URL_VAR = "ASR_URL";
export const HOST_GATEWAY_ALIAS = "host.docker.internal";

export const MANAGED_LABEL = "io.deckhand.managed";
export const PROJECT_LABEL = "io.deckhand.project";
export const SERVICE_LABEL = "io.deckhand.service";
export const FINGERPRINT_LABEL = "io.deckhand.fingerprint";

export const MIN_NODE_MAJOR = 20;
