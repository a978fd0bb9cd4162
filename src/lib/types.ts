export type RestartPolicy = "always" | "on-failure" | "never";

export type PortProtocol = "tcp" | "udp";

export interface NetworkBinding {
  name: string;
  driver: "bridge";
}

export interface PortMapping {
  hostIp?: string;
  hostPort: number;
  containerPort: number;
  protocol: PortProtocol;
}

export interface VolumeBinding {
  hostPath: string;
  containerPath: string;
  readOnly: boolean;
}

export interface DeviceReservation {
  driver: string;
  capabilities: string[];
  deviceIds: string[];
}

export type EnvironmentEntry = [key: string, value: string];

export interface ServiceInstance {
  name: string;
  containerName: string;
  image: string;
  restart: RestartPolicy;
  privileged: boolean;
  tty: boolean;
  runtime?: string;
  shmSize?: string;
  command: string[];
  networks: string[];
  ports: PortMapping[];
  volumes: VolumeBinding[];
  environment: EnvironmentEntry[];
  devices: DeviceReservation[];
}

export interface InstantiationPlan extends ServiceInstance {
  project: string;
  shmSizeBytes?: number;
  extraHosts: string[];
  networkDrivers: Record<string, NetworkBinding["driver"]>;
  labels: Record<string, string>;
  fingerprint: string;
}

export type InstanceState = "running" | "restarting" | "created" | "exited" | "paused" | "missing" | "unknown";

export interface InstanceStatus {
  containerName: string;
  id?: string;
  state: InstanceState;
  health?: string;
  exitCode?: number;
  restartCount?: number;
  image?: string;
  service?: string;
  project?: string;
  fingerprint?: string;
  ports: string[];
  startedAt?: Date;
}

export interface InstanceHandle {
  service: string;
  containerName: string;
  containerId: string;
  action: "created" | "replaced" | "unchanged";
  status: InstanceStatus;
}
