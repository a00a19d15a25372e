import { PortMapping } from "./port-mapping";
import { VolumeMount } from "./volume";

export type RestartPolicy = "no" | "always" | "unless-stopped" | "on-failure";

export interface Healthcheck {
  // Docker healthcheck test, e.g. ["CMD-SHELL", "pg_isready"]
  readonly test: string[];
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly retries: number;
}

export interface BuildDefinition {
  readonly context: string;
  readonly dockerfile: string;
  // Files whose contents decide whether the dependency layer is still valid
  readonly dependencyFiles: string[];
}

/**
 * Configuration for one service container in the stack
 */
export interface ServiceDefinition {
  readonly name: string;
  readonly containerName: string;
  readonly image: string;
  readonly build?: BuildDefinition;
  readonly restartPolicy: RestartPolicy;
  readonly ports: PortMapping[];
  readonly volumes: VolumeMount[];
  readonly envFile?: string;
  readonly environment?: Record<string, string>;
  // Logical network names; the first one is the container's primary network
  readonly networks: string[];
  readonly dependsOn: string[];
  readonly command?: string[];
  readonly workingDir?: string;
  readonly healthcheck?: Healthcheck;
}
