import { NetworkDefinition } from "./network";
import { ServiceDefinition } from "./service";
import { NamedVolume } from "./volume";

export interface StackManifest {
  // Prefix for every resource the stack owns
  readonly project: string;
  // Directory that relative bind mounts and build contexts resolve against
  readonly projectDir: string;
  readonly services: ServiceDefinition[];
  readonly volumes: NamedVolume[];
  readonly networks: NetworkDefinition[];
}
