/**
 * A port a service container listens on, optionally published on the host
 */
export interface PortMapping {
  // The port inside the container
  readonly containerPort: number;
  // Host port to publish on; unpublished when omitted
  readonly hostPort?: number;
  readonly protocol?: "tcp" | "udp";
}
